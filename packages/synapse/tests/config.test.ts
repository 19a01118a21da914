import { describe, expect, it } from "vitest";
import { LOGGING_DEFAULTS } from "@synapse/core";
import { ConfigError, loadConfig } from "../src/index";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      service: "all",
      bus: "nats",
      natsUrl: "nats://localhost:4222",
      api: { host: "0.0.0.0", port: 8080, corsOrigins: [] },
      search: { embeddingTimeoutMs: 15_000, searchTimeoutMs: 20_000 },
      stream: { broadcastCapacity: 32, keepAliveMs: 15_000 },
      logging: { level: "info", prettyPrint: LOGGING_DEFAULTS.PRETTY_PRINT },
      maxConcurrentHandlers: undefined,
    });
  });

  it("reads every variable", () => {
    const config = loadConfig({
      SERVICE: "vector-memory",
      BUS: "memory",
      NATS_URL: "nats://bus.internal:4222",
      API_SERVER_HOST: "127.0.0.1",
      API_SERVER_PORT: "9090",
      LOG_LEVEL: "debug",
      LOG_PRETTY: "false",
      EMBEDDING_TIMEOUT_MS: "500",
      SEARCH_TIMEOUT_MS: "750",
      SSE_KEEP_ALIVE_MS: "1000",
      BROADCAST_CAPACITY: "8",
      CORS_ORIGINS: " https://app.example.test, ,https://admin.example.test ",
      MAX_CONCURRENT_HANDLERS: "16",
    });

    expect(config).toEqual({
      service: "vector-memory",
      bus: "memory",
      natsUrl: "nats://bus.internal:4222",
      api: { host: "127.0.0.1", port: 9090, corsOrigins: ["https://app.example.test", "https://admin.example.test"] },
      search: { embeddingTimeoutMs: 500, searchTimeoutMs: 750 },
      stream: { broadcastCapacity: 8, keepAliveMs: 1000 },
      logging: { level: "debug", prettyPrint: false },
      maxConcurrentHandlers: 16,
    });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ API_SERVER_PORT: "", LOG_PRETTY: "1" });

    expect(config.api.port).toBe(8080);
    expect(config.logging.prettyPrint).toBe(true);
  });

  it("rejects an unknown service", () => {
    expect(() => loadConfig({ SERVICE: "mailer" })).toThrow(ConfigError);
    expect(() => loadConfig({ SERVICE: "mailer" })).toThrow(/^Invalid configuration: SERVICE: /);
  });

  it("rejects a non-numeric port and a zero timeout", () => {
    expect(() => loadConfig({ API_SERVER_PORT: "http" })).toThrow(/API_SERVER_PORT: /);
    expect(() => loadConfig({ SEARCH_TIMEOUT_MS: "0" })).toThrow(/SEARCH_TIMEOUT_MS: /);
  });
});
