import { describe, expect, it } from "vitest";
import type { RuntimeResource } from "@synapse/core";
import { closeResources, startResources } from "../src/index";

function recordingResource(name: string, calls: string[], failOn?: "start" | "close"): RuntimeResource {
  return {
    start: async () => {
      calls.push(`start:${name}`);
      if (failOn === "start") throw new Error(`${name} failed to start`);
    },
    close: async () => {
      calls.push(`close:${name}`);
      if (failOn === "close") throw new Error(`${name} failed to close`);
    },
  };
}

describe("resource lifecycle", () => {
  it("starts in order and closes in reverse", async () => {
    const calls: string[] = [];
    const resources = [recordingResource("bus", calls), recordingResource("api", calls)];

    await startResources(resources);
    await closeResources(resources);

    expect(calls).toEqual(["start:bus", "start:api", "close:api", "close:bus"]);
  });

  it("closes what already started when a later start fails", async () => {
    const calls: string[] = [];
    const resources = [
      recordingResource("bus", calls),
      recordingResource("worker", calls),
      recordingResource("api", calls, "start"),
    ];

    await expect(startResources(resources)).rejects.toThrow("api failed to start");
    expect(calls).toEqual(["start:bus", "start:worker", "start:api", "close:worker", "close:bus"]);
  });

  it("closes every resource even when one close fails", async () => {
    const calls: string[] = [];
    const resources = [recordingResource("bus", calls), recordingResource("api", calls, "close")];

    await expect(closeResources(resources)).rejects.toThrow("Failed to close 1 resource(s)");
    expect(calls).toEqual(["close:api", "close:bus"]);
  });

  it("skips resources without lifecycle hooks", async () => {
    await expect(startResources([{}])).resolves.toBeUndefined();
    await expect(closeResources([{}])).resolves.toBeUndefined();
  });
});
