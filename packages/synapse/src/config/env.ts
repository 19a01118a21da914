import {
  API_DEFAULTS,
  BUS_DEFAULTS,
  LOGGING_DEFAULTS,
  SEARCH_DEFAULTS,
  SERVICE_NAMES,
  STREAM_DEFAULTS,
  describeIssues,
  type ServiceConfig,
} from '@synapse/core';
import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  SERVICE: z.enum(SERVICE_NAMES).default('all'),
  BUS: z.enum(['nats', 'memory']).default('nats'),
  NATS_URL: z.string().min(1).default(BUS_DEFAULTS.NATS_URL),
  API_SERVER_HOST: z.string().min(1).default(API_DEFAULTS.HOST),
  API_SERVER_PORT: z.coerce.number().int().min(0).max(65_535).default(API_DEFAULTS.PORT),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default(LOGGING_DEFAULTS.LEVEL),
  LOG_PRETTY: flag.optional(),
  EMBEDDING_TIMEOUT_MS: positiveInt(SEARCH_DEFAULTS.EMBEDDING_TIMEOUT_MS),
  SEARCH_TIMEOUT_MS: positiveInt(SEARCH_DEFAULTS.SEARCH_TIMEOUT_MS),
  SSE_KEEP_ALIVE_MS: positiveInt(STREAM_DEFAULTS.KEEP_ALIVE_MS),
  BROADCAST_CAPACITY: positiveInt(STREAM_DEFAULTS.BROADCAST_CAPACITY),
  CORS_ORIGINS: z.string().default(''),
  MAX_CONCURRENT_HANDLERS: z.coerce.number().int().positive().optional(),
});

export class ConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Reads service configuration from environment variables. Empty strings
 * count as unset so a blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }

  const vars = parsed.data;
  return {
    service: vars.SERVICE,
    bus: vars.BUS,
    natsUrl: vars.NATS_URL,
    api: {
      host: vars.API_SERVER_HOST,
      port: vars.API_SERVER_PORT,
      corsOrigins: splitList(vars.CORS_ORIGINS),
    },
    search: {
      embeddingTimeoutMs: vars.EMBEDDING_TIMEOUT_MS,
      searchTimeoutMs: vars.SEARCH_TIMEOUT_MS,
    },
    stream: {
      broadcastCapacity: vars.BROADCAST_CAPACITY,
      keepAliveMs: vars.SSE_KEEP_ALIVE_MS,
    },
    logging: {
      level: vars.LOG_LEVEL,
      prettyPrint: vars.LOG_PRETTY ?? LOGGING_DEFAULTS.PRETTY_PRINT,
    },
    maxConcurrentHandlers: vars.MAX_CONCURRENT_HANDLERS,
  };
}
