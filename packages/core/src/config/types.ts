import type { LogLevel } from '../ports/logger';

export const SERVICE_NAMES = [
  'api',
  'perception',
  'preprocessing',
  'knowledge-graph',
  'vector-memory',
  'text-generation',
  'all',
] as const;

export type ServiceName = (typeof SERVICE_NAMES)[number];

export type BusKind = 'nats' | 'memory';

export interface ServiceConfig {
  service: ServiceName;
  bus: BusKind;
  natsUrl: string;
  api: {
    host: string;
    port: number;
    corsOrigins: string[];
  };
  search: {
    embeddingTimeoutMs: number;
    searchTimeoutMs: number;
  };
  stream: {
    broadcastCapacity: number;
    keepAliveMs: number;
  };
  logging: {
    level: LogLevel;
    prettyPrint: boolean;
  };
  /** Per-subject handler cap; undefined means unbounded. */
  maxConcurrentHandlers?: number | undefined;
}
