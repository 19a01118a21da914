/**
 * Default constants for Synapse services
 */

/**
 * Request/reply deadlines used by the semantic search orchestration.
 * Hand-tuned values carried over from the deployed services; override per
 * environment rather than relying on them.
 */
export const SEARCH_DEFAULTS = {
  /** Deadline for the query-embedding hop */
  EMBEDDING_TIMEOUT_MS: 15_000 as const,

  /** Deadline for the vector search hop */
  SEARCH_TIMEOUT_MS: 20_000 as const,
};

/**
 * Event stream bridge
 */
export const STREAM_DEFAULTS = {
  /** Retained events before slow receivers start lagging */
  BROADCAST_CAPACITY: 32 as const,

  /** SSE keep-alive comment interval */
  KEEP_ALIVE_MS: 15_000 as const,
};

/**
 * HTTP gateway
 */
export const API_DEFAULTS = {
  HOST: '0.0.0.0' as const,
  PORT: 8080 as const,
  /** Origin prefixes always allowed by CORS */
  CORS_ORIGIN_PREFIXES: ['http://localhost', 'http://127.0.0.1'] as const,
};

export const BUS_DEFAULTS = {
  NATS_URL: 'nats://localhost:4222' as const,
};

/**
 * Vector store startup check: bounded fixed-delay retries before the
 * vector memory worker gives up.
 */
export const VECTOR_STORE_DEFAULTS = {
  CONNECT_ATTEMPTS: 5 as const,
  CONNECT_RETRY_DELAY_MS: 5_000 as const,
  VECTOR_DIMENSION: 768 as const,
};

export const EMBEDDING_DEFAULTS = {
  MODEL_NAME: 'sentence-transformers/paraphrase-multilingual-mpnet-base-v2' as const,
};

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  LEVEL: 'info' as const,
  PRETTY_PRINT: process.env.NODE_ENV !== 'production',
};
