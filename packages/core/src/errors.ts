/**
 * Error taxonomy shared by every package.
 *
 * Decode and handler failures stay local to one message. Timeout, transport
 * and remote failures on request/reply calls are surfaced to the caller as
 * values, see `QueryError` in @synapse/runtime. Validation failures are raised
 * before anything touches the bus.
 */

export class DecodeError extends Error {
  public readonly label: string;

  public constructor(label: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to decode ${label}: ${message}`, options);
    this.name = 'DecodeError';
    this.label = label;
  }
}

export class TransportError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class RemoteError extends Error {
  public readonly hop: string;

  public constructor(hop: string, message: string) {
    super(message);
    this.name = 'RemoteError';
    this.hop = hop;
  }
}

export class ValidationError extends Error {
  public readonly field: string;

  public constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Flattens an unknown thrown value into something a structured logger can serialize. */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}
