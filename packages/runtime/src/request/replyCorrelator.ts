import {
  RemoteError,
  TimeoutError,
  encodeEnvelope,
  errorMessage,
  safeDecodeEnvelope,
  serializeError,
  type BusMessage,
  type EnvelopeSchema,
  type Logger,
  type MessageBus,
  type RemoteReply,
} from '@synapse/core';

export type QueryError =
  | { kind: 'timeout'; timeoutMs: number; message: string }
  | { kind: 'transport'; message: string }
  | { kind: 'decode'; message: string }
  | { kind: 'remote'; message: string };

export type QueryResult<T> = { ok: true; value: T } | { ok: false; error: QueryError };

export interface RequestWithTimeoutInput<T> {
  subject: string;
  payload: unknown;
  schema: EnvelopeSchema<T>;
  /** Reply envelope type name used in decode errors. */
  envelopeName: string;
  timeoutMs: number;
}

/**
 * Request/reply over the bus with a deadline. Each call gets its own reply
 * subject from the bus, so concurrent calls never see each other's replies.
 * A late reply is discarded; the remote side is not cancelled.
 */
export class ReplyCorrelator {
  private readonly logger: Logger;

  constructor(private readonly bus: MessageBus, logger: Logger) {
    this.logger = logger.child({ component: 'reply-correlator' });
  }

  public async requestWithTimeout<T extends RemoteReply>(input: RequestWithTimeoutInput<T>): Promise<QueryResult<T>> {
    const { subject, timeoutMs } = input;

    let reply: BusMessage;
    try {
      reply = await this.bus.request(subject, encodeEnvelope(input.payload), { timeoutMs });
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.logger.warn({ subject, timeoutMs }, 'Request timed out');
        return { ok: false, error: { kind: 'timeout', timeoutMs, message: error.message } };
      }
      this.logger.error({ subject, err: errorMessage(error) }, 'Request failed');
      return { ok: false, error: { kind: 'transport', message: errorMessage(error) } };
    }

    const decoded = safeDecodeEnvelope(input.schema, reply.data, input.envelopeName);
    if (!decoded.ok) {
      this.logger.error({ subject, err: decoded.error.message }, 'Undecodable reply');
      return { ok: false, error: { kind: 'decode', message: decoded.error.message } };
    }

    const remoteMessage = decoded.value.error_message;
    if (typeof remoteMessage === 'string') {
      const error = new RemoteError(subject, remoteMessage);
      this.logger.warn({ subject, err: serializeError(error) }, 'Remote service reported an error');
      return { ok: false, error: { kind: 'remote', message: error.message } };
    }

    return { ok: true, value: decoded.value };
  }
}
