import {
  errorMessage,
  previewPayload,
  safeDecodeEnvelope,
  type BusMessage,
  type DecodeError,
  type EnvelopeSchema,
  type Logger,
  type MessageBus,
} from '@synapse/core';

export interface RunDispatchLoopInput<T> {
  bus: MessageBus;
  subject: string;
  schema: EnvelopeSchema<T>;
  /** Envelope type name used in decode errors, e.g. `RawText`. */
  envelopeName: string;
  logger: Logger;
  handle(envelope: T, message: BusMessage): Promise<void>;
  /** Upper bound on concurrently running handlers. Unbounded when omitted. */
  maxConcurrent?: number | undefined;
  onError?(error: unknown, envelope: T, message: BusMessage): void;
  /** Lets request/reply workers answer an undecodable request instead of leaving the caller to time out. */
  onDecodeError?(error: DecodeError, message: BusMessage): Promise<void> | void;
  onOverload?(envelope: T, message: BusMessage): Promise<void> | void;
}

export interface DispatchLoopHandle {
  readonly subject: string;
  /** Handlers currently running. */
  readonly inFlightCount: number;
  /** Resolves once the subscription has ended. Never rejects. */
  readonly done: Promise<void>;
  stop(): void;
  /** Resolves once every handler started so far has settled. */
  drain(): Promise<void>;
}

/**
 * Subscribes to `subject` and runs `handle` for every decodable message
 * without waiting for it to finish, so one slow or stuck handler never
 * holds up the next message. Failures stay with the message that caused
 * them.
 */
export function runDispatchLoop<T>(input: RunDispatchLoopInput<T>): DispatchLoopHandle {
  const logger = input.logger.child({ subject: input.subject });
  const maxConcurrent = input.maxConcurrent ?? Number.POSITIVE_INFINITY;
  const subscription = input.bus.subscribe(input.subject);
  const pending = new Set<Promise<void>>();
  let inFlight = 0;

  const track = (task: Promise<void>): void => {
    const tracked = task.finally(() => {
      pending.delete(tracked);
    });
    pending.add(tracked);
  };

  const runHandler = async (envelope: T, message: BusMessage): Promise<void> => {
    inFlight += 1;
    try {
      await input.handle(envelope, message);
    } catch (error) {
      logger.error({ err: errorMessage(error) }, `Failed to process ${input.envelopeName}`);
      notify(() => input.onError?.(error, envelope, message), 'onError');
    } finally {
      inFlight -= 1;
    }
  };

  const runHook = async (hook: () => Promise<void> | void, name: string): Promise<void> => {
    try {
      await hook();
    } catch (error) {
      logger.error({ err: errorMessage(error), hook: name }, 'Dispatch hook failed');
    }
  };

  const notify = (hook: () => void, name: string): void => {
    try {
      hook();
    } catch (error) {
      logger.error({ err: errorMessage(error), hook: name }, 'Dispatch hook failed');
    }
  };

  const dispatch = (message: BusMessage): void => {
    const decoded = safeDecodeEnvelope(input.schema, message.data, input.envelopeName);
    if (!decoded.ok) {
      logger.warn(
        { err: decoded.error.message, payload: previewPayload(message.data) },
        `Dropping undecodable ${input.envelopeName}`,
      );
      const onDecodeError = input.onDecodeError;
      if (onDecodeError) {
        track(runHook(() => onDecodeError(decoded.error, message), 'onDecodeError'));
      }
      return;
    }

    if (inFlight >= maxConcurrent) {
      logger.warn({ inFlight, maxConcurrent }, `Handler limit reached, dropping ${input.envelopeName}`);
      const onOverload = input.onOverload;
      if (onOverload) {
        track(runHook(() => onOverload(decoded.value, message), 'onOverload'));
      }
      return;
    }

    track(runHandler(decoded.value, message));
  };

  const done = (async () => {
    logger.info(`Listening on ${input.subject}`);
    try {
      for await (const message of subscription) {
        dispatch(message);
      }
    } catch (error) {
      logger.error({ err: errorMessage(error) }, 'Subscription ended with error');
    }
    logger.info(`Stopped listening on ${input.subject}`);
  })();

  return {
    subject: input.subject,
    get inFlightCount() {
      return inFlight;
    },
    done,
    stop: () => subscription.unsubscribe(),
    drain: async () => {
      while (pending.size > 0) {
        await Promise.all([...pending]);
      }
    },
  };
}
