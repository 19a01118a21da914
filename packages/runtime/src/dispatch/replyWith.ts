import { encodeEnvelope, type BusMessage, type Logger, type MessageBus } from '@synapse/core';

/**
 * Publishes `envelope` to the request's reply subject. Returns false when
 * the request carried none.
 */
export async function replyWith(
  bus: MessageBus,
  request: BusMessage,
  envelope: unknown,
  logger: Logger,
): Promise<boolean> {
  if (!request.replyTo) {
    logger.warn({ subject: request.subject }, 'Request has no reply subject, dropping reply');
    return false;
  }

  await bus.publish(request.replyTo, encodeEnvelope(envelope));
  return true;
}
