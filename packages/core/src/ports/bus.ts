import type { RuntimeResource } from '../lifecycle';

export interface BusMessage {
  subject: string;
  data: Uint8Array;
  /** Ephemeral reply subject, present when the sender expects exactly one reply. */
  replyTo?: string | undefined;
}

/**
 * A live subscription. Iterating yields every message published on the
 * subject after the subscription was created; iteration ends after
 * `unsubscribe()` or when the underlying connection closes.
 */
export interface BusSubscription extends AsyncIterable<BusMessage> {
  readonly subject: string;
  unsubscribe(): void;
}

export interface PublishOptions {
  replyTo?: string;
}

export interface RequestOptions {
  timeoutMs: number;
}

/**
 * Subject-addressed publish/subscribe bus.
 *
 * Delivery is at-most-once, unordered and best-effort: no acknowledgement
 * and no redelivery. One instance is shared by every component of a process
 * and must tolerate concurrent use from many handlers.
 */
export interface MessageBus extends RuntimeResource {
  /** Rejects with `TransportError` when the connection cannot take the message. */
  publish(subject: string, data: Uint8Array, options?: PublishOptions): Promise<void>;

  subscribe(subject: string): BusSubscription;

  /**
   * Publishes with a fresh reply subject and resolves with the first reply.
   * Rejects with `TimeoutError` when no reply arrives within `timeoutMs`,
   * and with `TransportError` for connection failures or when nobody is
   * subscribed to `subject`.
   */
  request(subject: string, data: Uint8Array, options: RequestOptions): Promise<BusMessage>;
}
