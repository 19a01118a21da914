export type RecvResult<T> =
  | { kind: 'value'; value: T }
  | { kind: 'lagged'; skipped: number }
  | { kind: 'empty' }
  | { kind: 'closed' };

interface ReceiverSource<T> {
  read(cursor: number): { result: RecvResult<T>; cursor: number };
  detach(receiver: BroadcastReceiver<T>): void;
}

/**
 * Single-producer, multi-consumer ring buffer. `send` never blocks: once
 * `capacity` newer values exist, the oldest is overwritten and receivers
 * still pointing at it are told how many values they missed.
 */
export class BroadcastChannel<T> {
  public readonly capacity: number;
  private readonly slots: Array<{ value: T } | undefined>;
  private readonly receivers = new Set<BroadcastReceiver<T>>();
  /** Sequence number of the next value to be sent. */
  private head = 0;
  private closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Broadcast capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<{ value: T } | undefined>(capacity).fill(undefined);
  }

  public get receiverCount(): number {
    return this.receivers.size;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /** Stores `value` and wakes waiting receivers. Returns how many receivers are attached. */
  public send(value: T): number {
    if (this.closed) {
      throw new Error('Cannot send on a closed broadcast channel');
    }

    this.slots[this.head % this.capacity] = { value };
    this.head += 1;
    for (const receiver of this.receivers) {
      receiver.wake();
    }
    return this.receivers.size;
  }

  /** A receiver that sees every value sent from now on. */
  public subscribe(): BroadcastReceiver<T> {
    const receiver = new BroadcastReceiver<T>(this.head, {
      read: (cursor) => this.read(cursor),
      detach: (detached) => {
        this.receivers.delete(detached);
      },
    });
    if (this.closed) {
      receiver.close();
      return receiver;
    }
    this.receivers.add(receiver);
    return receiver;
  }

  /** Receivers drain what is retained and then report `closed`. */
  public close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const receiver of this.receivers) {
      receiver.wake();
    }
  }

  private read(cursor: number): { result: RecvResult<T>; cursor: number } {
    const oldest = Math.max(0, this.head - this.capacity);
    if (cursor < oldest) {
      return { result: { kind: 'lagged', skipped: oldest - cursor }, cursor: oldest };
    }
    if (cursor < this.head) {
      const slot = this.slots[cursor % this.capacity];
      if (slot) {
        return { result: { kind: 'value', value: slot.value }, cursor: cursor + 1 };
      }
    }
    return { result: this.closed ? { kind: 'closed' } : { kind: 'empty' }, cursor };
  }
}

export class BroadcastReceiver<T> {
  private waiter: (() => void) | null = null;
  private detached = false;

  constructor(
    private cursor: number,
    private readonly source: ReceiverSource<T>,
  ) {}

  public tryRecv(): RecvResult<T> {
    if (this.detached) {
      return { kind: 'closed' };
    }
    const { result, cursor } = this.source.read(this.cursor);
    this.cursor = cursor;
    return result;
  }

  /** Waits for the next value, lag notice or close. */
  public async recv(): Promise<RecvResult<T>> {
    for (;;) {
      const result = this.tryRecv();
      if (result.kind !== 'empty') {
        return result;
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  public close(): void {
    if (this.detached) return;
    this.detached = true;
    this.source.detach(this);
    this.wake();
  }

  /** Called by the channel after a send or close. */
  public wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
