import type { BusMessage, BusSubscription } from '@synapse/core';

/**
 * Unbounded single-consumer queue behind one in-memory subscription.
 * `push` never blocks; the iterator waits when the queue is empty and
 * finishes once `unsubscribe()` has been called and the buffer is drained.
 */
export class MessageQueueSubscription implements BusSubscription {
    private readonly buffer: BusMessage[] = [];
    private waiter: ((result: IteratorResult<BusMessage>) => void) | null = null;
    private closed = false;

    constructor(
        public readonly subject: string,
        private readonly onClose: (subscription: MessageQueueSubscription) => void
    ) { }

    public get isClosed(): boolean {
        return this.closed;
    }

    public push(message: BusMessage): void {
        if (this.closed) return;

        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve({ value: message, done: false });
            return;
        }
        this.buffer.push(message);
    }

    public unsubscribe(): void {
        if (this.closed) return;
        this.closed = true;
        this.buffer.length = 0;
        this.onClose(this);

        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve({ value: undefined, done: true });
        }
    }

    public [Symbol.asyncIterator](): AsyncIterator<BusMessage> {
        return {
            next: () => this.next(),
            return: async () => {
                this.unsubscribe();
                return { value: undefined, done: true };
            }
        };
    }

    private next(): Promise<IteratorResult<BusMessage>> {
        const message = this.buffer.shift();
        if (message) {
            return Promise.resolve({ value: message, done: false });
        }
        if (this.closed) {
            return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
            this.waiter = resolve;
        });
    }
}
