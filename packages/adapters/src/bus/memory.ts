import {
    INBOX_PREFIX,
    TransportError,
    generateId,
    withTimeout,
    type BusMessage,
    type BusSubscription,
    type MessageBus,
    type PublishOptions,
    type RequestOptions
} from '@synapse/core';

import { MessageQueueSubscription } from './messageQueue';
import { subjectMatches } from './subjectMatch';

/**
 * In-process bus with NATS subject semantics. Every process component can
 * share one instance; tests use it in place of a NATS server.
 */
export class InMemoryMessageBus implements MessageBus {
    private readonly subscriptions = new Set<MessageQueueSubscription>();
    private closed = false;

    public async start(): Promise<void> {
        this.closed = false;
    }

    public async close(): Promise<void> {
        this.closed = true;
        for (const subscription of [...this.subscriptions]) {
            subscription.unsubscribe();
        }
    }

    public async publish(subject: string, data: Uint8Array, options: PublishOptions = {}): Promise<void> {
        if (this.closed) {
            throw new TransportError(`Cannot publish to ${subject}: bus is closed`);
        }

        const message: BusMessage = { subject, data, replyTo: options.replyTo };
        for (const subscription of this.subscriptions) {
            if (subjectMatches(subscription.subject, subject)) {
                subscription.push(message);
            }
        }
    }

    public subscribe(subject: string): BusSubscription {
        const subscription = new MessageQueueSubscription(subject, (closed) => {
            this.subscriptions.delete(closed);
        });
        if (this.closed) {
            subscription.unsubscribe();
            return subscription;
        }
        this.subscriptions.add(subscription);
        return subscription;
    }

    public async request(subject: string, data: Uint8Array, options: RequestOptions): Promise<BusMessage> {
        if (!this.hasSubscribers(subject)) {
            throw new TransportError(`No responders available for request on ${subject}`);
        }

        const inbox = this.subscribe(`${INBOX_PREFIX}.${generateId()}`);
        try {
            await this.publish(subject, data, { replyTo: inbox.subject });
            return await withTimeout({
                label: `Request on ${subject}`,
                timeoutMs: options.timeoutMs,
                run: () => firstMessage(inbox)
            });
        } finally {
            inbox.unsubscribe();
        }
    }

    /** Number of live subscriptions matching `subject`. */
    public subscriberCount(subject: string): number {
        let count = 0;
        for (const subscription of this.subscriptions) {
            if (subjectMatches(subscription.subject, subject)) count++;
        }
        return count;
    }

    private hasSubscribers(subject: string): boolean {
        return this.subscriberCount(subject) > 0;
    }
}

async function firstMessage(subscription: BusSubscription): Promise<BusMessage> {
    const next = await subscription[Symbol.asyncIterator]().next();
    if (next.done) {
        throw new TransportError(`Reply subscription ${subscription.subject} closed before a reply arrived`);
    }
    return next.value;
}
