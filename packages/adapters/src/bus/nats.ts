import {
    TimeoutError,
    TransportError,
    errorMessage,
    type BusMessage,
    type BusSubscription,
    type Logger,
    type MessageBus,
    type PublishOptions,
    type RequestOptions
} from '@synapse/core';
import { ErrorCode, NatsError, connect, type Msg, type NatsConnection, type Subscription } from 'nats';

export interface NatsMessageBusOptions {
    servers: string | string[];
    /** Connection name shown in the server's monitoring endpoints. */
    name?: string;
    logger: Logger;
}

/**
 * MessageBus over a single shared NATS connection.
 */
export class NatsMessageBus implements MessageBus {
    private connection: NatsConnection | null = null;
    private readonly logger: Logger;

    constructor(private readonly options: NatsMessageBusOptions) {
        this.logger = options.logger.child({ component: 'nats-bus' });
    }

    public async start(): Promise<void> {
        if (this.connection) return;

        this.logger.info({ servers: this.options.servers }, 'Connecting to NATS');
        try {
            this.connection = await connect({ servers: this.options.servers, name: this.options.name });
        } catch (error) {
            throw new TransportError(`Failed to connect to NATS at ${String(this.options.servers)}: ${errorMessage(error)}`, { cause: error });
        }
        this.logger.info({ server: this.connection.getServer() }, 'Connected to NATS');

        void this.connection.closed().then((error) => {
            if (error) {
                this.logger.error({ err: errorMessage(error) }, 'NATS connection closed with error');
            } else {
                this.logger.info('NATS connection closed');
            }
        });
    }

    public async close(): Promise<void> {
        const connection = this.connection;
        if (!connection) return;
        this.connection = null;
        await connection.drain();
    }

    public async publish(subject: string, data: Uint8Array, options: PublishOptions = {}): Promise<void> {
        const connection = this.requireConnection();
        try {
            connection.publish(subject, data, options.replyTo ? { reply: options.replyTo } : undefined);
        } catch (error) {
            throw new TransportError(`Failed to publish to ${subject}: ${errorMessage(error)}`, { cause: error });
        }
    }

    public subscribe(subject: string): BusSubscription {
        const subscription = this.requireConnection().subscribe(subject);
        return {
            subject,
            unsubscribe: () => subscription.unsubscribe(),
            [Symbol.asyncIterator]: () => toBusMessages(subscription)
        };
    }

    public async request(subject: string, data: Uint8Array, options: RequestOptions): Promise<BusMessage> {
        const connection = this.requireConnection();
        try {
            const reply = await connection.request(subject, data, { timeout: options.timeoutMs });
            return fromNatsMsg(reply);
        } catch (error) {
            if (error instanceof NatsError && error.code === ErrorCode.Timeout) {
                throw new TimeoutError(`Request on ${subject}`, options.timeoutMs);
            }
            if (error instanceof NatsError && error.code === ErrorCode.NoResponders) {
                throw new TransportError(`No responders available for request on ${subject}`, { cause: error });
            }
            throw new TransportError(`Request on ${subject} failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    private requireConnection(): NatsConnection {
        if (!this.connection || this.connection.isClosed()) {
            throw new TransportError('NATS connection is not open');
        }
        return this.connection;
    }
}

function fromNatsMsg(msg: Msg): BusMessage {
    return { subject: msg.subject, data: msg.data, replyTo: msg.reply || undefined };
}

async function* toBusMessages(subscription: Subscription): AsyncGenerator<BusMessage> {
    for await (const msg of subscription) {
        yield fromNatsMsg(msg);
    }
}
