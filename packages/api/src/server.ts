import { createServer, type Server } from 'node:http';

import { serializeError, type Logger, type RuntimeResource } from '@synapse/core';
import type { Express } from 'express';

import type { SseEventStream } from './sse-stream';

export interface GatewayServerOptions {
    app: Express;
    events: SseEventStream;
    host: string;
    port: number;
    logger: Logger;
}

export class GatewayServer implements RuntimeResource {
    private server: Server | null = null;
    private readonly logger: Logger;

    constructor(private readonly options: GatewayServerOptions) {
        this.logger = options.logger.child({ component: 'gateway-server' });
    }

    /** The listening server, or null before `start()` and after `close()`. */
    public get httpServer(): Server | null {
        return this.server;
    }

    /** Bound address once listening, e.g. when started on port 0. */
    public get port(): number | null {
        const address = this.server?.address();
        return address && typeof address === 'object' ? address.port : null;
    }

    public async start(): Promise<void> {
        if (this.server) return;

        const server = createServer(this.options.app);
        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen(this.options.port, this.options.host, () => {
                server.removeListener('error', reject);
                resolve();
            });
        });
        server.on('error', this.handleError);
        this.server = server;
        this.logger.info({ host: this.options.host, port: this.port }, 'HTTP gateway listening');
    }

    public async close(): Promise<void> {
        const server = this.server;
        if (!server) return;
        this.server = null;

        this.options.events.close();
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
        server.removeListener('error', this.handleError);
        this.logger.info('HTTP gateway stopped');
    }

    private readonly handleError = (error: Error): void => {
        this.logger.error({ err: serializeError(error) }, 'HTTP gateway error');
    };
}
