import { STREAM_DEFAULTS, errorMessage, generateId, type Logger } from '@synapse/core';
import type { BroadcastReceiver } from '@synapse/runtime';
import type { Request, Response } from 'express';

/** Anything that hands out broadcast receivers, e.g. `EventStreamBridge`. */
export interface BroadcastSource {
    subscribe(): BroadcastReceiver<string>;
}

export interface SseEventStreamOptions {
    source: BroadcastSource;
    logger: Logger;
    keepAliveMs?: number;
}

interface ConnectedClient {
    id: string;
    response: Response;
    receiver: BroadcastReceiver<string>;
    keepAlive: ReturnType<typeof setInterval>;
}

/**
 * Serves broadcast values as a Server-Sent Events stream, one receiver per
 * connection. Values are written as `data:` frames; a receiver that fell
 * behind gets an `event: lagged` frame carrying the skipped count and then
 * continues with the oldest retained value.
 *
 * Mount with `router.get('/events', stream.handleConnection.bind(stream))`.
 */
export class SseEventStream {
    private readonly clients = new Map<string, ConnectedClient>();
    private readonly logger: Logger;
    private readonly keepAliveMs: number;

    constructor(private readonly options: SseEventStreamOptions) {
        this.logger = options.logger.child({ component: 'sse' });
        this.keepAliveMs = options.keepAliveMs ?? STREAM_DEFAULTS.KEEP_ALIVE_MS;
    }

    public get clientCount(): number {
        return this.clients.size;
    }

    public handleConnection(_req: Request, res: Response): void {
        res.statusCode = 200;
        res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
        res.setHeader('Cache-Control', 'no-cache, no-transform');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');

        const id = generateId();
        const receiver = this.options.source.subscribe();
        const keepAlive = setInterval(() => {
            res.write(': keep-alive\n\n');
        }, this.keepAliveMs);
        keepAlive.unref();

        this.clients.set(id, { id, response: res, receiver, keepAlive });
        res.write(': connected\n\n');
        this.logger.info({ clientId: id, clients: this.clients.size }, 'SSE client connected');

        res.on('close', () => {
            this.disconnect(id);
        });

        void this.pump(id, receiver, res);
    }

    /** Ends every open stream. */
    public close(): void {
        for (const client of [...this.clients.values()]) {
            this.disconnect(client.id);
            client.response.end();
        }
    }

    private async pump(id: string, receiver: BroadcastReceiver<string>, res: Response): Promise<void> {
        try {
            for (;;) {
                const result = await receiver.recv();
                if (result.kind === 'closed') break;

                if (result.kind === 'lagged') {
                    this.logger.warn({ clientId: id, skipped: result.skipped }, 'SSE client lagged, events skipped');
                    await this.send(id, res, `event: lagged\ndata: ${JSON.stringify({ skipped: result.skipped })}\n\n`);
                } else if (result.kind === 'value') {
                    await this.send(id, res, `data: ${result.value}\n\n`);
                }
            }
        } catch (error) {
            this.logger.error({ clientId: id, err: errorMessage(error) }, 'SSE stream failed');
        }

        if (this.clients.has(id)) {
            this.disconnect(id);
            res.end();
        }
    }

    /**
     * Writes one frame. While the socket buffer is full the pump stops
     * reading, so a slow client falls behind in the channel and is told how
     * much it missed instead of buffering without bound.
     */
    private async send(id: string, res: Response, frame: string): Promise<void> {
        if (res.write(frame) || !this.clients.has(id)) return;

        await new Promise<void>((resolve) => {
            const settle = () => {
                res.removeListener('drain', settle);
                res.removeListener('close', settle);
                resolve();
            };
            res.once('drain', settle);
            res.once('close', settle);
        });
    }

    private disconnect(id: string): void {
        const client = this.clients.get(id);
        if (!client) return;

        this.clients.delete(id);
        clearInterval(client.keepAlive);
        client.receiver.close();
        this.logger.info({ clientId: id, clients: this.clients.size }, 'SSE client disconnected');
    }
}
