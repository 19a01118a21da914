import { API_DEFAULTS, errorMessage, type Logger } from '@synapse/core';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';

import { createCorsMiddleware, createGatewayApi, type GatewayApiOptions } from './middleware';

export interface GatewayAppOptions extends GatewayApiOptions {
    /** Extra allowed origin prefixes on top of localhost and 127.0.0.1. */
    corsOrigins?: string[];
}

function statusOf(error: unknown): number {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return 500;
}

/** Full express application with the gateway mounted under `/api`. */
export function createGatewayApp(options: GatewayAppOptions): Express {
    const app = express();
    const logger: Logger = options.logger.child({ component: 'http' });

    app.disable('x-powered-by');
    app.use(createCorsMiddleware([...API_DEFAULTS.CORS_ORIGIN_PREFIXES, ...(options.corsOrigins ?? [])]));
    app.use(express.json({ limit: '1mb' }));
    app.use('/api', createGatewayApi(options));

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ message: 'Not found', task_id: null });
    });

    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const status = statusOf(error);
        if (status >= 400 && status < 500) {
            logger.warn({ err: errorMessage(error), status }, 'Rejected malformed request');
            res.status(status).json({ message: 'Malformed request body', task_id: null });
            return;
        }
        logger.error({ err: errorMessage(error) }, 'Unhandled request error');
        res.status(500).json({ message: 'Internal server error', task_id: null });
    });

    return app;
}
