import {
    ApiSearchRequestSchema,
    GenerateTextTaskSchema,
    ValidationError,
    describeIssues,
    errorMessage,
    type ApiSearchRequest,
    type Logger,
    type MessageBus
} from '@synapse/core';
import { submitGeneration, submitUrl, type SearchOutcome } from '@synapse/runtime';
import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { z } from 'zod';

import type { SseEventStream } from './sse-stream';

export interface GatewayApiOptions {
    bus: MessageBus;
    logger: Logger;
    search: { search(request: ApiSearchRequest): Promise<SearchOutcome> };
    events: SseEventStream;
    /** Reported by `/health`. */
    serviceName?: string;
}

interface ApiResponse {
    message: string;
    task_id: string | null;
}

// Range checks live in ingress and the orchestrator so clients get their
// specific messages; the body schemas only check shape.
const SubmitUrlBodySchema = z.object({ url: z.string() });
const GenerateTextBodySchema = GenerateTextTaskSchema.extend({ max_length: z.number() });
const SearchBodySchema = ApiSearchRequestSchema.extend({ top_k: z.number() });

function searchStatus(outcome: SearchOutcome): number {
    if (!outcome.failure) return 200;
    if (outcome.failure.hop === 'input') return 400;
    if (outcome.failure.kind === 'timeout' || outcome.failure.kind === 'transport') return 503;
    return 500;
}

function malformed(res: Response, error: z.ZodError): void {
    const body: ApiResponse = { message: `Invalid request body: ${describeIssues(error)}`, task_id: null };
    res.status(400).json(body);
}

/**
 * Creates the gateway router: URL and generation submission, semantic
 * search, the generated-text event stream and a health check. Mount it
 * under `/api`.
 */
export function createGatewayApi(options: GatewayApiOptions): Router {
    const router = Router();
    const logger = options.logger.child({ component: 'gateway' });

    router.get('/health', (_req, res) => {
        res.json({ status: 'ok', service: options.serviceName ?? 'api' });
    });

    router.post('/submit-url', async (req, res) => {
        const parsed = SubmitUrlBodySchema.safeParse(req.body);
        if (!parsed.success) {
            malformed(res, parsed.error);
            return;
        }

        try {
            const task = await submitUrl(options.bus, parsed.data, logger);
            const body: ApiResponse = {
                message: `Task to scrape URL '${task.url}' submitted successfully.`,
                task_id: null
            };
            res.status(200).json(body);
        } catch (error) {
            if (error instanceof ValidationError) {
                logger.warn({ field: error.field }, error.message);
                res.status(400).json({ message: error.message, task_id: null } satisfies ApiResponse);
                return;
            }
            logger.error({ err: errorMessage(error) }, 'Failed to publish url task');
            res.status(500).json({ message: 'Failed to publish task to processing queue', task_id: null } satisfies ApiResponse);
        }
    });

    router.post('/generate-text', async (req, res) => {
        const parsed = GenerateTextBodySchema.safeParse(req.body);
        if (!parsed.success) {
            malformed(res, parsed.error);
            return;
        }

        const task = parsed.data;
        try {
            await submitGeneration(options.bus, task, logger);
            const body: ApiResponse = {
                message: `Text generation task (id: ${task.task_id}) submitted successfully.`,
                task_id: task.task_id
            };
            res.status(200).json(body);
        } catch (error) {
            if (error instanceof ValidationError) {
                logger.warn({ field: error.field, taskId: task.task_id }, error.message);
                const taskId = error.field === 'task_id' ? null : task.task_id;
                res.status(400).json({ message: error.message, task_id: taskId } satisfies ApiResponse);
                return;
            }
            logger.error({ err: errorMessage(error), taskId: task.task_id }, 'Failed to publish generation task');
            res.status(500).json({
                message: 'Failed to publish generation task to queue',
                task_id: task.task_id
            } satisfies ApiResponse);
        }
    });

    router.post('/search/semantic', async (req, res) => {
        const parsed = SearchBodySchema.safeParse(req.body);
        if (!parsed.success) {
            malformed(res, parsed.error);
            return;
        }

        const outcome = await options.search.search(parsed.data);
        res.status(searchStatus(outcome)).json(outcome.response);
    });

    router.get('/events', (req, res) => {
        options.events.handleConnection(req, res);
    });

    return router;
}

/**
 * Sets `Access-Control-Allow-Origin` for origins that start with one of
 * `originPrefixes` and answers preflight requests.
 */
export function createCorsMiddleware(originPrefixes: readonly string[]): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const origin = req.headers.origin;
        if (origin && originPrefixes.some((prefix) => origin.startsWith(prefix))) {
            res.setHeader('Access-Control-Allow-Origin', origin);
            res.setHeader('Vary', 'Origin');
            res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
            res.setHeader('Access-Control-Allow-Headers', 'Authorization, Accept, Content-Type');
            res.setHeader('Access-Control-Max-Age', '3600');
        }

        if (req.method === 'OPTIONS') {
            res.status(204).end();
            return;
        }
        next();
    };
}
