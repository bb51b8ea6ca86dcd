/**
 * Express Server Configuration and Routes
 *
 * HTTP layer of the assistant:
 * - POST   /api/query          answer a question within a session
 * - POST   /api/ingest         add or replace a document
 * - GET    /api/documents      list documents, newest first
 * - DELETE /api/documents/:id  remove a document
 * - GET    /api/stats          counts by language and category
 * - GET    /api/health         readiness and knowledge-base counts
 *
 * Request bodies are checked with zod before they reach the services.
 * Errors from the services carry an ErrorCode and are mapped to HTTP
 * statuses by the error middleware.
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { z } from 'zod';
import {
    DocumentListResponse,
    ErrorResponse,
    IngestResponse,
    QueryResponse,
} from '../../shared/types';
import { Assistant } from '../assistant';
import { AssistantError, ErrorCode, RequestCancelledError } from '../errors';
import { logger } from '../logger';
import { validateQuery } from '../services/queryProcessor';

/**
 * Server configuration options.
 */
export interface ServerConfig {
    /** Port to listen on */
    port: number;
    /** CORS origin (default: allow all) */
    corsOrigin: string;
}

/**
 * Default server configuration.
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = {
    port: 3001,
    corsOrigin: '*',
};

/**
 * Error raised inside route handlers, with the HTTP status to answer with.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code: string = 'INTERNAL_ERROR',
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

// ============================================================================
// Request schemas
// ============================================================================

export const queryBodySchema = z.object({
    session_id: z.string().trim().min(1).max(200),
    text: z.string().nullish(),
    language: z.enum(['nb', 'en']).optional(),
});

export const ingestBodySchema = z.object({
    document_id: z.string().max(500),
    text: z.string(),
    language: z.string(),
    category: z.string(),
    title: z.string().optional(),
    tags: z.array(z.string()).optional(),
});

export const listQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(1000).default(100),
});

function parseBody<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body: unknown,
    message = 'Invalid request body'
): T {
    const result = schema.safeParse(body);
    if (!result.success) {
        throw new ApiError(message, 400, 'INVALID_REQUEST', {
            issues: result.error.issues.map((issue) => ({
                path: issue.path.join('.'),
                message: issue.message,
            })),
        });
    }
    return result.data;
}

/**
 * HTTP status for a service error.
 */
export function statusForError(error: AssistantError): number {
    switch (error.code) {
        case ErrorCode.INVALID_QUERY:
        case ErrorCode.MALFORMED_DOCUMENT:
            return 400;
        case ErrorCode.DOCUMENT_TOO_SHORT:
        case ErrorCode.UNSUPPORTED_LANGUAGE:
            return 422;
        case ErrorCode.REQUEST_CANCELLED:
            return 499;
        case ErrorCode.EMBEDDING_FAILED:
            return 502;
        case ErrorCode.INDEX_UNAVAILABLE:
            return 503;
        case ErrorCode.RETRIEVAL_TIMEOUT:
            return 504;
        case ErrorCode.INDEX_CORRUPTED:
            return 500;
    }
}

/**
 * Signal that fires when the client goes away before the response is sent.
 */
function disconnectSignal(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableFinished) {
            controller.abort();
        }
    });
    return controller.signal;
}

/**
 * Creates and configures the Express application.
 *
 * Creating the app without listening keeps it usable from tests.
 */
export function createApp(assistant: Assistant, config: Partial<ServerConfig> = {}): Express {
    const mergedConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
    const app = express();

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: mergedConfig.corsOrigin,
            methods: ['GET', 'POST', 'DELETE'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    // Documents arrive inline as JSON
    app.use(express.json({ limit: '10mb' }));

    app.use((req: Request, _res: Response, next: NextFunction) => {
        logger.debug(`${req.method} ${req.path}`);
        next();
    });

    // =========================================================================
    // Health Endpoint
    // =========================================================================

    /**
     * GET /api/health
     *
     * 503 until the index is loaded, so load balancers hold traffic back
     * during startup.
     */
    app.get('/api/health', (_req: Request, res: Response) => {
        const health = assistant.health();
        res.status(health.status === 'ok' ? 200 : 503).json(health);
    });

    /**
     * GET /api/stats
     */
    app.get('/api/stats', (_req: Request, res: Response) => {
        res.json(assistant.stats());
    });

    // =========================================================================
    // Query Endpoint
    // =========================================================================

    /**
     * POST /api/query
     *
     * Answers a question. Follow-up questions in the same session may refer
     * back to earlier answers ("what about that?").
     */
    app.post('/api/query', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = parseBody(queryBodySchema, req.body);

            const validation = validateQuery(body.text);
            if (!validation.valid || !body.text) {
                throw new ApiError(validation.error ?? 'Query is required', 400, ErrorCode.INVALID_QUERY);
            }

            const outcome = await assistant.query({
                sessionId: body.session_id,
                text: body.text,
                language: body.language,
                signal: disconnectSignal(res),
            });

            const response: QueryResponse = {
                session_id: outcome.sessionId,
                text: outcome.answer.text,
                cited_chunk_ids: outcome.answer.citedChunkIds,
                confidence: outcome.answer.confidence,
                intent: outcome.intent.kind,
            };
            res.json(response);
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Document Endpoints
    // =========================================================================

    /**
     * POST /api/ingest
     *
     * Adds a document, replacing any earlier document with the same id.
     * Chunks that could not be embedded are reported in skipped_chunk_ids.
     */
    app.post('/api/ingest', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = parseBody(ingestBodySchema, req.body);
            const result = await assistant.ingest(
                {
                    id: body.document_id,
                    text: body.text,
                    language: body.language,
                    category: body.category,
                    title: body.title,
                    tags: body.tags,
                },
                disconnectSignal(res)
            );

            const response: IngestResponse = {
                document_id: result.documentId,
                chunk_ids: result.chunkIds,
                skipped_chunk_ids: result.skipped.map((skipped) => skipped.chunkId),
            };
            res.status(201).json(response);
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /api/documents?limit=100
     *
     * Lists stored documents, newest first. `total` counts every document,
     * not only the listed ones.
     */
    app.get('/api/documents', (req: Request, res: Response, next: NextFunction) => {
        try {
            const { limit } = parseBody(listQuerySchema, req.query, 'Invalid query parameters');
            const response: DocumentListResponse = {
                total: assistant.documents.counts().documents,
                documents: assistant.listDocuments(limit).map((document) => ({
                    document_id: document.id,
                    title: document.title ?? null,
                    language: document.language,
                    category: document.category,
                    tags: document.tags,
                    chunk_count: assistant.documents.listChunks(document.id).length,
                    ingested_at: document.ingestedAt.toISOString(),
                })),
            };
            res.json(response);
        } catch (error) {
            next(error);
        }
    });

    /**
     * DELETE /api/documents/:id
     *
     * Removes a document with its chunks and vectors. Removing an unknown id
     * is not an error.
     */
    app.delete('/api/documents/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const removed = await assistant.removeDocument(req.params.id);
            res.json({ removed });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Error Handling Middleware
    // =========================================================================

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof RequestCancelledError) {
            logger.debug('Request cancelled by client');
            if (!res.headersSent) res.status(statusForError(err)).end();
            return;
        }

        let status = 500;
        let body: ErrorResponse = { error: 'Internal server error', code: 'INTERNAL_ERROR' };

        if (err instanceof ApiError) {
            status = err.statusCode;
            body = { error: err.message, code: err.code, details: err.details };
        } else if (err instanceof AssistantError) {
            status = statusForError(err);
            body = { error: err.message, code: err.code, details: err.details };
        } else if (err instanceof SyntaxError) {
            // Raised by the JSON body parser
            status = 400;
            body = { error: 'Request body is not valid JSON', code: 'INVALID_JSON' };
        }

        if (status >= 500) {
            logger.error('Request failed:', err);
        } else {
            logger.debug(`Request rejected (${status} ${body.code}): ${body.error}`);
        }
        res.status(status).json(body);
    });

    return app;
}

/**
 * Starts listening. Resolves with the HTTP server once it accepts
 * connections; port 0 picks a free port.
 */
export function startServer(app: Express, port: number = DEFAULT_SERVER_CONFIG.port): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port);
        server.once('listening', () => {
            const address = server.address();
            const boundPort = typeof address === 'object' && address ? address.port : port;
            logger.info(`Assistant server running on port ${boundPort}`);
            logger.info(`Health check: http://localhost:${boundPort}/api/health`);
            resolve(server);
        });
        server.once('error', reject);
    });
}

/**
 * Creates the app and starts listening on `config.port`.
 */
export async function createServer(
    assistant: Assistant,
    config: Partial<ServerConfig> = {}
): Promise<Server> {
    const app = createApp(assistant, config);
    return startServer(app, config.port ?? DEFAULT_SERVER_CONFIG.port);
}
