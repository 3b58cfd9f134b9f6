import compression from 'compression';
import cors from 'cors';
import express, { Application, json, NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import { Server } from 'http';
import { SystemConfig } from '../models/config';
import { ServiceContainer } from '../services';
import {
    BaseError,
    ErrorCategory,
    ErrorHandler,
    ErrorResponse,
    PayloadTooLargeError,
    ValidationError
} from '../utils/errors';
import { logger } from '../utils/logger';
import { createRateLimiters } from './middleware/rateLimit';
import { getCorrelationId, requestContextMiddleware } from './requestContext';
import { createChatRoutes } from './routes/chat';
import { createDocumentRoutes } from './routes/documents';
import { createHealthRoutes } from './routes/health';

function numericProperty(value: unknown, key: string): number | undefined {
    if (typeof value !== 'object' || value === null || !(key in value)) {
        return undefined;
    }
    const property: unknown = Reflect.get(value, key);
    return typeof property === 'number' ? property : undefined;
}

function stringProperty(value: unknown, key: string): string | undefined {
    if (typeof value !== 'object' || value === null || !(key in value)) {
        return undefined;
    }
    const property: unknown = Reflect.get(value, key);
    return typeof property === 'string' ? property : undefined;
}

/**
 * Maps body-parser failures onto the application's error types so that every
 * error response has the same shape.
 */
export function toApiError(error: unknown): BaseError {
    if (error instanceof BaseError) {
        return error;
    }

    const type = stringProperty(error, 'type');
    if (type === 'entity.too.large') {
        return new PayloadTooLargeError(numericProperty(error, 'length') ?? 0, numericProperty(error, 'limit') ?? 0);
    }
    if (type === 'entity.parse.failed') {
        return new ValidationError('Malformed request body', 'body');
    }

    return ErrorHandler.handleError(error, 'request');
}

export class ApiGateway {
    private app: Application;
    private server?: Server;
    private readonly services: ServiceContainer;
    private readonly config: SystemConfig;

    constructor(services: ServiceContainer, config: SystemConfig) {
        this.app = express();
        this.services = services;
        this.config = config;
        this.setupMiddleware();
        this.setupRoutes();
        this.setupErrorHandling();
    }

    private setupMiddleware(): void {
        const { cors: corsConfig } = this.config.server;

        this.app.disable('x-powered-by');
        this.app.use(helmet());

        if (corsConfig.enabled) {
            this.app.use(cors({
                origin: corsConfig.origins.includes('*') ? true : corsConfig.origins,
                methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
                allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-ID'],
                credentials: true,
                maxAge: 86400
            }));
        }

        this.app.use(compression({
            filter: (req, res) => {
                if (req.headers['x-no-compression']) {
                    return false;
                }
                // Buffering would hold back server-sent events
                if (String(res.getHeader('Content-Type') ?? '').startsWith('text/event-stream')) {
                    return false;
                }
                return compression.filter(req, res);
            },
            threshold: 1024
        }));

        this.app.use(json({ limit: '1mb', type: ['application/json'] }));
        this.app.use(requestContextMiddleware);
    }

    private setupRoutes(): void {
        const { documentService, healthCheckService, ragService, completionGateway } = this.services;
        const limiters = createRateLimiters(this.config.server.rateLimit);
        const api = express.Router();

        api.use('/health', createHealthRoutes(healthCheckService));

        api.use(limiters.general);
        api.use('/chat', createChatRoutes(
            { ragService, completionGateway },
            {
                enableStreaming: this.config.server.enableStreaming,
                maxTopK: this.config.rag.maxTopK,
                rateLimiter: limiters.chat
            }
        ));
        api.use('/documents', createDocumentRoutes(documentService, {
            maxUploadBytes: this.config.server.maxUploadBytes,
            uploadRateLimiter: limiters.upload
        }));

        this.app.use('/api', api);

        this.app.get('/', (_req: Request, res: Response) => {
            res.json({
                name: 'Grounded Answer Service API',
                version: '1.0.0',
                status: 'running',
                timestamp: new Date().toISOString(),
                endpoints: {
                    health: '/api/health',
                    chat: '/api/chat',
                    chatStream: '/api/chat/stream',
                    documents: '/api/documents'
                }
            });
        });

        this.app.use('*', (req: Request, res: Response) => {
            const error: ErrorResponse = {
                error: {
                    code: 'ROUTE_NOT_FOUND',
                    message: `Route ${req.method} ${req.originalUrl} not found`,
                    category: ErrorCategory.API,
                    retryable: false,
                    timestamp: new Date().toISOString(),
                    correlationId: getCorrelationId(req)
                }
            };
            res.status(404).json(error);
        });
    }

    private setupErrorHandling(): void {
        this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
            if (res.headersSent) {
                next(error);
                return;
            }

            const apiError = toApiError(error);
            const statusCode = ErrorHandler.getStatusCode(apiError);

            logger.warn('Request failed', {
                correlationId: getCorrelationId(req),
                method: req.method,
                path: req.originalUrl,
                statusCode,
                errorCode: apiError.code
            });

            res.status(statusCode).json(ErrorHandler.createErrorResponse(apiError, getCorrelationId(req)));
        });
    }

    public async start(): Promise<Server> {
        const { port, host, timeout } = this.config.server;

        return new Promise((resolve, reject) => {
            const server = this.app.listen(port, host, () => {
                logger.info('API server started', { host, port });
                resolve(server);
            });
            server.setTimeout(timeout);

            server.on('error', (error: Error) => {
                if (stringProperty(error, 'code') === 'EADDRINUSE') {
                    logger.error(`Port ${port} is already in use`, { port });
                }
                reject(error);
            });

            this.server = server;
        });
    }

    public async stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return;
        }

        await new Promise<void>((resolve, reject) => {
            server.close(error => (error ? reject(error) : resolve()));
        });
        this.server = undefined;
        logger.info('API server stopped');
    }

    public getApp(): Application {
        return this.app;
    }
}
