import { Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';
import { ServerConfig } from '../../models/config';
import { ErrorCategory, ErrorResponse } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { getCorrelationId } from '../requestContext';

interface RateLimitConfig {
    windowMs: number;
    max: number;
    message: string;
}

export interface RateLimiters {
    general: RequestHandler;
    chat: RequestHandler;
    upload: RequestHandler;
}

const isTest = () => process.env.NODE_ENV === 'test';

/**
 * Create rate limiter with custom configuration
 */
export function createRateLimiter(config: RateLimitConfig): RequestHandler {
    return rateLimit({
        windowMs: config.windowMs,
        max: config.max,
        standardHeaders: true,
        legacyHeaders: false,
        keyGenerator: (req: Request) => req.ip || 'unknown',
        handler: (req: Request, res: Response) => {
            const correlationId = getCorrelationId(req);
            const retryAfter = Math.ceil(config.windowMs / 1000);

            logger.warn('Rate limit exceeded', {
                correlationId,
                path: req.originalUrl,
                ip: req.ip,
                limit: config.max
            });

            const errorResponse: ErrorResponse = {
                error: {
                    code: 'RATE_LIMIT_EXCEEDED',
                    message: config.message,
                    category: ErrorCategory.API,
                    retryable: true,
                    timestamp: new Date().toISOString(),
                    correlationId,
                    details: {
                        limit: config.max,
                        windowMs: config.windowMs,
                        retryAfter
                    }
                }
            };

            res.status(429).json(errorResponse);
        }
    });
}

/**
 * General limiter from configuration; chat and upload get tighter per-minute
 * windows since each request costs provider calls.
 */
export function createRateLimiters(config: ServerConfig['rateLimit']): RateLimiters {
    return {
        general: createRateLimiter({
            windowMs: config.windowMs,
            max: isTest() ? 10000 : config.maxRequests,
            message: 'Too many requests from this IP, please try again later'
        }),
        chat: createRateLimiter({
            windowMs: 60 * 1000,
            max: isTest() ? 10000 : 20,
            message: 'Too many chat requests, please try again later'
        }),
        upload: createRateLimiter({
            windowMs: 5 * 60 * 1000,
            max: isTest() ? 10000 : 10,
            message: 'Too many upload requests, please try again later'
        })
    };
}
