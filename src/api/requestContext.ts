import { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';

declare global {
    namespace Express {
        interface Request {
            correlationId?: string;
            startTime?: number;
        }
    }
}

export const CORRELATION_HEADER = 'X-Correlation-ID';

export function getCorrelationId(req: Request): string {
    return req.correlationId ?? 'unknown';
}

/**
 * Assigns a correlation id (taken from the request header when present),
 * echoes it back and logs the request once the response has finished.
 */
export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
    const headerValue = req.get(CORRELATION_HEADER);
    const correlationId = headerValue && headerValue.length <= 128 ? headerValue : uuidv4();

    req.correlationId = correlationId;
    req.startTime = Date.now();
    res.setHeader(CORRELATION_HEADER, correlationId);

    const requestLogger = logger.child({ correlationId });
    res.on('finish', () => {
        requestLogger.info('Request completed', {
            method: req.method,
            path: req.originalUrl,
            statusCode: res.statusCode,
            duration: Date.now() - (req.startTime ?? Date.now())
        });
    });

    next();
}
