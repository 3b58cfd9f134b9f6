import { v4 as uuidv4 } from 'uuid';
import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
    correlationId?: string;
    queryId?: string;
    documentId?: string;
    operation?: string;
    duration?: number;
    errorCode?: string;
    errorCategory?: string;
    stackTrace?: string;
    [key: string]: unknown;
}

export interface StructuredLogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    correlationId: string;
    service: string;
    context: LogContext;
}

export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
    child(context: LogContext): Logger;
    setCorrelationId(correlationId: string): void;
    getCorrelationId(): string;
}

function createConsoleTransport() {
    return new winston.transports.Console({
        format: winston.format.combine(
            winston.format.colorize(),
            winston.format.printf((info) => {
                const correlationId = String(info.correlationId ?? '');
                const contextStr = info.context ? ` ${JSON.stringify(info.context)}` : '';
                return `[${String(info.timestamp)}] [${correlationId.substring(0, 8)}] ${info.level}: ${String(info.message)}${contextStr}`;
            })
        )
    });
}

class StructuredLogger implements Logger {
    private winston: winston.Logger;
    private correlationId: string;
    private serviceName: string;

    constructor(serviceName: string = 'grounded-answer-service', winstonLogger?: winston.Logger) {
        this.serviceName = serviceName;
        this.correlationId = uuidv4();

        this.winston = winstonLogger ?? winston.createLogger({
            level: process.env.LOG_LEVEL || 'info',
            silent: process.env.LOG_SILENT === 'true',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json()
            ),
            transports: process.env.LOG_FILE
                ? [createConsoleTransport(), new winston.transports.File({ filename: process.env.LOG_FILE })]
                : [createConsoleTransport()]
        });
    }

    private enrichContext(context: LogContext = {}): LogContext {
        return {
            ...context,
            correlationId: context.correlationId || this.correlationId,
            service: this.serviceName,
            timestamp: new Date().toISOString()
        };
    }

    private write(level: LogLevel, message: string, context?: LogContext): void {
        const enriched = this.enrichContext(context);
        this.winston.log(level, message, {
            correlationId: enriched.correlationId,
            context: enriched
        });
    }

    debug(message: string, context?: LogContext): void {
        this.write('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.write('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.write('warn', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.write('error', message, context);
    }

    /**
     * Child loggers share the winston instance but carry their own correlation id.
     */
    child(context: LogContext): Logger {
        const childLogger = new StructuredLogger(this.serviceName, this.winston);
        childLogger.correlationId = context.correlationId || this.correlationId;
        return childLogger;
    }

    setCorrelationId(correlationId: string): void {
        this.correlationId = correlationId;
    }

    getCorrelationId(): string {
        return this.correlationId;
    }
}

export const logger = new StructuredLogger();

export { StructuredLogger };
