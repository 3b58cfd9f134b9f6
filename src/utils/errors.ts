import { LogContext, logger } from './logger';

export type { LogContext };

// Error categories for structured logging and tracking
export enum ErrorCategory {
    PROCESSING = 'processing',
    SEARCH = 'search',
    COMPLETION = 'completion',
    API = 'api',
    VALIDATION = 'validation',
    NETWORK = 'network',
    SYSTEM = 'system'
}

export interface ErrorResponse {
    error: {
        code: string;
        message: string;
        category: string;
        retryable: boolean;
        timestamp: string;
        correlationId: string;
        details?: object;
    };
}

// Base error class with structured logging support
export class BaseError extends Error {
    public readonly code: string;
    public readonly category: ErrorCategory;
    public readonly retryable: boolean;
    public readonly timestamp: Date;
    public readonly correlationId: string;
    public readonly context: LogContext;
    public readonly statusCode: number = 500;

    constructor(
        message: string,
        code: string,
        category: ErrorCategory,
        retryable: boolean = false,
        context: LogContext = {}
    ) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.category = category;
        this.retryable = retryable;
        this.timestamp = new Date();
        this.correlationId = logger.getCorrelationId();
        this.context = context;

        this.logError();
    }

    private logError(): void {
        logger.error(this.message, {
            errorCode: this.code,
            errorCategory: this.category,
            retryable: this.retryable,
            stackTrace: this.stack,
            ...this.context
        });
    }

    public toJSON(): object {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            category: this.category,
            retryable: this.retryable,
            timestamp: this.timestamp.toISOString(),
            correlationId: this.correlationId,
            context: this.context
        };
    }
}

export class ValidationError extends BaseError {
    public override readonly statusCode = 400;
    public readonly field?: string;
    public readonly value?: unknown;

    constructor(message: string, field?: string, value?: unknown, context: LogContext = {}) {
        super(message, 'VALIDATION_ERROR', ErrorCategory.VALIDATION, false, {
            ...context,
            field,
            value: typeof value === 'object' ? JSON.stringify(value) : value,
            errorType: 'validation_failure'
        });
        this.field = field;
        this.value = value;
    }
}

export class InvalidArgumentError extends BaseError {
    public override readonly statusCode = 400;
    public readonly argument: string;

    constructor(message: string, argument: string, context: LogContext = {}) {
        super(message, 'INVALID_ARGUMENT', ErrorCategory.VALIDATION, false, {
            ...context,
            argument,
            errorType: 'invalid_argument'
        });
        this.argument = argument;
    }
}

export class UnsupportedFileTypeError extends BaseError {
    public override readonly statusCode = 400;
    public readonly extension: string;

    constructor(extension: string, supported: string[], context: LogContext = {}) {
        super(
            `Unsupported file type "${extension || '(none)'}". Supported: ${supported.join(', ')}`,
            'UNSUPPORTED_FILE_TYPE',
            ErrorCategory.VALIDATION,
            false,
            { ...context, extension, errorType: 'unsupported_file_type' }
        );
        this.extension = extension;
    }
}

export class PayloadTooLargeError extends BaseError {
    public override readonly statusCode = 413;
    public readonly size: number;
    public readonly limit: number;

    constructor(size: number, limit: number, context: LogContext = {}) {
        super(`Payload of ${size} bytes exceeds the ${limit} byte limit`, 'PAYLOAD_TOO_LARGE', ErrorCategory.VALIDATION, false, {
            ...context,
            size,
            limit,
            errorType: 'payload_too_large'
        });
        this.size = size;
        this.limit = limit;
    }
}

export class DocumentNotFoundError extends BaseError {
    public override readonly statusCode = 404;
    public readonly documentId: string;

    constructor(documentId: string, context: LogContext = {}) {
        super(`Document "${documentId}" not found`, 'DOCUMENT_NOT_FOUND', ErrorCategory.API, false, {
            ...context,
            documentId,
            errorType: 'document_not_found'
        });
        this.documentId = documentId;
    }
}

export class TimeoutError extends BaseError {
    public override readonly statusCode = 504;
    public readonly timeoutMs: number;
    public readonly operation: string;

    constructor(message: string, operation: string, timeoutMs: number, context: LogContext = {}) {
        super(message, 'TIMEOUT_ERROR', ErrorCategory.NETWORK, true, {
            ...context,
            operation,
            timeoutMs,
            errorType: 'timeout'
        });
        this.timeoutMs = timeoutMs;
        this.operation = operation;
    }
}

export class ParseError extends BaseError {
    public override readonly statusCode = 400;
    public readonly sourceType: string;

    constructor(message: string, sourceType: string, context: LogContext = {}) {
        super(message, 'PARSE_ERROR', ErrorCategory.PROCESSING, false, {
            ...context,
            sourceType,
            errorType: 'parse_failure'
        });
        this.sourceType = sourceType;
    }
}

// Search errors
export class SearchError extends BaseError {
    public readonly operation: string;

    constructor(message: string, operation: string, context: LogContext = {}) {
        super(message, 'SEARCH_ERROR', ErrorCategory.SEARCH, true, {
            ...context,
            operation,
            errorType: 'search_failure'
        });
        this.operation = operation;
    }
}

export class SearchUnavailableError extends BaseError {
    public override readonly statusCode = 503;
    public readonly operation: string;

    constructor(message: string, operation: string, context: LogContext = {}) {
        super(message, 'SEARCH_UNAVAILABLE', ErrorCategory.NETWORK, true, {
            ...context,
            operation,
            errorType: 'search_unreachable'
        });
        this.operation = operation;
    }
}

export class IndexConfigurationError extends BaseError {
    public override readonly statusCode = 409;
    public readonly collection: string;

    constructor(message: string, collection: string, context: LogContext = {}) {
        super(message, 'INDEX_CONFIGURATION_ERROR', ErrorCategory.SEARCH, false, {
            ...context,
            collection,
            errorType: 'index_configuration'
        });
        this.collection = collection;
    }
}

// Completion errors
export class EmbeddingError extends BaseError {
    public override readonly statusCode = 502;
    public readonly modelName: string;
    public readonly textLength: number;

    constructor(
        message: string,
        modelName: string,
        textLength: number,
        context: LogContext = {}
    ) {
        super(message, 'EMBEDDING_ERROR', ErrorCategory.COMPLETION, true, {
            ...context,
            modelName,
            textLength,
            errorType: 'embedding_generation_failure'
        });
        this.modelName = modelName;
        this.textLength = textLength;
    }
}

export class GenerationError extends BaseError {
    public override readonly statusCode = 502;
    public readonly modelName: string;

    constructor(message: string, modelName: string, context: LogContext = {}) {
        super(message, 'GENERATION_ERROR', ErrorCategory.COMPLETION, true, {
            ...context,
            modelName,
            errorType: 'generation_failure'
        });
        this.modelName = modelName;
    }
}

// System errors
export class SystemError extends BaseError {
    public readonly component: string;
    public readonly systemInfo?: object;

    constructor(
        message: string,
        component: string,
        systemInfo?: object,
        context: LogContext = {}
    ) {
        super(message, 'SYSTEM_ERROR', ErrorCategory.SYSTEM, false, {
            ...context,
            component,
            systemInfo,
            errorType: 'system_failure'
        });
        this.component = component;
        this.systemInfo = systemInfo;
    }
}

const RETRYABLE_NETWORK_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND'];

export class ErrorHandler {
    public static toError(error: unknown): Error {
        if (error instanceof Error) {
            return error;
        }
        return new Error(typeof error === 'string' ? error : JSON.stringify(error));
    }

    public static handleError(error: unknown, operation: string, context: LogContext = {}): BaseError {
        if (error instanceof BaseError) {
            return error;
        }

        const err = ErrorHandler.toError(error);
        return new SystemError(
            err.message,
            operation,
            { originalError: err.name },
            { ...context, operation, originalErrorName: err.name }
        );
    }

    public static isRetryable(error: unknown): boolean {
        if (error instanceof BaseError) {
            return error.retryable;
        }
        const err = ErrorHandler.toError(error);
        return RETRYABLE_NETWORK_CODES.some(code => err.message.includes(code));
    }

    public static getStatusCode(error: unknown): number {
        return error instanceof BaseError ? error.statusCode : 500;
    }

    public static createErrorResponse(error: unknown, correlationId?: string): ErrorResponse {
        const baseError = ErrorHandler.handleError(error, 'unknown');

        return {
            error: {
                code: baseError.code,
                message: baseError.message,
                category: baseError.category,
                retryable: baseError.retryable,
                timestamp: baseError.timestamp.toISOString(),
                correlationId: correlationId || baseError.correlationId,
                details: baseError.context
            }
        };
    }
}
