import {
    BaseError,
    EmbeddingError,
    ErrorCategory,
    ErrorHandler,
    GenerationError,
    IndexConfigurationError,
    PayloadTooLargeError,
    SearchError,
    SearchUnavailableError,
    SystemError,
    TimeoutError,
    UnsupportedFileTypeError,
    ValidationError
} from '../../utils/errors';
import { logger } from '../../utils/logger';

// Mock the logger to capture error logs
jest.mock('../../utils/logger', () => ({
    logger: {
        error: jest.fn(),
        getCorrelationId: jest.fn(() => 'test-correlation-id')
    }
}));

describe('Error Classes', () => {
    beforeEach(() => {
        jest.clearAllMocks();
    });

    describe('BaseError', () => {
        it('should create a base error with all required properties', () => {
            const error = new BaseError('Test error message', 'TEST_ERROR', ErrorCategory.SYSTEM, true, {
                operation: 'test-operation'
            });

            expect(error.message).toBe('Test error message');
            expect(error.code).toBe('TEST_ERROR');
            expect(error.category).toBe(ErrorCategory.SYSTEM);
            expect(error.retryable).toBe(true);
            expect(error.timestamp).toBeInstanceOf(Date);
            expect(error.correlationId).toBe('test-correlation-id');
            expect(error.context).toEqual({ operation: 'test-operation' });
            expect(error.name).toBe('BaseError');
            expect(error.statusCode).toBe(500);
        });

        it('should log error when created', () => {
            new BaseError('Test error', 'TEST_ERROR', ErrorCategory.PROCESSING, false, { documentId: 'doc-1' });

            expect(logger.error).toHaveBeenCalledWith('Test error', expect.objectContaining({
                errorCode: 'TEST_ERROR',
                errorCategory: ErrorCategory.PROCESSING,
                retryable: false,
                documentId: 'doc-1'
            }));
        });

        it('should serialize to JSON', () => {
            const error = new SearchError('Index query failed', 'hybridSearch');

            expect(error.toJSON()).toMatchObject({
                name: 'SearchError',
                message: 'Index query failed',
                code: 'SEARCH_ERROR',
                category: ErrorCategory.SEARCH,
                retryable: true,
                correlationId: 'test-correlation-id'
            });
        });
    });

    describe('subclasses', () => {
        it('should carry their HTTP status codes', () => {
            expect(new ValidationError('bad', 'field').statusCode).toBe(400);
            expect(new UnsupportedFileTypeError('.exe', ['.pdf', '.txt']).statusCode).toBe(400);
            expect(new PayloadTooLargeError(20, 10).statusCode).toBe(413);
            expect(new SearchUnavailableError('down', 'search').statusCode).toBe(503);
            expect(new IndexConfigurationError('wrong size', 'documents').statusCode).toBe(409);
            expect(new GenerationError('failed', 'gpt').statusCode).toBe(502);
            expect(new EmbeddingError('failed', 'embed', 10).statusCode).toBe(502);
            expect(new TimeoutError('slow', 'probe', 100).statusCode).toBe(504);
            expect(new SystemError('boom', 'core').statusCode).toBe(500);
        });

        it('should describe unsupported file types', () => {
            const error = new UnsupportedFileTypeError('.exe', ['.pdf', '.txt']);

            expect(error.message).toBe('Unsupported file type ".exe". Supported: .pdf, .txt');
        });
    });
});

describe('ErrorHandler', () => {
    beforeEach(() => {
        jest.clearAllMocks();
    });

    it('should wrap non-error values', () => {
        expect(ErrorHandler.toError('plain').message).toBe('plain');
        expect(ErrorHandler.toError({ reason: 'x' }).message).toBe('{"reason":"x"}');
    });

    it('should convert unknown errors into system errors', () => {
        const handled = ErrorHandler.handleError(new Error('unexpected'), 'upload');

        expect(handled).toBeInstanceOf(SystemError);
        expect(handled.message).toBe('unexpected');
    });

    it('should classify retryable errors', () => {
        expect(ErrorHandler.isRetryable(new SearchError('x', 'op'))).toBe(true);
        expect(ErrorHandler.isRetryable(new ValidationError('x'))).toBe(false);
        expect(ErrorHandler.isRetryable(new Error('connect ECONNREFUSED 127.0.0.1:6333'))).toBe(true);
        expect(ErrorHandler.isRetryable(new Error('bad input'))).toBe(false);
    });

    it('should map errors to status codes', () => {
        expect(ErrorHandler.getStatusCode(new SearchUnavailableError('down', 'search'))).toBe(503);
        expect(ErrorHandler.getStatusCode(new Error('plain'))).toBe(500);
    });

    it('should build error responses', () => {
        const response = ErrorHandler.createErrorResponse(new ValidationError('Missing message', 'message'), 'req-1');

        expect(response.error).toMatchObject({
            code: 'VALIDATION_ERROR',
            message: 'Missing message',
            category: ErrorCategory.VALIDATION,
            retryable: false,
            correlationId: 'req-1'
        });
        expect(response.error.details).toMatchObject({ field: 'message' });
    });
});
