import { ErrorHandler } from './errors';
import { logger } from './logger';

export interface RetryOptions {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
    operation: string;
    shouldRetry: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxAttempts: 5,
    baseDelayMs: 1000,
    maxDelayMs: 20000,
    backoffMultiplier: 2,
    operation: 'operation',
    shouldRetry: (error: unknown) => ErrorHandler.isRetryable(error)
};

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Backoff before the retry that follows `attempt` (1-based), with up to 10% jitter.
 */
export function computeBackoff(attempt: number, options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>): number {
    const baseDelay = Math.min(
        options.baseDelayMs * Math.pow(options.backoffMultiplier, attempt - 1),
        options.maxDelayMs
    );
    return baseDelay + Math.random() * 0.1 * baseDelay;
}

/**
 * Execute an operation with retry logic.
 * The last error is rethrown unchanged once attempts run out or the error is not retryable.
 */
export async function withRetry<T>(
    operation: () => Promise<T>,
    options: Partial<RetryOptions> = {}
): Promise<T> {
    const retryConfig: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
    const maxAttempts = Math.max(1, retryConfig.maxAttempts);
    let attempt = 0;

    for (;;) {
        try {
            return await operation();
        } catch (error) {
            attempt++;

            if (attempt >= maxAttempts || !retryConfig.shouldRetry(error)) {
                throw error;
            }

            const delay = computeBackoff(attempt, retryConfig);

            logger.warn(`Retrying ${retryConfig.operation}`, {
                operation: retryConfig.operation,
                attempt,
                maxAttempts,
                delay,
                error: ErrorHandler.toError(error).message
            });

            retryConfig.onRetry?.(error, attempt, delay);
            await sleep(delay);
        }
    }
}
