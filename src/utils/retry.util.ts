import { logger } from '../config/logger';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
}

export interface IRetryUtil {
    executeWithRetry<T>(operation: () => Promise<T>, options?: RetryOptions): Promise<T>;
}

const RETRYABLE_CODES = new Set(['ECONNRESET', 'ENOTFOUND', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN']);
const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);
const RETRYABLE_FRAGMENTS = ['timeout', 'timed out', 'rate limit', 'quota', 'connection', 'network', 'overloaded'];

/**
 * Retry Utility
 *
 * Retries transient failures of model calls with exponential backoff.
 * Authentication and validation errors fail on the first attempt.
 */
export class RetryUtil {
    /**
     * Execute function with retry logic
     */
    static async executeWithRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
        const {
            maxAttempts = 3,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation'
        } = options;

        let lastError: unknown = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `Executing ${operationName} (attempt ${attempt}/${maxAttempts})`);

                const result = await operation();

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return result;

            } catch (error) {
                lastError = error;
                const retryable = RetryUtil.isRetryableError(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: describeError(error),
                    isRetryable: retryable
                }, `${operationName} failed on attempt ${attempt}`);

                if (attempt === maxAttempts) {
                    break;
                }

                if (!retryable) {
                    logger.error({
                        operation: operationName,
                        error: describeError(error)
                    }, `${operationName} failed with non-retryable error`);
                    break;
                }

                const delay = Math.min(
                    baseDelay * Math.pow(backoffMultiplier, attempt - 1),
                    maxDelay
                );

                logger.info({
                    operation: operationName,
                    attempt,
                    delay
                }, `Retrying ${operationName} in ${delay}ms`);

                await RetryUtil.sleep(delay);
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts,
            error: describeError(lastError)
        }, `${operationName} failed after retries`);

        if (lastError instanceof Error) {
            throw lastError;
        }
        throw new Error(`${operationName} failed after ${maxAttempts} attempts`);
    }

    /**
     * Network errors, timeouts, rate limits and 5xx responses are retryable.
     */
    static isRetryableError(error: unknown): boolean {
        if (typeof error !== 'object' || error === null) {
            return false;
        }

        if ('code' in error && typeof error.code === 'string' && RETRYABLE_CODES.has(error.code)) {
            return true;
        }

        if ('status' in error && typeof error.status === 'number') {
            return RETRYABLE_STATUSES.has(error.status);
        }

        const message = error instanceof Error ? error.message.toLowerCase() : '';
        return RETRYABLE_FRAGMENTS.some(fragment => message.includes(fragment));
    }

    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}

function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
