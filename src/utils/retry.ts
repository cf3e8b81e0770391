/**
 * Retry with exponential backoff
 *
 * Used by the signal store for optimistic-version and serialization
 * conflicts. Delays double per attempt (with jitter) up to maxDelayMs. When
 * the budget runs out the last conflict becomes ConflictRetryExhaustedError;
 * any error the predicate does not accept is rethrown at once.
 */

import { ConflictRetryExhaustedError, VersionConflictError } from './appError';
import { logger } from '../services/observabilityService';

export interface RetryOptions {
    key: string;
    maxAttempts: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    jitterFactor?: number;
    isRetryable?: (err: unknown) => boolean;
}

const DEFAULT_BASE_DELAY_MS = 10;
const DEFAULT_MAX_DELAY_MS = 500;
const DEFAULT_JITTER = 0.5;

export function calculateDelay(
    attempt: number,
    baseDelayMs = DEFAULT_BASE_DELAY_MS,
    maxDelayMs = DEFAULT_MAX_DELAY_MS,
    jitterFactor = DEFAULT_JITTER
): number {
    const capped = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
    const jitter = capped * jitterFactor * Math.random();
    return Math.round(capped - jitter);
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

function isVersionConflict(err: unknown): boolean {
    return err instanceof VersionConflictError;
}

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const isRetryable = options.isRetryable ?? isVersionConflict;

    for (let attempt = 0; attempt < options.maxAttempts; attempt++) {
        try {
            return await operation(attempt);
        } catch (err) {
            if (!isRetryable(err)) {
                throw err;
            }
            if (attempt >= options.maxAttempts - 1) {
                break;
            }

            const delay = calculateDelay(attempt, options.baseDelayMs, options.maxDelayMs, options.jitterFactor);
            logger.warn('[STORE] Conflict, retrying with backoff', {
                key: options.key,
                attempt: attempt + 1,
                maxAttempts: options.maxAttempts,
                delay,
                error: err instanceof Error ? err.message : String(err)
            });
            await sleep(delay);
        }
    }

    logger.warn('[STORE] Retry budget exhausted', { key: options.key, attempts: options.maxAttempts });
    throw new ConflictRetryExhaustedError(options.key, options.maxAttempts);
}
