import { calculateDelay, withRetry } from '../src/utils/retry';
import { ConflictRetryExhaustedError, VersionConflictError } from '../src/utils/appError';

jest.mock('../src/services/observabilityService', () => ({
    logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() }
}));

describe('withRetry', () => {
    const fast = { key: 'lead-1', baseDelayMs: 1, maxDelayMs: 1 };

    it('should retry version conflicts until the operation succeeds', async () => {
        const operation = jest.fn(async (attempt: number) => {
            if (attempt < 2) throw new VersionConflictError('lead-1');
            return 'done';
        });

        await expect(withRetry(operation, { ...fast, maxAttempts: 5 })).resolves.toBe('done');
        expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should give up with a retryable error once the budget is spent', async () => {
        const operation = jest.fn(async () => {
            throw new VersionConflictError('lead-1');
        });

        const err = await withRetry(operation, { ...fast, maxAttempts: 3 }).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(ConflictRetryExhaustedError);
        expect(err).toMatchObject({ attempts: 3, retryable: true, code: 'CONFLICT_RETRY_EXHAUSTED', statusCode: 503 });
        expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should rethrow other errors at once', async () => {
        const operation = jest.fn(async () => {
            throw new Error('disk on fire');
        });

        await expect(withRetry(operation, { ...fast, maxAttempts: 5 })).rejects.toThrow('disk on fire');
        expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should double the delay up to the cap', () => {
        expect(calculateDelay(0, 10, 500, 0)).toBe(10);
        expect(calculateDelay(3, 10, 500, 0)).toBe(80);
        expect(calculateDelay(10, 10, 500, 0)).toBe(500);
    });
});
