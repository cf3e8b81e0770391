/**
 * Operational Error Classes
 *
 * Used to distinguish between operational errors (invalid input, contention,
 * storage outages) and programming errors (bugs). Always use these for
 * expected failures; the error middleware maps them to HTTP responses.
 */

export type ErrorCode =
    | 'INVALID_EVENT'
    | 'ILLEGAL_TRANSITION'
    | 'CONFLICT_RETRY_EXHAUSTED'
    | 'STORE_UNAVAILABLE'
    | 'QUEUE_FULL'
    | 'NOT_FOUND'
    | 'SWEEP_IN_PROGRESS'
    | 'UNAUTHORIZED';

export class AppError extends Error {
    public readonly statusCode: number;
    public readonly isOperational: boolean;
    public readonly code: ErrorCode;
    public readonly retryable: boolean;

    constructor(message: string, statusCode: number, code: ErrorCode, retryable = false) {
        super(message);
        this.name = new.target.name;
        this.statusCode = statusCode;
        this.isOperational = true;
        this.code = code;
        this.retryable = retryable;

        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Malformed input, rejected before any state change. The caller must fix it.
 */
export class InvalidEventError extends AppError {
    public readonly details: string[];

    constructor(message: string, details: string[] = []) {
        super(message, 422, 'INVALID_EVENT');
        this.details = details;
    }
}

/**
 * The executor was asked to move a lead backward, or out of crm automatically.
 * A data-integrity alarm, never retried.
 */
export class IllegalTransitionError extends AppError {
    public readonly fromPlatform: string;
    public readonly toPlatform: string;

    constructor(fromPlatform: string, toPlatform: string, message?: string) {
        super(message ?? `Illegal transition ${fromPlatform} -> ${toPlatform}`, 409, 'ILLEGAL_TRANSITION');
        this.fromPlatform = fromPlatform;
        this.toPlatform = toPlatform;
    }
}

/**
 * Contention on a hot lead exceeded the retry budget.
 */
export class ConflictRetryExhaustedError extends AppError {
    public readonly attempts: number;

    constructor(leadKey: string, attempts: number) {
        super(`Lead ${leadKey} stayed contended after ${attempts} attempts`, 503, 'CONFLICT_RETRY_EXHAUSTED', true);
        this.attempts = attempts;
    }
}

/**
 * Durability layer down. Ingestion fails closed.
 */
export class StoreUnavailableError extends AppError {
    constructor(message = 'Signal store unavailable', cause?: unknown) {
        super(message, 503, 'STORE_UNAVAILABLE', true);
        if (cause instanceof Error) {
            this.stack = `${this.stack}\nCaused by: ${cause.stack ?? cause.message}`;
        }
    }
}

/**
 * Ingestion queue at capacity.
 */
export class QueueFullError extends AppError {
    public readonly retryAfterSeconds: number;

    constructor(depth: number, retryAfterSeconds = 5) {
        super(`Ingestion queue full (${depth} waiting)`, 503, 'QUEUE_FULL', true);
        this.retryAfterSeconds = retryAfterSeconds;
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 404, 'NOT_FOUND');
    }
}

export class SweepInProgressError extends AppError {
    constructor() {
        super('A reconciliation sweep is already running', 409, 'SWEEP_IN_PROGRESS', true);
    }
}

/**
 * Optimistic version check failed on commit, or the database reported a
 * serialization failure or deadlock. Internal to the store; retried and
 * surfaced as ConflictRetryExhaustedError.
 */
export class VersionConflictError extends Error {
    public readonly key: string;

    constructor(key: string, message?: string) {
        super(message ?? `Version conflict on ${key}`);
        this.name = 'VersionConflictError';
        this.key = key;
    }
}
