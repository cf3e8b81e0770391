/**
 * Event Queue Service
 *
 * Bounded ingestion in front of the routing pipeline.
 *
 * Architecture:
 *   Redis configured → validate → enqueue job → acknowledge (202)
 *                      Worker → ingestEvent → retry / dead-letter
 *   otherwise        → inline ingestEvent, bounded by in-flight and waiting
 *                      limits; the caller hears back after the commit
 *
 * Features:
 *   - 3 attempts with exponential backoff
 *   - Dead-letter set: permanently failed jobs stay for inspection and retry
 *   - Concurrency limit: 5 per worker
 *   - QueueFullError when the waiting depth is reached
 *   - Graceful shutdown: drains in-flight work before exit
 */

import { createHash } from 'crypto';
import { Queue, Worker, Job } from 'bullmq';
import { AppError, InvalidEventError, QueueFullError } from '../utils/appError';
import { getConfig } from '../config';
import { parseRedisUrl } from '../utils/redis';
import { logger } from './observabilityService';
import { validateEvent } from './eventValidator';
import { BatchSummary, ingestBatch, ingestEvent, IngestResult, recordRejection } from './routingService';
import { getSignalStore } from './signalStore';

// ============================================================================
// TYPES
// ============================================================================

interface EventJobData {
    raw: unknown;
    dedupKey: string;
    receivedAt: string;
}

export interface QueuedResult {
    status: 'queued';
    jobId: string;
    dedupKey: string;
    commands: [];
}

export type SubmitResult = IngestResult | QueuedResult;

export interface QueueStatus {
    mode: 'queue' | 'inline';
    isRunning: boolean;
    activeCount: number;
    waitingCount: number;
    failedCount: number;
    completedCount: number;
    lastProcessedAt: Date | null;
    lastError: string | null;
}

export interface SubmitBatchResult {
    results: SubmitResult[];
    summary: BatchSummary & { queued: number };
}

export interface InlineLimits {
    maxInFlight: number;
    maxDepth: number;
}

export interface DeadLetterJob {
    jobId: string | undefined;
    dedupKey: string;
    receivedAt: string;
    error: string;
    attempts: number;
    failedAt: Date | null;
}

// ============================================================================
// QUEUE & WORKER INSTANCES
// ============================================================================

export const EVENT_QUEUE_NAME = 'lead-routing-events';
const WORKER_CONCURRENCY = 5;
const MAX_ATTEMPTS = 3;

let eventQueue: Queue<EventJobData> | null = null;
let eventWorker: Worker<EventJobData, SubmitResult> | null = null;
const queueStatus: QueueStatus = {
    mode: 'inline',
    isRunning: false,
    activeCount: 0,
    waitingCount: 0,
    failedCount: 0,
    completedCount: 0,
    lastProcessedAt: null,
    lastError: null
};

// Inline fallback
let limits: InlineLimits | null = null;
let inFlight = 0;
const waiters: Array<() => void> = [];
const drainWaiters: Array<() => void> = [];

function inlineLimits(): InlineLimits {
    if (!limits) {
        const { env } = getConfig();
        limits = { maxInFlight: env.INGEST_MAX_IN_FLIGHT, maxDepth: env.INGEST_QUEUE_MAX_DEPTH };
    }
    return limits;
}

/**
 * Override the inline limits (defaults come from INGEST_MAX_IN_FLIGHT and
 * INGEST_QUEUE_MAX_DEPTH).
 */
export function configureInlineLimits(next: InlineLimits): void {
    limits = { ...next };
}

// ============================================================================
// INITIALIZATION
// ============================================================================

/**
 * Initialize the event queue and worker.
 * Without REDIS_URL, submissions are processed inline.
 */
export function initEventQueue(): boolean {
    const redisUrl = getConfig().env.REDIS_URL;

    if (!redisUrl) {
        logger.warn('[QUEUE] REDIS_URL not set, processing events inline');
        queueStatus.mode = 'inline';
        queueStatus.isRunning = true;
        return false;
    }

    const connection = parseRedisUrl(redisUrl);

    eventQueue = new Queue<EventJobData>(EVENT_QUEUE_NAME, {
        connection,
        defaultJobOptions: {
            attempts: MAX_ATTEMPTS,
            backoff: { type: 'exponential', delay: 5000 },
            removeOnComplete: { count: 1000 },
            removeOnFail: false
        }
    });

    eventWorker = new Worker<EventJobData, SubmitResult>(EVENT_QUEUE_NAME, processEventJob, {
        connection,
        concurrency: WORKER_CONCURRENCY
    });

    eventWorker.on('completed', (job: Job<EventJobData, SubmitResult>) => {
        queueStatus.completedCount++;
        queueStatus.lastProcessedAt = new Date();
        logger.info('[QUEUE] Job completed', {
            jobId: job.id,
            dedupKey: job.data.dedupKey,
            status: job.returnvalue?.status
        });
    });

    eventWorker.on('failed', (job: Job<EventJobData, SubmitResult> | undefined, err: Error) => {
        if (!job) {
            logger.error('[QUEUE] Job failed without job context', err);
            return;
        }

        if (job.attemptsMade >= (job.opts.attempts ?? MAX_ATTEMPTS)) {
            queueStatus.failedCount++;
            queueStatus.lastError = err.message;
            logger.error('[DLQ] Event permanently failed after all retries', err, {
                jobId: job.id,
                dedupKey: job.data.dedupKey,
                attempts: job.attemptsMade
            });
        } else {
            logger.warn('[QUEUE] Job failed, will retry', {
                jobId: job.id,
                dedupKey: job.data.dedupKey,
                attempt: job.attemptsMade,
                error: err.message
            });
        }
    });

    eventWorker.on('error', (err: Error) => {
        logger.error('[QUEUE] Worker error', err);
    });

    queueStatus.mode = 'queue';
    queueStatus.isRunning = true;
    logger.info('[QUEUE] Event queue and worker initialized', {
        queue: EVENT_QUEUE_NAME,
        concurrency: WORKER_CONCURRENCY
    });
    return true;
}

// ============================================================================
// JOB PROCESSOR
// ============================================================================

async function processEventJob(job: Job<EventJobData, SubmitResult>): Promise<SubmitResult> {
    logger.info('[QUEUE] Processing event', {
        jobId: job.id,
        dedupKey: job.data.dedupKey,
        attempt: job.attemptsMade + 1
    });
    return ingestEvent(job.data.raw);
}

// ============================================================================
// SUBMISSION
// ============================================================================

function jobIdFor(dedupKey: string): string {
    return `event-${createHash('sha256').update(dedupKey).digest('hex').slice(0, 40)}`;
}

async function enqueue(queue: Queue<EventJobData>, raw: unknown): Promise<SubmitResult> {
    let dedupKey: string;
    try {
        dedupKey = validateEvent(raw, { clockSkewToleranceMs: getConfig().env.CLOCK_SKEW_TOLERANCE_MS }).dedupKey;
    } catch (err) {
        if (err instanceof InvalidEventError) {
            return recordRejection(raw, err, getSignalStore());
        }
        throw err;
    }

    const waiting = await queue.getWaitingCount();
    if (waiting >= inlineLimits().maxDepth) {
        logger.warn('[QUEUE] Ingestion queue full', { waiting });
        throw new QueueFullError(waiting);
    }

    const jobId = jobIdFor(dedupKey);
    await queue.add('ingest-event', { raw, dedupKey, receivedAt: new Date().toISOString() }, { jobId });
    return { status: 'queued', jobId, dedupKey, commands: [] };
}

function acquireSlot(): Promise<void> {
    const { maxInFlight, maxDepth } = inlineLimits();
    if (inFlight < maxInFlight) {
        inFlight++;
        return Promise.resolve();
    }
    if (waiters.length >= maxDepth) {
        logger.warn('[QUEUE] Inline ingestion saturated', { inFlight, waiting: waiters.length });
        throw new QueueFullError(waiters.length);
    }
    return new Promise<void>((resolve) => {
        waiters.push(resolve);
    });
}

function releaseSlot(): void {
    const next = waiters.shift();
    if (next) {
        // Hand the slot straight to the next waiter.
        next();
        return;
    }
    inFlight--;
    if (inFlight === 0) {
        drainWaiters.splice(0).forEach((resolve) => resolve());
    }
}

async function runInline(raw: unknown): Promise<SubmitResult> {
    await acquireSlot();
    queueStatus.activeCount = inFlight;
    try {
        const result = await ingestEvent(raw);
        queueStatus.completedCount++;
        queueStatus.lastProcessedAt = new Date();
        return result;
    } catch (err) {
        queueStatus.lastError = err instanceof Error ? err.message : String(err);
        throw err;
    } finally {
        releaseSlot();
        queueStatus.activeCount = inFlight;
    }
}

/**
 * Submit one raw event. With Redis the result is `queued` once the job is
 * stored; inline, the result is the pipeline's own.
 */
export async function submitEvent(raw: unknown): Promise<SubmitResult> {
    if (eventQueue) {
        return enqueue(eventQueue, raw);
    }
    return runInline(raw);
}

/**
 * Submit a batch. Queued mode enqueues item by item (a full queue fails the
 * remaining items, not the batch); inline mode runs the batch in one slot.
 */
export async function submitBatch(raws: unknown[]): Promise<SubmitBatchResult> {
    if (!eventQueue) {
        await acquireSlot();
        try {
            const { results, summary } = await ingestBatch(raws);
            return { results, summary: { ...summary, queued: 0 } };
        } finally {
            releaseSlot();
        }
    }

    const queue = eventQueue;
    const results: SubmitResult[] = [];
    for (const raw of raws) {
        try {
            results.push(await enqueue(queue, raw));
        } catch (err) {
            if (!(err instanceof AppError)) {
                throw err;
            }
            results.push({ status: 'failed', reason: err.message, code: err.code, retryable: err.retryable, commands: [] });
        }
    }

    const summary = { total: results.length, applied: 0, duplicate: 0, rejected: 0, failed: 0, transitions: 0, queued: 0 };
    for (const result of results) {
        summary[result.status]++;
    }
    return { results, summary };
}

// ============================================================================
// DLQ ADMIN OPERATIONS
// ============================================================================

export async function getDeadLetterJobs(limit = 50): Promise<DeadLetterJob[]> {
    if (!eventQueue) return [];

    const failed = await eventQueue.getFailed(0, Math.max(0, limit - 1));
    return failed.map((job) => ({
        jobId: job.id,
        dedupKey: job.data.dedupKey,
        receivedAt: job.data.receivedAt,
        error: job.failedReason,
        attempts: job.attemptsMade,
        failedAt: job.finishedOn ? new Date(job.finishedOn) : null
    }));
}

/**
 * Retry a specific failed job. False when the queue is off or the job is gone.
 */
export async function retryDeadLetterJob(jobId: string): Promise<boolean> {
    if (!eventQueue) return false;

    const job = await eventQueue.getJob(jobId);
    if (!job) return false;

    await job.retry();
    logger.info('[DLQ] Job retried', { jobId });
    return true;
}

// ============================================================================
// STATUS & SHUTDOWN
// ============================================================================

export async function getQueueStatus(): Promise<QueueStatus> {
    if (!eventQueue) {
        return { ...queueStatus, activeCount: inFlight, waitingCount: waiters.length };
    }

    try {
        const [active, waiting, failed, completed] = await Promise.all([
            eventQueue.getActiveCount(),
            eventQueue.getWaitingCount(),
            eventQueue.getFailedCount(),
            eventQueue.getCompletedCount()
        ]);

        return {
            ...queueStatus,
            activeCount: active,
            waitingCount: waiting,
            failedCount: failed,
            completedCount: completed
        };
    } catch (err) {
        logger.warn('[QUEUE] Could not read queue counts', { error: err instanceof Error ? err.message : String(err) });
        return { ...queueStatus };
    }
}

/**
 * Stop accepting work and wait for in-flight events to finish.
 */
export async function shutdownEventQueue(): Promise<void> {
    if (eventWorker) {
        logger.info('[QUEUE] Shutting down event worker...');
        await eventWorker.close();
        eventWorker = null;
    }

    if (eventQueue) {
        await eventQueue.close();
        eventQueue = null;
    }

    if (inFlight > 0) {
        logger.info('[QUEUE] Draining inline events', { inFlight });
        await new Promise<void>((resolve) => {
            drainWaiters.push(resolve);
        });
    }

    queueStatus.isRunning = false;
    logger.info('[QUEUE] Event queue shut down');
}
