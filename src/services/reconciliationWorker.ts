/**
 * Reconciliation Worker
 *
 * Periodic sweep that re-derives routing decisions for every aggregate and
 * executes the ones the event path missed (a crash between commit and
 * decision, or a configuration change such as a lower high-water mark).
 *
 * Safety rules:
 *   - Goes through the transition executor, so the same decision is never
 *     committed twice and commands are never emitted twice
 *   - Forward only, like every automated transition
 *   - One sweep at a time; an AbortSignal stops it between leads and the
 *     returned cursor resumes it
 */

import { getConfig, resolveEngineConfig, EngineConfig } from '../config';
import { SweepInProgressError } from '../utils/appError';
import { logger } from './observabilityService';
import { decideTransition, RECONCILIATION_TRIGGER, rescoreAt } from './routingDecisionService';
import { executeTransition } from './stateTransitionService';
import { getSignalStore, leadKeyFor, SignalStore } from './signalStore';

// ============================================================================
// TYPES
// ============================================================================

export interface ReconcileOptions {
    signal?: AbortSignal;
    batchSize?: number;
    asOf?: Date;
    cursor?: string | null;
    store?: SignalStore;
    config?: EngineConfig;
}

export interface ReconcileResult {
    processed: number;
    transitioned: number;
    skipped: number;
    errors: number;
    cursor: string | null;
    completed: boolean;
    aborted: boolean;
}

interface WorkerStatus {
    running: boolean;
    sweepInProgress: boolean;
    lastRunAt: Date | null;
    lastError: string | null;
    totalTransitioned: number;
    lastResult: ReconcileResult | null;
}

// ============================================================================
// STATE
// ============================================================================

let workerInterval: NodeJS.Timeout | null = null;
let activeSweep: AbortController | null = null;
let workerStatus: WorkerStatus = {
    running: false,
    sweepInProgress: false,
    lastRunAt: null,
    lastError: null,
    totalTransitioned: 0,
    lastResult: null
};

// ============================================================================
// SWEEP
// ============================================================================

/**
 * Walk aggregates in id order starting after `cursor`.
 */
export async function runReconciliation(options: ReconcileOptions = {}): Promise<ReconcileResult> {
    const store = options.store ?? getSignalStore();
    const { env } = getConfig();
    const config = resolveEngineConfig(options.config);
    const batchSize = options.batchSize ?? env.RECONCILE_BATCH_SIZE;
    const asOf = options.asOf ?? new Date();

    const result: ReconcileResult = {
        processed: 0,
        transitioned: 0,
        skipped: 0,
        errors: 0,
        cursor: options.cursor ?? null,
        completed: false,
        aborted: false
    };

    const startTime = Date.now();
    logger.info('[RECONCILE] Starting sweep', { cursor: result.cursor, batchSize });

    sweep: for (;;) {
        if (options.signal?.aborted) {
            result.aborted = true;
            break;
        }

        const page = await store.listSignals({ afterId: result.cursor, limit: batchSize });
        if (page.length === 0) {
            result.completed = true;
            break;
        }

        for (const snapshot of page) {
            if (options.signal?.aborted) {
                result.aborted = true;
                break sweep;
            }

            result.processed++;
            const leadKey = leadKeyFor({ leadId: snapshot.lead_id ?? undefined, email: snapshot.email ?? undefined });
            const decision = decideTransition(
                snapshot.current_platform,
                rescoreAt(snapshot, asOf, config),
                RECONCILIATION_TRIGGER,
                asOf,
                config
            );

            if (!decision) {
                result.skipped++;
            } else {
                try {
                    const executed = await executeTransition(decision, { store });
                    if (executed) {
                        result.transitioned++;
                    } else {
                        result.skipped++;
                    }
                } catch (err) {
                    result.errors++;
                    logger.error('[RECONCILE] Error reconciling lead', err, { leadKey, decisionId: decision.decisionId });
                }
            }

            result.cursor = snapshot.id;
        }

        if (page.length < batchSize) {
            result.completed = true;
            break;
        }
    }

    logger.info('[RECONCILE] Sweep finished', { ...result, durationMs: Date.now() - startTime });
    return result;
}

// ============================================================================
// WORKER LIFECYCLE
// ============================================================================

type SweepRequest = Pick<ReconcileOptions, 'batchSize' | 'asOf' | 'cursor' | 'store' | 'config'>;

/**
 * One sweep under the one-at-a-time guard. Throws SweepInProgressError when
 * another sweep holds it.
 */
async function runGuardedSweep(request: SweepRequest): Promise<ReconcileResult> {
    if (activeSweep) {
        throw new SweepInProgressError();
    }

    activeSweep = new AbortController();
    workerStatus.sweepInProgress = true;
    try {
        const result = await runReconciliation({ ...request, signal: activeSweep.signal });
        workerStatus = {
            ...workerStatus,
            lastRunAt: new Date(),
            lastError: null,
            totalTransitioned: workerStatus.totalTransitioned + result.transitioned,
            lastResult: result
        };
        return result;
    } catch (err) {
        workerStatus.lastError = err instanceof Error ? err.message : String(err);
        workerStatus.lastRunAt = new Date();
        throw err;
    } finally {
        activeSweep = null;
        workerStatus.sweepInProgress = false;
    }
}

async function runScheduledSweep(): Promise<void> {
    if (activeSweep) {
        logger.warn('[RECONCILE] Previous sweep still running, skipping this tick');
        return;
    }
    try {
        await runGuardedSweep({});
    } catch (err) {
        logger.error('[RECONCILE] Sweep failed', err);
    }
}

/**
 * Start the periodic sweep (RECONCILE_INTERVAL_MS).
 */
export function startReconciliationWorker(intervalMs: number = getConfig().env.RECONCILE_INTERVAL_MS): void {
    if (workerInterval) {
        logger.warn('[RECONCILE] Worker already running');
        return;
    }

    workerInterval = setInterval(() => {
        runScheduledSweep().catch((err: unknown) => logger.error('[RECONCILE] Unexpected sweep failure', err));
    }, intervalMs);
    workerStatus.running = true;

    logger.info('[RECONCILE] Worker started', { intervalMs });
}

/**
 * Stop the schedule and abort a sweep in progress (it stops between leads).
 */
export function stopReconciliationWorker(): void {
    if (workerInterval) {
        clearInterval(workerInterval);
        workerInterval = null;
    }
    activeSweep?.abort();
    workerStatus.running = false;
    logger.info('[RECONCILE] Worker stopped');
}

/**
 * Run one sweep now, outside the schedule. Shares the schedule's guard, so
 * it is refused while another sweep runs and aborted by
 * stopReconciliationWorker.
 */
export function triggerReconciliation(request: SweepRequest = {}): Promise<ReconcileResult> {
    return runGuardedSweep(request);
}

export function getReconciliationWorkerStatus(): WorkerStatus {
    return { ...workerStatus };
}
