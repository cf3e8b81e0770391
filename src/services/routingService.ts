/**
 * Routing Service
 *
 * The ingestion pipeline for one engagement event:
 *
 *   validate → apply (log + fold + score) → decide → execute → dispatch
 *
 * Rejections are recorded and returned, never thrown. Duplicates are
 * acknowledged without side effects. Contention and storage failures
 * propagate as retryable AppErrors.
 */

import {
    EngagementEventType,
    EngagementSignal,
    NormalizedEvent,
    PlatformTransitionRecord,
    RoutingCommand
} from '../types';
import { AppError, ErrorCode, IllegalTransitionError, InvalidEventError } from '../utils/appError';
import { getConfig, resolveEngineConfig, EngineConfig } from '../config';
import { logger } from './observabilityService';
import { validateEvent } from './eventValidator';
import { applyEvent, ApplyResult } from './eventService';
import { decideTransition } from './routingDecisionService';
import { executeTransition } from './stateTransitionService';
import { getSignalStore, leadKeyFor, SignalStore } from './signalStore';

// ============================================================================
// TYPES
// ============================================================================

export type IngestStatus = 'applied' | 'duplicate' | 'rejected' | 'failed';

export interface IngestResult {
    status: IngestStatus;
    dedupKey?: string;
    leadKey?: string;
    snapshot?: EngagementSignal;
    transition?: PlatformTransitionRecord | null;
    commands: RoutingCommand[];
    reason?: string;
    details?: string[];
    code?: ErrorCode;
    retryable?: boolean;
}

export interface IngestOptions {
    store?: SignalStore;
    config?: EngineConfig;
    now?: Date;
    clockSkewToleranceMs?: number;
}

export interface BatchSummary {
    total: number;
    applied: number;
    duplicate: number;
    rejected: number;
    failed: number;
    transitions: number;
}

export interface BatchResult {
    results: IngestResult[];
    summary: BatchSummary;
}

// ============================================================================
// REJECTIONS
// ============================================================================

export async function recordRejection(raw: unknown, err: InvalidEventError, store: SignalStore): Promise<IngestResult> {
    logger.warn(`[ROUTING] Event rejected: ${err.message}`, { details: err.details });

    try {
        await store.recordRejectedEvent({ reason: err.message, details: err.details, raw_event: raw });
    } catch (recordErr) {
        logger.error('[ROUTING] Failed to record rejected event', recordErr);
    }

    return {
        status: 'rejected',
        reason: err.message,
        details: err.details,
        commands: []
    };
}

// ============================================================================
// PIPELINE
// ============================================================================

export async function ingestEvent(raw: unknown, options: IngestOptions = {}): Promise<IngestResult> {
    const store = options.store ?? getSignalStore();
    const { env } = getConfig();
    const config = resolveEngineConfig(options.config);

    let event: NormalizedEvent;
    try {
        event = validateEvent(raw, {
            now: options.now,
            clockSkewToleranceMs: options.clockSkewToleranceMs ?? env.CLOCK_SKEW_TOLERANCE_MS
        });
    } catch (err) {
        if (err instanceof InvalidEventError) {
            return recordRejection(raw, err, store);
        }
        throw err;
    }

    const leadKey = leadKeyFor({ leadId: event.leadId ?? undefined, email: event.email ?? undefined });

    let applied: ApplyResult;
    try {
        applied = await applyEvent(event, { store, scoring: config.scoring });
    } catch (err) {
        // Identity conflicts surface from the store as InvalidEventError.
        if (err instanceof InvalidEventError) {
            return recordRejection(raw, err, store);
        }
        throw err;
    }

    if (!applied.applied) {
        return {
            status: 'duplicate',
            dedupKey: event.dedupKey,
            leadKey,
            snapshot: applied.snapshot,
            transition: null,
            commands: []
        };
    }

    const snapshot = applied.snapshot;
    const base: IngestResult = {
        status: 'applied',
        dedupKey: event.dedupKey,
        leadKey,
        snapshot,
        transition: null,
        commands: []
    };

    if (event.eventType === EngagementEventType.SIGNAL_RESET) {
        return base;
    }

    const decision = decideTransition(
        snapshot.current_platform,
        snapshot,
        { eventType: event.eventType, source: event.source, payload: event.payload },
        snapshot.scored_at ?? event.occurredAt,
        config
    );
    if (!decision) {
        return base;
    }

    logger.info(`[ROUTING] Decision ${decision.from} -> ${decision.target} (${decision.reason})`, {
        leadKey,
        decisionId: decision.decisionId,
        score: snapshot.engagement_score
    });

    try {
        const result = await executeTransition(decision, { store });
        if (!result) {
            return base;
        }

        // The transition bumped the aggregate; report the committed state.
        const routed = await store.findSignalById(snapshot.id);
        return {
            ...base,
            snapshot: routed ?? snapshot,
            transition: result.transition,
            commands: result.commands
        };
    } catch (err) {
        // The event itself is committed; the alarm has been raised.
        if (err instanceof IllegalTransitionError) {
            return base;
        }
        throw err;
    }
}

/**
 * Ingest events one after another. A per-item contention or storage failure
 * is reported as `failed` and does not stop the batch.
 */
export async function ingestBatch(raws: unknown[], options: IngestOptions = {}): Promise<BatchResult> {
    const results: IngestResult[] = [];

    for (const raw of raws) {
        try {
            results.push(await ingestEvent(raw, options));
        } catch (err) {
            if (!(err instanceof AppError)) {
                throw err;
            }
            logger.error('[ROUTING] Batch item failed', err, { code: err.code });
            results.push({
                status: 'failed',
                reason: err.message,
                code: err.code,
                retryable: err.retryable,
                commands: []
            });
        }
    }

    const summary: BatchSummary = {
        total: results.length,
        applied: 0,
        duplicate: 0,
        rejected: 0,
        failed: 0,
        transitions: 0
    };
    for (const result of results) {
        summary[result.status]++;
        if (result.transition) summary.transitions++;
    }

    logger.info('[ROUTING] Batch processed', { ...summary });
    return { results, summary };
}
