/**
 * Event Service
 *
 * Writes accepted engagement events. Each event is appended to the immutable
 * log and folded into the lead aggregate in the same unit of work, so the
 * aggregate never reflects an event the log does not hold.
 *
 * Key principles:
 * - Events are append-only and immutable
 * - Events are idempotent by dedup key (a redelivery is a no-op)
 * - The log can be replayed to reconstruct the aggregate
 */

import {
    EngagementEventRecord,
    EngagementSignal,
    LeadIdentity,
    NormalizedEvent
} from '../types';
import { resolveScoringConfig, ScoringConfig } from '../config';
import { logger } from './observabilityService';
import { createEmptySignal, foldAndScore } from './signalAggregator';
import { getSignalStore, SignalStore } from './signalStore';

export interface ApplyResult {
    snapshot: EngagementSignal;
    applied: boolean;
    event?: EngagementEventRecord;
}

export interface ApplyOptions {
    store?: SignalStore;
    scoring?: ScoringConfig;
}

export function identityOf(event: Pick<NormalizedEvent, 'leadId' | 'email'>): LeadIdentity {
    return {
        leadId: event.leadId ?? undefined,
        email: event.email ?? undefined
    };
}

/**
 * Apply one validated event to its lead. Duplicates (same dedup key) leave
 * the aggregate untouched and return applied=false.
 */
export async function applyEvent(event: NormalizedEvent, options: ApplyOptions = {}): Promise<ApplyResult> {
    const store = options.store ?? getSignalStore();
    const scoring = resolveScoringConfig(options.scoring);
    const identity = identityOf(event);

    return store.withLead(identity, async (tx) => {
        if (await tx.hasEvent(event.dedupKey)) {
            logger.info(`[EVENT] Duplicate event ignored: ${event.dedupKey}`, {
                leadKey: tx.leadKey,
                eventType: event.eventType
            });
            return { snapshot: tx.signal ?? createEmptySignal(identity), applied: false };
        }

        const base = tx.signal ?? createEmptySignal(identity);
        // An email-only aggregate adopts the lead id; an existing email is kept.
        const current: EngagementSignal = {
            ...base,
            lead_id: base.lead_id ?? event.leadId,
            email: base.email ?? event.email
        };

        const next = foldAndScore(
            current,
            { event_type: event.eventType, payload: event.payload, occurred_at: event.occurredAt },
            scoring
        );
        const snapshot = await tx.saveSignal(next);

        const record = await tx.appendEvent({
            signal_id: snapshot.id,
            lead_id: event.leadId,
            email: event.email,
            event_type: event.eventType,
            source: event.source,
            raw_source: event.rawSource,
            dedup_key: event.dedupKey,
            payload: event.payload,
            occurred_at: event.occurredAt
        });

        logger.info(`[EVENT] Applied ${event.eventType}`, {
            leadKey: tx.leadKey,
            eventId: record.id,
            sequence: record.sequence,
            score: snapshot.engagement_score,
            level: snapshot.engagement_level,
            version: snapshot.version
        });

        return { snapshot, applied: true, event: record };
    });
}

/**
 * Full event log of an aggregate, oldest first.
 */
export async function getEventsForReplay(signalId: string, store: SignalStore = getSignalStore()): Promise<EngagementEventRecord[]> {
    return store.listEvents(signalId);
}
