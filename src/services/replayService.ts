/**
 * Event Replay Service
 *
 * Rebuilds a lead's aggregate from its event log and compares it with the
 * stored one. Read-only: the replayed aggregate is never written back.
 *
 * A mismatch means the aggregate drifted from its log (or the scoring
 * configuration changed since the events were applied).
 */

import { EngagementEventRecord, EngagementSignal, LeadIdentity } from '../types';
import { NotFoundError } from '../utils/appError';
import { resolveScoringConfig, ScoringConfig } from '../config';
import { logger } from './observabilityService';
import { getEventsForReplay } from './eventService';
import { createEmptySignal, foldAndScore } from './signalAggregator';
import { getSignalStore, leadKeyFor, SignalStore } from './signalStore';

// ============================================================================
// TYPES
// ============================================================================

export interface ReplayDifference {
    field: keyof EngagementSignal;
    stored: unknown;
    replayed: unknown;
}

export interface ReplayResult {
    leadKey: string;
    matches: boolean;
    eventCount: number;
    differences: ReplayDifference[];
    replayed: EngagementSignal;
    stored: EngagementSignal;
    durationMs: number;
}

export interface ReplayOptions {
    store?: SignalStore;
    scoring?: ScoringConfig;
}

// Identity, version and bookkeeping timestamps are excluded.
const COMPARED_FIELDS: readonly (keyof EngagementSignal)[] = [
    'emails_sent',
    'emails_opened',
    'emails_clicked',
    'emails_replied',
    'emails_bounced',
    'last_email_open_at',
    'last_email_reply_at',
    'recent_open_at',
    'network_connected',
    'network_messages_sent',
    'network_messages_received',
    'network_profile_viewed',
    'last_network_activity_at',
    'website_visits',
    'pages_viewed',
    'last_website_visit_at',
    'visitor_identified',
    'viewed_pricing',
    'viewed_demo',
    'forms_submitted',
    'downloaded_content',
    'requested_contact',
    'meetings_booked',
    'meetings_completed',
    'meetings_no_show',
    'crm_stage',
    'engagement_score',
    'engagement_level',
    'scored_at',
    'current_platform',
    'transition_count'
];

function comparable(value: unknown): string {
    if (value instanceof Date) return value.toISOString();
    if (Array.isArray(value)) return JSON.stringify(value.map((item) => (item instanceof Date ? item.toISOString() : item)));
    return JSON.stringify(value);
}

export function diffSignals(stored: EngagementSignal, replayed: EngagementSignal): ReplayDifference[] {
    const differences: ReplayDifference[] = [];
    for (const field of COMPARED_FIELDS) {
        if (comparable(stored[field]) !== comparable(replayed[field])) {
            differences.push({ field, stored: stored[field], replayed: replayed[field] });
        }
    }
    return differences;
}

/**
 * Fold a log, oldest first, into a fresh aggregate.
 */
export function rebuildSignal(
    base: Pick<EngagementSignal, 'id' | 'lead_id' | 'email' | 'created_at'>,
    events: EngagementEventRecord[],
    scoring: ScoringConfig
): EngagementSignal {
    let signal = createEmptySignal(
        { leadId: base.lead_id ?? undefined, email: base.email ?? undefined },
        base.created_at,
        base.id
    );
    for (const event of events) {
        signal = foldAndScore(signal, event, scoring);
        signal.version++;
    }
    return signal;
}

export async function replayLead(identity: LeadIdentity, options: ReplayOptions = {}): Promise<ReplayResult> {
    const startTime = Date.now();
    const store = options.store ?? getSignalStore();
    const scoring = resolveScoringConfig(options.scoring);
    const leadKey = leadKeyFor(identity);

    const stored = await store.findSignal(identity);
    if (!stored) {
        throw new NotFoundError(`Lead ${leadKey} not found`);
    }

    const events = await getEventsForReplay(stored.id, store);
    const replayed = rebuildSignal(stored, events, scoring);
    const differences = diffSignals(stored, replayed);

    const result: ReplayResult = {
        leadKey,
        matches: differences.length === 0,
        eventCount: events.length,
        differences,
        replayed,
        stored,
        durationMs: Date.now() - startTime
    };

    if (result.matches) {
        logger.info('[REPLAY] Aggregate matches its event log', { leadKey, eventCount: events.length });
    } else {
        logger.warn('[REPLAY] Aggregate differs from its event log', {
            leadKey,
            eventCount: events.length,
            fields: differences.map((d) => d.field)
        });
    }

    return result;
}
