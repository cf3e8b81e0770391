/**
 * Routing Query Service
 *
 * Read-only views over the signal store for operators: snapshots, logs,
 * platform × level statistics and leads the decision engine would move now.
 * Never takes lead locks.
 */

import {
    EngagementEventRecord,
    EngagementLevel,
    ENGAGEMENT_LEVELS,
    EngagementSignal,
    LeadIdentity,
    Platform,
    PLATFORMS,
    PlatformTransitionRecord,
    RejectedEventRecord,
    RoutedPlatform,
    RoutingStatsRow,
    TransitionReason
} from '../types';
import { resolveEngineConfig, EngineConfig } from '../config';
import { createEmptySignal } from './signalAggregator';
import { decideTransition, RECONCILIATION_TRIGGER, rescoreAt } from './routingDecisionService';
import { getSignalStore, leadKeyFor, SignalStore } from './signalStore';

export interface RoutingStats {
    rows: RoutingStatsRow[];
    totalLeads: number;
    byPlatform: Record<Platform, number>;
}

export interface EligibleTransition {
    leadKey: string;
    leadId: string | null;
    email: string | null;
    from: Platform;
    target: RoutedPlatform;
    reason: TransitionReason;
    score: number;
    level: EngagementLevel;
}

export interface EligibleQuery {
    asOf?: Date;
    limit?: number;
    cursor?: string | null;
}

export interface EligiblePage {
    items: EligibleTransition[];
    cursor: string | null;
}

const SCAN_PAGE_SIZE = 200;

/**
 * Current aggregate, or the default snapshot (score 0, cold, none) for a
 * lead the engine has never seen.
 */
export async function getSnapshot(identity: LeadIdentity, store: SignalStore = getSignalStore()): Promise<EngagementSignal> {
    const signal = await store.findSignal(identity);
    return signal ?? createEmptySignal(identity);
}

export async function getLeadEvents(
    identity: LeadIdentity,
    limit = 100,
    store: SignalStore = getSignalStore()
): Promise<EngagementEventRecord[]> {
    const signal = await store.findSignal(identity);
    return signal ? store.listEvents(signal.id, limit) : [];
}

export async function getLeadTransitions(
    identity: LeadIdentity,
    store: SignalStore = getSignalStore()
): Promise<PlatformTransitionRecord[]> {
    const signal = await store.findSignal(identity);
    return signal ? store.listTransitions(signal.id) : [];
}

/**
 * Lead counts and average score for every platform × level pair, zero-filled.
 */
export async function getRoutingStats(store: SignalStore = getSignalStore()): Promise<RoutingStats> {
    const counted = await store.countByPlatformAndLevel();
    const byKey = new Map(counted.map((row) => [`${row.platform}|${row.engagement_level}`, row]));

    const rows: RoutingStatsRow[] = [];
    for (const platform of PLATFORMS) {
        for (const level of ENGAGEMENT_LEVELS) {
            rows.push(
                byKey.get(`${platform}|${level}`) ?? {
                    platform,
                    engagement_level: level,
                    lead_count: 0,
                    avg_score: 0
                }
            );
        }
    }

    const byPlatform: Record<Platform, number> = {
        [Platform.NONE]: 0,
        [Platform.OUTREACH]: 0,
        [Platform.HYBRID]: 0,
        [Platform.CRM]: 0
    };
    let totalLeads = 0;
    for (const row of rows) {
        byPlatform[row.platform] += row.lead_count;
        totalLeads += row.lead_count;
    }

    return { rows, totalLeads, byPlatform };
}

/**
 * Leads the decision engine would move as of `asOf`, in aggregate id order.
 * Pass the returned cursor back to continue; null means the scan finished.
 */
export async function findEligibleTransitions(
    query: EligibleQuery = {},
    store: SignalStore = getSignalStore(),
    override?: EngineConfig
): Promise<EligiblePage> {
    const config = resolveEngineConfig(override);
    const asOf = query.asOf ?? new Date();
    const limit = query.limit ?? 100;
    const items: EligibleTransition[] = [];
    let cursor = query.cursor ?? null;

    for (;;) {
        const page = await store.listSignals({ afterId: cursor, limit: SCAN_PAGE_SIZE });
        if (page.length === 0) {
            return { items, cursor: null };
        }

        for (const stored of page) {
            cursor = stored.id;
            const signal = rescoreAt(stored, asOf, config);
            const decision = decideTransition(signal.current_platform, signal, RECONCILIATION_TRIGGER, asOf, config);
            if (decision) {
                items.push({
                    leadKey: leadKeyFor({ leadId: signal.lead_id ?? undefined, email: signal.email ?? undefined }),
                    leadId: signal.lead_id,
                    email: signal.email,
                    from: decision.from,
                    target: decision.target,
                    reason: decision.reason,
                    score: signal.engagement_score,
                    level: signal.engagement_level
                });
                if (items.length >= limit) {
                    return { items, cursor };
                }
            }
        }

        if (page.length < SCAN_PAGE_SIZE) {
            return { items, cursor: null };
        }
    }
}

export async function getRejectedEvents(limit = 50, store: SignalStore = getSignalStore()): Promise<RejectedEventRecord[]> {
    return store.listRejectedEvents(limit);
}

export { getAlarms } from './alarmService';
