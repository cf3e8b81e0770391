/**
 * Signal Store port
 *
 * Persistence contract for lead aggregates and their append-only logs.
 * Every write happens inside withLead(), which serializes all work on one
 * lead and commits atomically: either every staged row lands or none does.
 */

import {
    AlarmKind,
    EngagementEventRecord,
    EngagementSignal,
    LeadIdentity,
    NewEngagementEvent,
    NewPlatformTransition,
    PlatformTransitionRecord,
    RejectedEventRecord,
    RoutingAlarmRecord,
    RoutingStatsRow
} from '../../types';

export interface LeadTransaction {
    /** Lead id, or email:<email> when the lead has no id yet. */
    readonly leadKey: string;

    /** The locked aggregate as of the start of the unit of work, or null. */
    readonly signal: EngagementSignal | null;

    hasEvent(dedupKey: string): Promise<boolean>;

    appendEvent(event: NewEngagementEvent): Promise<EngagementEventRecord>;

    /**
     * Stage the aggregate. The saved copy carries version + 1; the store
     * rejects the commit if another writer bumped the version meanwhile.
     */
    saveSignal(signal: EngagementSignal): Promise<EngagementSignal>;

    appendTransition(transition: NewPlatformTransition): Promise<PlatformTransitionRecord>;

    lastTransition(): Promise<PlatformTransitionRecord | null>;
}

export interface SignalPage {
    afterId?: string | null;
    limit: number;
}

export interface NewRejectedEvent {
    reason: string;
    details: string[];
    raw_event: unknown;
}

export interface NewRoutingAlarm {
    kind: AlarmKind;
    lead_key: string | null;
    message: string;
    details: Record<string, unknown>;
}

export interface StoreHealth {
    status: 'healthy' | 'unhealthy';
    backend: 'postgres' | 'memory';
    latencyMs?: number;
}

export interface SignalStore {
    readonly backend: 'postgres' | 'memory';

    withLead<T>(identity: LeadIdentity, fn: (tx: LeadTransaction) => Promise<T>): Promise<T>;

    // Reads never take lead locks.
    findSignal(identity: LeadIdentity): Promise<EngagementSignal | null>;
    findSignalById(id: string): Promise<EngagementSignal | null>;
    listSignals(page: SignalPage): Promise<EngagementSignal[]>;
    listEvents(signalId: string, limit?: number): Promise<EngagementEventRecord[]>;
    listTransitions(signalId: string): Promise<PlatformTransitionRecord[]>;
    findTransition(id: string): Promise<PlatformTransitionRecord | null>;
    countByPlatformAndLevel(): Promise<RoutingStatsRow[]>;

    recordRejectedEvent(rejected: NewRejectedEvent): Promise<RejectedEventRecord>;
    listRejectedEvents(limit: number): Promise<RejectedEventRecord[]>;

    recordAlarm(alarm: NewRoutingAlarm): Promise<RoutingAlarmRecord>;
    listAlarms(limit: number): Promise<RoutingAlarmRecord[]>;

    healthCheck(): Promise<StoreHealth>;
    close(): Promise<void>;
}

export function identityKeys(identity: LeadIdentity): string[] {
    const keys: string[] = [];
    if (identity.leadId) keys.push(`lead:${identity.leadId}`);
    if (identity.email) keys.push(`email:${identity.email}`);
    return keys;
}

export function leadKeyFor(identity: LeadIdentity): string {
    return identity.leadId ?? `email:${identity.email ?? ''}`;
}
