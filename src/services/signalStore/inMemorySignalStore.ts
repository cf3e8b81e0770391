/**
 * In-memory Signal Store
 *
 * Same contract as the Postgres adapter, for tests and local development.
 * Work on a lead is serialized by a keyed mutex over its identity keys and
 * resolved aggregate id. Writes are staged and only applied when the unit of
 * work resolves, after an optimistic version check.
 */

import { randomUUID } from 'crypto';
import {
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
import { InvalidEventError, VersionConflictError } from '../../utils/appError';
import { KeyedMutex } from '../../utils/keyedMutex';
import { withRetry } from '../../utils/retry';
import {
    LeadTransaction,
    NewRejectedEvent,
    NewRoutingAlarm,
    SignalPage,
    SignalStore,
    StoreHealth,
    identityKeys,
    leadKeyFor
} from './types';

interface StagedWrites {
    signal: EngagementSignal | null;
    events: EngagementEventRecord[];
    transitions: PlatformTransitionRecord[];
}

export interface InMemorySignalStoreOptions {
    maxRetries?: number;
}

export function cloneSignal(signal: EngagementSignal): EngagementSignal {
    return {
        ...signal,
        recent_open_at: [...signal.recent_open_at],
        pages_viewed: [...signal.pages_viewed],
        last_routing_decision: signal.last_routing_decision
            ? {
                  ...signal.last_routing_decision,
                  inputs: { ...signal.last_routing_decision.inputs },
                  reasoning: [...signal.last_routing_decision.reasoning]
              }
            : null
    };
}

export class InMemorySignalStore implements SignalStore {
    readonly backend = 'memory' as const;

    protected signals = new Map<string, EngagementSignal>();
    private identityIndex = new Map<string, string>();
    private eventsBySignal = new Map<string, EngagementEventRecord[]>();
    private dedupKeys = new Set<string>();
    private transitions = new Map<string, PlatformTransitionRecord>();
    private rejected: RejectedEventRecord[] = [];
    private alarms: RoutingAlarmRecord[] = [];
    private sequence = 0;
    private readonly mutex = new KeyedMutex();
    private readonly maxRetries: number;

    constructor(options: InMemorySignalStoreOptions = {}) {
        this.maxRetries = options.maxRetries ?? 5;
    }

    // ========================================================================
    // UNIT OF WORK
    // ========================================================================

    async withLead<T>(identity: LeadIdentity, fn: (tx: LeadTransaction) => Promise<T>): Promise<T> {
        return withRetry(() => this.lockAndRun(identity, fn), {
            key: leadKeyFor(identity),
            maxAttempts: this.maxRetries
        });
    }

    private resolveIds(identity: LeadIdentity): string[] {
        const ids = new Set<string>();
        for (const key of identityKeys(identity)) {
            const id = this.identityIndex.get(key);
            if (id) ids.add(id);
        }
        return [...ids];
    }

    private async lockAndRun<T>(identity: LeadIdentity, fn: (tx: LeadTransaction) => Promise<T>): Promise<T> {
        for (;;) {
            const resolved = this.resolveIds(identity);
            const release = await this.mutex.acquireAll([
                ...identityKeys(identity),
                ...resolved.map((id) => `signal:${id}`)
            ]);
            try {
                // Identity may have been adopted while we waited; lock the new aggregate too.
                const current = this.resolveIds(identity);
                if (current.some((id) => !resolved.includes(id))) {
                    continue;
                }
                return await this.runUnitOfWork(identity, fn);
            } finally {
                release();
            }
        }
    }

    private resolveSignal(identity: LeadIdentity): EngagementSignal | null {
        const byLead = identity.leadId ? this.identityIndex.get(`lead:${identity.leadId}`) : undefined;
        const byEmail = identity.email ? this.identityIndex.get(`email:${identity.email}`) : undefined;

        if (byLead && byEmail && byLead !== byEmail) {
            throw new InvalidEventError('Identity conflict: lead id and email belong to different leads', [
                `lead_id ${identity.leadId} -> ${byLead}`,
                `email ${identity.email} -> ${byEmail}`
            ]);
        }

        const id = byLead ?? byEmail;
        const signal = id ? this.signals.get(id) : undefined;
        if (!signal) return null;

        if (!byLead && identity.leadId && signal.lead_id && signal.lead_id !== identity.leadId) {
            throw new InvalidEventError('Identity conflict: email belongs to another lead id', [
                `email ${identity.email} -> lead_id ${signal.lead_id}`
            ]);
        }
        return signal;
    }

    private async runUnitOfWork<T>(identity: LeadIdentity, fn: (tx: LeadTransaction) => Promise<T>): Promise<T> {
        const existing = this.resolveSignal(identity);
        const snapshot = existing ? cloneSignal(existing) : null;
        const staged: StagedWrites = { signal: null, events: [], transitions: [] };

        const tx: LeadTransaction = {
            leadKey: leadKeyFor(identity),
            signal: snapshot,

            hasEvent: async (dedupKey) =>
                this.dedupKeys.has(dedupKey) || staged.events.some((e) => e.dedup_key === dedupKey),

            appendEvent: async (event: NewEngagementEvent) => {
                if (this.dedupKeys.has(event.dedup_key)) {
                    throw new VersionConflictError(event.dedup_key, `Dedup key ${event.dedup_key} committed concurrently`);
                }
                const record: EngagementEventRecord = {
                    ...event,
                    payload: { ...event.payload },
                    id: randomUUID(),
                    sequence: ++this.sequence,
                    created_at: new Date()
                };
                staged.events.push(record);
                return { ...record };
            },

            saveSignal: async (signal) => {
                const saved = cloneSignal({ ...signal, version: signal.version + 1, updated_at: new Date() });
                staged.signal = saved;
                return cloneSignal(saved);
            },

            appendTransition: async (transition: NewPlatformTransition) => {
                const record: PlatformTransitionRecord = {
                    ...transition,
                    sequence: ++this.sequence,
                    created_at: new Date()
                };
                staged.transitions.push(record);
                return { ...record };
            },

            lastTransition: async () => {
                const pending = staged.transitions[staged.transitions.length - 1];
                if (pending) return { ...pending };
                if (!snapshot) return null;
                const committed = [...this.transitions.values()].filter((t) => t.signal_id === snapshot.id);
                const last = committed[committed.length - 1];
                return last ? { ...last } : null;
            }
        };

        const result = await fn(tx);
        this.commit(snapshot, staged);
        return result;
    }

    private commit(snapshot: EngagementSignal | null, staged: StagedWrites): void {
        const saved = staged.signal;

        if (saved) {
            const stored = this.signals.get(saved.id);
            if ((stored?.version ?? 0) !== (snapshot?.version ?? 0)) {
                throw new VersionConflictError(saved.id);
            }
            for (const key of identityKeys({ leadId: saved.lead_id ?? undefined, email: saved.email ?? undefined })) {
                const owner = this.identityIndex.get(key);
                if (owner && owner !== saved.id) {
                    throw new VersionConflictError(key, `Identity ${key} claimed by another aggregate`);
                }
            }
        }
        for (const event of staged.events) {
            if (this.dedupKeys.has(event.dedup_key)) {
                throw new VersionConflictError(event.dedup_key, `Dedup key ${event.dedup_key} committed concurrently`);
            }
        }

        if (saved) {
            this.signals.set(saved.id, saved);
            if (saved.lead_id) this.identityIndex.set(`lead:${saved.lead_id}`, saved.id);
            if (saved.email) this.identityIndex.set(`email:${saved.email}`, saved.id);
        }
        for (const event of staged.events) {
            this.dedupKeys.add(event.dedup_key);
            const log = this.eventsBySignal.get(event.signal_id) ?? [];
            log.push(event);
            this.eventsBySignal.set(event.signal_id, log);
        }
        for (const transition of staged.transitions) {
            this.transitions.set(transition.id, transition);
        }
    }

    // ========================================================================
    // READS
    // ========================================================================

    async findSignal(identity: LeadIdentity): Promise<EngagementSignal | null> {
        const byLead = identity.leadId ? this.identityIndex.get(`lead:${identity.leadId}`) : undefined;
        const byEmail = identity.email ? this.identityIndex.get(`email:${identity.email}`) : undefined;
        const id = byLead ?? byEmail;
        const signal = id ? this.signals.get(id) : undefined;
        return signal ? cloneSignal(signal) : null;
    }

    async findSignalById(id: string): Promise<EngagementSignal | null> {
        const signal = this.signals.get(id);
        return signal ? cloneSignal(signal) : null;
    }

    async listSignals(page: SignalPage): Promise<EngagementSignal[]> {
        const afterId = page.afterId ?? null;
        return [...this.signals.keys()]
            .sort()
            .filter((id) => afterId === null || id > afterId)
            .slice(0, page.limit)
            .map((id) => this.signals.get(id))
            .filter((signal): signal is EngagementSignal => signal !== undefined)
            .map(cloneSignal);
    }

    async listEvents(signalId: string, limit?: number): Promise<EngagementEventRecord[]> {
        const log = this.eventsBySignal.get(signalId) ?? [];
        const window = limit !== undefined ? log.slice(-limit) : log;
        return window.map((event) => ({ ...event }));
    }

    async listTransitions(signalId: string): Promise<PlatformTransitionRecord[]> {
        return [...this.transitions.values()]
            .filter((t) => t.signal_id === signalId)
            .map((t) => ({ ...t }));
    }

    async findTransition(id: string): Promise<PlatformTransitionRecord | null> {
        const transition = this.transitions.get(id);
        return transition ? { ...transition } : null;
    }

    async countByPlatformAndLevel(): Promise<RoutingStatsRow[]> {
        const groups = new Map<string, RoutingStatsRow & { total: number }>();
        for (const signal of this.signals.values()) {
            const key = `${signal.current_platform}|${signal.engagement_level}`;
            const group = groups.get(key) ?? {
                platform: signal.current_platform,
                engagement_level: signal.engagement_level,
                lead_count: 0,
                avg_score: 0,
                total: 0
            };
            group.lead_count++;
            group.total += signal.engagement_score;
            groups.set(key, group);
        }
        return [...groups.values()].map(({ total, ...row }) => ({
            ...row,
            avg_score: Math.round((total / row.lead_count) * 100) / 100
        }));
    }

    // ========================================================================
    // REJECTIONS & ALARMS
    // ========================================================================

    async recordRejectedEvent(rejected: NewRejectedEvent): Promise<RejectedEventRecord> {
        const record: RejectedEventRecord = { ...rejected, id: randomUUID(), created_at: new Date() };
        this.rejected.push(record);
        return { ...record };
    }

    async listRejectedEvents(limit: number): Promise<RejectedEventRecord[]> {
        return this.rejected.slice(-limit).reverse().map((r) => ({ ...r }));
    }

    async recordAlarm(alarm: NewRoutingAlarm): Promise<RoutingAlarmRecord> {
        const record: RoutingAlarmRecord = { ...alarm, id: randomUUID(), created_at: new Date() };
        this.alarms.push(record);
        return { ...record };
    }

    async listAlarms(limit: number): Promise<RoutingAlarmRecord[]> {
        return this.alarms.slice(-limit).reverse().map((a) => ({ ...a }));
    }

    // ========================================================================
    // LIFECYCLE
    // ========================================================================

    async healthCheck(): Promise<StoreHealth> {
        return { status: 'healthy', backend: 'memory', latencyMs: 0 };
    }

    async close(): Promise<void> {
        // Nothing to release.
    }
}
