/**
 * PostgreSQL Signal Store
 *
 * Tables per sql/schema.sql. One database transaction per unit of work:
 *
 *   BEGIN
 *   pg_advisory_xact_lock(hashtext(key))   for each identity key, sorted
 *   SELECT ... FOR UPDATE                   the aggregate(s) matching the identity
 *   ... fn(tx): inserts / versioned update
 *   COMMIT
 *
 * The advisory locks serialize first-event creation for a lead that has no
 * row yet; the row lock serializes everything after. Serialization failures,
 * deadlocks and unique-key races are retried with backoff.
 */

import { Pool, PoolClient } from 'pg';
import {
    AlarmKind,
    EngagementEventRecord,
    EngagementEventType,
    EngagementLevel,
    EngagementSignal,
    ENGAGEMENT_LEVELS,
    EventSource,
    LeadIdentity,
    NewEngagementEvent,
    NewPlatformTransition,
    Platform,
    PlatformTransitionRecord,
    RejectedEventRecord,
    RoutedPlatform,
    RoutingAlarmRecord,
    RoutingStatsRow,
    TransitionReason
} from '../../types';
import {
    AppError,
    InvalidEventError,
    StoreUnavailableError,
    VersionConflictError
} from '../../utils/appError';
import { withRetry } from '../../utils/retry';
import { isRoutingDecisionRecord, parsePlatform } from '../signalAggregator';
import { logger } from '../observabilityService';
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

// ============================================================================
// ROW TYPES
// ============================================================================

type SignalRow = Omit<EngagementSignal, 'engagement_level' | 'current_platform' | 'last_routing_decision' | 'engagement_score'> & {
    engagement_level: string;
    current_platform: string;
    last_routing_decision: unknown;
    engagement_score: number | string;
};

type EventRow = {
    id: string;
    sequence: string | number;
    signal_id: string;
    lead_id: string | null;
    email: string | null;
    event_type: string;
    source: string;
    raw_source: string;
    dedup_key: string;
    payload: Record<string, unknown> | null;
    occurred_at: Date;
    created_at: Date;
};

type TransitionRow = {
    id: string;
    sequence: string | number;
    signal_id: string;
    lead_id: string | null;
    email: string | null;
    from_platform: string;
    to_platform: string;
    reason: string;
    trigger_event: string;
    trigger_payload: Record<string, unknown> | null;
    engagement_score_at_transition: number | string;
    engagement_level_at_transition: string;
    routing_decision: unknown;
    decision_id: string;
    manual_override: boolean;
    actor: string | null;
    created_at: Date;
};

type RejectedRow = {
    id: string;
    reason: string;
    details: unknown;
    raw_event: unknown;
    created_at: Date;
};

type AlarmRow = {
    id: string;
    kind: string;
    lead_key: string | null;
    message: string;
    details: Record<string, unknown> | null;
    created_at: Date;
};

type StatsRow = {
    platform: string;
    engagement_level: string;
    lead_count: string | number;
    avg_score: string | number | null;
};

// Order matters: values are bound positionally.
const SIGNAL_COLUMNS = [
    'id', 'lead_id', 'email',
    'emails_sent', 'emails_opened', 'emails_clicked', 'emails_replied', 'emails_bounced',
    'last_email_sent_at', 'last_email_open_at', 'last_email_click_at', 'last_email_reply_at', 'last_email_bounce_at',
    'recent_open_at',
    'network_connected', 'network_connected_at', 'network_messages_sent', 'network_messages_received',
    'network_profile_viewed', 'last_network_activity_at',
    'website_visits', 'pages_viewed', 'last_website_visit_at', 'visitor_identified', 'visitor_identified_at',
    'viewed_pricing', 'viewed_demo',
    'forms_submitted', 'last_form_submitted_at', 'downloaded_content', 'requested_contact', 'requested_contact_at',
    'meetings_booked', 'meetings_completed', 'meetings_no_show', 'last_meeting_at', 'crm_stage', 'last_crm_activity_at',
    'engagement_score', 'engagement_level', 'scored_at',
    'current_platform', 'last_routing_decision', 'last_routed_at', 'transition_count',
    'version', 'created_at', 'updated_at'
] as const;

type SignalColumn = typeof SIGNAL_COLUMNS[number];

function signalValue(signal: EngagementSignal, column: SignalColumn): unknown {
    if (column === 'last_routing_decision') {
        return signal.last_routing_decision ? JSON.stringify(signal.last_routing_decision) : null;
    }
    return signal[column];
}

const INSERT_SIGNAL_SQL = `INSERT INTO engagement_signals (${SIGNAL_COLUMNS.join(', ')})
    VALUES (${SIGNAL_COLUMNS.map((_, i) => `$${i + 1}`).join(', ')})`;

const UPDATE_SIGNAL_SQL = `UPDATE engagement_signals SET ${SIGNAL_COLUMNS
    .filter((c) => c !== 'id' && c !== 'created_at')
    .map((c) => `${c} = $${SIGNAL_COLUMNS.indexOf(c) + 1}`)
    .join(', ')}
    WHERE id = $1 AND version = $${SIGNAL_COLUMNS.length + 1}`;

// ============================================================================
// ROW MAPPING
// ============================================================================

function parseLevel(value: string): EngagementLevel {
    return ENGAGEMENT_LEVELS.find((level) => level === value) ?? EngagementLevel.COLD;
}

function parseRouted(value: string): RoutedPlatform {
    const platform = parsePlatform(value);
    return platform && platform !== Platform.NONE ? platform : Platform.OUTREACH;
}

function parseEnum<E extends string>(values: readonly E[], value: string, fallback: E): E {
    return values.find((v) => v === value) ?? fallback;
}

const EVENT_TYPES = Object.values(EngagementEventType);
const SOURCES = Object.values(EventSource);
const REASONS = Object.values(TransitionReason);
const ALARM_KINDS = Object.values(AlarmKind);

function toSignal(row: SignalRow): EngagementSignal {
    return {
        ...row,
        recent_open_at: row.recent_open_at ?? [],
        pages_viewed: row.pages_viewed ?? [],
        engagement_score: Number(row.engagement_score),
        engagement_level: parseLevel(row.engagement_level),
        current_platform: parsePlatform(row.current_platform) ?? Platform.NONE,
        last_routing_decision: isRoutingDecisionRecord(row.last_routing_decision) ? row.last_routing_decision : null
    };
}

function toEvent(row: EventRow): EngagementEventRecord {
    return {
        ...row,
        sequence: Number(row.sequence),
        event_type: parseEnum(EVENT_TYPES, row.event_type, EngagementEventType.EMAIL_SENT),
        source: parseEnum(SOURCES, row.source, EventSource.UNVERIFIED),
        payload: row.payload ?? {}
    };
}

function toTransition(row: TransitionRow): PlatformTransitionRecord | null {
    if (!isRoutingDecisionRecord(row.routing_decision)) {
        logger.warn('[STORE] Transition row without a readable routing decision', { transitionId: row.id });
        return null;
    }
    return {
        ...row,
        sequence: Number(row.sequence),
        from_platform: parsePlatform(row.from_platform) ?? Platform.NONE,
        to_platform: parseRouted(row.to_platform),
        reason: parseEnum(REASONS, row.reason, TransitionReason.MANUAL_OVERRIDE),
        trigger_payload: row.trigger_payload ?? {},
        engagement_score_at_transition: Number(row.engagement_score_at_transition),
        engagement_level_at_transition: parseLevel(row.engagement_level_at_transition),
        routing_decision: row.routing_decision
    };
}

function isTransition(value: PlatformTransitionRecord | null): value is PlatformTransitionRecord {
    return value !== null;
}

// ============================================================================
// ERROR TRANSLATION
// ============================================================================

const CONFLICT_CODES = new Set(['40001', '40P01', '23505']);
const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EPIPE', '57P01', '57P03']);

function errorCode(err: unknown): string | undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

/**
 * Map a driver error onto the store's taxonomy: conflicts become
 * VersionConflictError (retried), connection loss StoreUnavailableError.
 */
export function translatePgError(err: unknown, leadKey: string): unknown {
    if (err instanceof AppError || err instanceof VersionConflictError) {
        return err;
    }

    const code = errorCode(err);
    if (code && CONFLICT_CODES.has(code)) {
        return new VersionConflictError(leadKey, `Database conflict ${code} on ${leadKey}`);
    }
    if (code && (CONNECTION_CODES.has(code) || code.startsWith('08'))) {
        return new StoreUnavailableError(`Signal store unavailable (${code})`, err);
    }
    if (err instanceof Error && /timeout|terminated|Connection/i.test(err.message)) {
        return new StoreUnavailableError(`Signal store unavailable: ${err.message}`, err);
    }
    return err;
}

// ============================================================================
// STORE
// ============================================================================

export interface PostgresSignalStoreOptions {
    maxRetries?: number;
}

export class PostgresSignalStore implements SignalStore {
    readonly backend = 'postgres' as const;
    private readonly maxRetries: number;

    constructor(private readonly pool: Pool, options: PostgresSignalStoreOptions = {}) {
        this.maxRetries = options.maxRetries ?? 5;
    }

    static fromConnectionString(connectionString: string, max = 10, options: PostgresSignalStoreOptions = {}): PostgresSignalStore {
        const pool = new Pool({
            connectionString,
            max,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 5000
        });
        pool.on('error', (err: Error) => {
            logger.error('[STORE] Idle client error', err);
        });
        return new PostgresSignalStore(pool, options);
    }

    // ========================================================================
    // UNIT OF WORK
    // ========================================================================

    async withLead<T>(identity: LeadIdentity, fn: (tx: LeadTransaction) => Promise<T>): Promise<T> {
        const leadKey = leadKeyFor(identity);
        return withRetry(() => this.runTransaction(identity, leadKey, fn), {
            key: leadKey,
            maxAttempts: this.maxRetries
        });
    }

    private async connect(): Promise<PoolClient> {
        try {
            return await this.pool.connect();
        } catch (err) {
            throw new StoreUnavailableError('Signal store unavailable: cannot acquire connection', err);
        }
    }

    private async runTransaction<T>(
        identity: LeadIdentity,
        leadKey: string,
        fn: (tx: LeadTransaction) => Promise<T>
    ): Promise<T> {
        const client = await this.connect();
        try {
            await client.query('BEGIN');
            for (const key of identityKeys(identity).sort()) {
                await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [key]);
            }

            const snapshot = await this.lockSignal(client, identity);
            const tx = this.createTransaction(client, leadKey, snapshot);

            const result = await fn(tx);
            await client.query('COMMIT');
            return result;
        } catch (err) {
            await this.rollback(client);
            throw translatePgError(err, leadKey);
        } finally {
            client.release();
        }
    }

    private async rollback(client: PoolClient): Promise<void> {
        try {
            await client.query('ROLLBACK');
        } catch (err) {
            logger.warn('[STORE] Rollback failed', { error: err instanceof Error ? err.message : String(err) });
        }
    }

    private async lockSignal(client: PoolClient, identity: LeadIdentity): Promise<EngagementSignal | null> {
        const { rows } = await client.query<SignalRow>(
            `SELECT * FROM engagement_signals
             WHERE ($1::text IS NOT NULL AND lead_id = $1) OR ($2::text IS NOT NULL AND email = $2)
             ORDER BY id
             FOR UPDATE`,
            [identity.leadId ?? null, identity.email ?? null]
        );

        const byLead = identity.leadId ? rows.find((r) => r.lead_id === identity.leadId) : undefined;
        const byEmail = identity.email ? rows.find((r) => r.email === identity.email) : undefined;

        if (byLead && byEmail && byLead.id !== byEmail.id) {
            throw new InvalidEventError('Identity conflict: lead id and email belong to different leads', [
                `lead_id ${identity.leadId} -> ${byLead.id}`,
                `email ${identity.email} -> ${byEmail.id}`
            ]);
        }

        const row = byLead ?? byEmail;
        if (!row) return null;

        if (!byLead && identity.leadId && row.lead_id && row.lead_id !== identity.leadId) {
            throw new InvalidEventError('Identity conflict: email belongs to another lead id', [
                `email ${identity.email} -> lead_id ${row.lead_id}`
            ]);
        }
        return toSignal(row);
    }

    private createTransaction(client: PoolClient, leadKey: string, snapshot: EngagementSignal | null): LeadTransaction {
        let persistedVersion: number | null = snapshot ? snapshot.version : null;
        let signalId: string | null = snapshot ? snapshot.id : null;

        return {
            leadKey,
            signal: snapshot,

            hasEvent: async (dedupKey) => {
                const { rows } = await client.query<{ id: string }>(
                    'SELECT id FROM engagement_events WHERE dedup_key = $1 LIMIT 1',
                    [dedupKey]
                );
                return rows.length > 0;
            },

            appendEvent: async (event: NewEngagementEvent) => {
                const { rows } = await client.query<EventRow>(
                    `INSERT INTO engagement_events
                        (id, signal_id, lead_id, email, event_type, source, raw_source, dedup_key, payload, occurred_at)
                     VALUES (gen_random_uuid(), $1, $2, $3, $4, $5, $6, $7, $8, $9)
                     RETURNING *`,
                    [
                        event.signal_id,
                        event.lead_id,
                        event.email,
                        event.event_type,
                        event.source,
                        event.raw_source,
                        event.dedup_key,
                        JSON.stringify(event.payload),
                        event.occurred_at
                    ]
                );
                return toEvent(rows[0]);
            },

            saveSignal: async (signal) => {
                const next: EngagementSignal = { ...signal, version: signal.version + 1, updated_at: new Date() };
                const values = SIGNAL_COLUMNS.map((column) => signalValue(next, column));

                if (persistedVersion === null || signalId !== next.id) {
                    await client.query(INSERT_SIGNAL_SQL, values);
                } else {
                    const result = await client.query(UPDATE_SIGNAL_SQL, [...values, persistedVersion]);
                    if (result.rowCount === 0) {
                        throw new VersionConflictError(next.id);
                    }
                }

                persistedVersion = next.version;
                signalId = next.id;
                return next;
            },

            appendTransition: async (transition: NewPlatformTransition) => {
                const { rows } = await client.query<TransitionRow>(
                    `INSERT INTO platform_transitions
                        (id, signal_id, lead_id, email, from_platform, to_platform, reason, trigger_event,
                         trigger_payload, engagement_score_at_transition, engagement_level_at_transition,
                         routing_decision, decision_id, manual_override, actor)
                     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
                     RETURNING *`,
                    [
                        transition.id,
                        transition.signal_id,
                        transition.lead_id,
                        transition.email,
                        transition.from_platform,
                        transition.to_platform,
                        transition.reason,
                        transition.trigger_event,
                        JSON.stringify(transition.trigger_payload),
                        transition.engagement_score_at_transition,
                        transition.engagement_level_at_transition,
                        JSON.stringify(transition.routing_decision),
                        transition.decision_id,
                        transition.manual_override,
                        transition.actor
                    ]
                );
                const record = toTransition(rows[0]);
                if (!record) {
                    throw new Error(`Transition ${transition.id} could not be read back`);
                }
                return record;
            },

            lastTransition: async () => {
                if (!signalId) return null;
                const { rows } = await client.query<TransitionRow>(
                    'SELECT * FROM platform_transitions WHERE signal_id = $1 ORDER BY sequence DESC LIMIT 1',
                    [signalId]
                );
                return rows[0] ? toTransition(rows[0]) : null;
            }
        };
    }

    // ========================================================================
    // READS
    // ========================================================================

    private async read<R extends Record<string, unknown>>(sql: string, values: unknown[] = []): Promise<R[]> {
        try {
            const { rows } = await this.pool.query<R>(sql, values);
            return rows;
        } catch (err) {
            throw translatePgError(err, 'read');
        }
    }

    async findSignal(identity: LeadIdentity): Promise<EngagementSignal | null> {
        if (identity.leadId) {
            const rows = await this.read<SignalRow>('SELECT * FROM engagement_signals WHERE lead_id = $1', [identity.leadId]);
            if (rows[0]) return toSignal(rows[0]);
        }
        if (identity.email) {
            const rows = await this.read<SignalRow>('SELECT * FROM engagement_signals WHERE email = $1', [identity.email]);
            if (rows[0]) return toSignal(rows[0]);
        }
        return null;
    }

    async findSignalById(id: string): Promise<EngagementSignal | null> {
        const rows = await this.read<SignalRow>('SELECT * FROM engagement_signals WHERE id = $1', [id]);
        return rows[0] ? toSignal(rows[0]) : null;
    }

    async listSignals(page: SignalPage): Promise<EngagementSignal[]> {
        const rows = await this.read<SignalRow>(
            `SELECT * FROM engagement_signals
             WHERE $1::uuid IS NULL OR id > $1::uuid
             ORDER BY id
             LIMIT $2`,
            [page.afterId ?? null, page.limit]
        );
        return rows.map(toSignal);
    }

    async listEvents(signalId: string, limit?: number): Promise<EngagementEventRecord[]> {
        const rows = limit !== undefined
            ? await this.read<EventRow>(
                `SELECT * FROM (
                    SELECT * FROM engagement_events WHERE signal_id = $1 ORDER BY sequence DESC LIMIT $2
                 ) recent ORDER BY sequence ASC`,
                [signalId, limit]
            )
            : await this.read<EventRow>(
                'SELECT * FROM engagement_events WHERE signal_id = $1 ORDER BY sequence ASC',
                [signalId]
            );
        return rows.map(toEvent);
    }

    async listTransitions(signalId: string): Promise<PlatformTransitionRecord[]> {
        const rows = await this.read<TransitionRow>(
            'SELECT * FROM platform_transitions WHERE signal_id = $1 ORDER BY sequence ASC',
            [signalId]
        );
        return rows.map(toTransition).filter(isTransition);
    }

    async findTransition(id: string): Promise<PlatformTransitionRecord | null> {
        const rows = await this.read<TransitionRow>('SELECT * FROM platform_transitions WHERE id = $1', [id]);
        return rows[0] ? toTransition(rows[0]) : null;
    }

    async countByPlatformAndLevel(): Promise<RoutingStatsRow[]> {
        const rows = await this.read<StatsRow>(
            `SELECT current_platform AS platform, engagement_level,
                    COUNT(*) AS lead_count, ROUND(AVG(engagement_score)::numeric, 2) AS avg_score
             FROM engagement_signals
             GROUP BY current_platform, engagement_level`
        );
        return rows.map((row) => ({
            platform: parsePlatform(row.platform) ?? Platform.NONE,
            engagement_level: parseLevel(row.engagement_level),
            lead_count: Number(row.lead_count),
            avg_score: Number(row.avg_score ?? 0)
        }));
    }

    // ========================================================================
    // REJECTIONS & ALARMS
    // ========================================================================

    async recordRejectedEvent(rejected: NewRejectedEvent): Promise<RejectedEventRecord> {
        const rows = await this.read<RejectedRow>(
            `INSERT INTO rejected_events (id, reason, details, raw_event)
             VALUES (gen_random_uuid(), $1, $2, $3)
             RETURNING *`,
            [rejected.reason, JSON.stringify(rejected.details), JSON.stringify(rejected.raw_event ?? null)]
        );
        return this.toRejected(rows[0]);
    }

    async listRejectedEvents(limit: number): Promise<RejectedEventRecord[]> {
        const rows = await this.read<RejectedRow>(
            'SELECT * FROM rejected_events ORDER BY created_at DESC LIMIT $1',
            [limit]
        );
        return rows.map((row) => this.toRejected(row));
    }

    private toRejected(row: RejectedRow): RejectedEventRecord {
        const details = Array.isArray(row.details)
            ? row.details.filter((d): d is string => typeof d === 'string')
            : [];
        return { ...row, details };
    }

    async recordAlarm(alarm: NewRoutingAlarm): Promise<RoutingAlarmRecord> {
        const rows = await this.read<AlarmRow>(
            `INSERT INTO routing_alarms (id, kind, lead_key, message, details)
             VALUES (gen_random_uuid(), $1, $2, $3, $4)
             RETURNING *`,
            [alarm.kind, alarm.lead_key, alarm.message, JSON.stringify(alarm.details)]
        );
        return this.toAlarm(rows[0]);
    }

    async listAlarms(limit: number): Promise<RoutingAlarmRecord[]> {
        const rows = await this.read<AlarmRow>(
            'SELECT * FROM routing_alarms ORDER BY created_at DESC LIMIT $1',
            [limit]
        );
        return rows.map((row) => this.toAlarm(row));
    }

    private toAlarm(row: AlarmRow): RoutingAlarmRecord {
        return {
            ...row,
            kind: parseEnum(ALARM_KINDS, row.kind, AlarmKind.ILLEGAL_TRANSITION),
            details: row.details ?? {}
        };
    }

    // ========================================================================
    // LIFECYCLE
    // ========================================================================

    async healthCheck(): Promise<StoreHealth> {
        const start = Date.now();
        try {
            await this.pool.query('SELECT 1');
            return { status: 'healthy', backend: 'postgres', latencyMs: Date.now() - start };
        } catch (err) {
            logger.warn('[STORE] Health check failed', { error: err instanceof Error ? err.message : String(err) });
            return { status: 'unhealthy', backend: 'postgres' };
        }
    }

    async close(): Promise<void> {
        await this.pool.end();
        logger.info('[STORE] Database pool closed');
    }
}
