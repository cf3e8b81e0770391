/**
 * Event Validator
 *
 * Turns an adapter payload into a NormalizedEvent or throws InvalidEventError.
 * Pure: no I/O, and the dedup key depends only on the event's content.
 *
 * Dedup key:
 *   src:<normalized source>:<external_id>   when the adapter supplies an id
 *   sha256:<hex>                            of the canonical JSON of
 *                                           { lead_key, event_type, occurred_at, payload }
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import {
    EngagementEventType,
    EventSource,
    NormalizedEvent,
    RESERVED_EVENT_TYPES,
    SOURCE_ALIASES
} from '../types';
import { InvalidEventError } from '../utils/appError';

export const DEFAULT_CLOCK_SKEW_TOLERANCE_MS = 5 * 60 * 1000;

const idSchema = z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value) => {
        if (value === null || value === undefined) return null;
        const trimmed = String(value).trim();
        return trimmed.length > 0 ? trimmed : null;
    });

export const rawEventSchema = z.object({
    lead_id: idSchema,
    email: z
        .string()
        .nullish()
        .transform((value) => {
            const normalized = value?.trim().toLowerCase();
            return normalized ? normalized : null;
        })
        .pipe(z.string().email('Invalid email').nullable()),
    event_type: z.string().trim().min(1, 'event_type is required'),
    source: z.string().trim().min(1, 'source is required'),
    payload: z
        .record(z.string(), z.unknown())
        .nullish()
        .transform((value) => value ?? {}),
    occurred_at: z.union([z.string(), z.number(), z.date()], {
        errorMap: () => ({ message: 'occurred_at must be a timestamp' })
    }),
    external_id: idSchema
});

export type RawEngagementEvent = z.input<typeof rawEventSchema>;

export interface ValidateOptions {
    now?: Date;
    clockSkewToleranceMs?: number;
}

const EVENT_TYPES = new Set<string>(Object.values(EngagementEventType));
const RECOGNIZED_SOURCES = new Set<string>(Object.values(EventSource).filter((s) => s !== EventSource.UNVERIFIED));

function isEventType(value: string): value is EngagementEventType {
    return EVENT_TYPES.has(value);
}

// ============================================================================
// NORMALIZATION
// ============================================================================

/**
 * Map an adapter's source string onto its family. Unknown sources are
 * accepted as UNVERIFIED.
 */
export function normalizeSource(raw: string): EventSource {
    const key = raw.trim().toLowerCase();
    if (isRecognizedSource(key)) {
        return key;
    }
    if (Object.prototype.hasOwnProperty.call(SOURCE_ALIASES, key)) {
        return SOURCE_ALIASES[key];
    }
    return EventSource.UNVERIFIED;
}

function isRecognizedSource(value: string): value is EventSource {
    return RECOGNIZED_SOURCES.has(value);
}

function parseTimestamp(value: string | number | Date): Date | null {
    const date = value instanceof Date ? new Date(value.getTime()) : new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * JSON with object keys sorted at every depth. Dates serialize as ISO strings
 * and undefined members are dropped, matching JSON.stringify.
 */
export function canonicalJson(value: unknown): string {
    if (value instanceof Date) {
        return JSON.stringify(value.toISOString());
    }
    if (Array.isArray(value)) {
        return `[${value.map((item) => (item === undefined ? 'null' : canonicalJson(item))).join(',')}]`;
    }
    if (value !== null && typeof value === 'object') {
        const entries = Object.entries(value)
            .filter(([, member]) => member !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`);
        return `{${entries.join(',')}}`;
    }
    return JSON.stringify(value) ?? 'null';
}

export function leadKeyOf(leadId: string | null, email: string | null): string {
    return leadId ?? `email:${email ?? ''}`;
}

export function computeDedupKey(input: {
    leadId: string | null;
    email: string | null;
    eventType: string;
    source: EventSource;
    occurredAt: Date;
    payload: Record<string, unknown>;
    externalId: string | null;
}): string {
    if (input.externalId) {
        return `src:${input.source}:${input.externalId}`;
    }

    const canonical = canonicalJson({
        lead_key: leadKeyOf(input.leadId, input.email),
        event_type: input.eventType,
        occurred_at: input.occurredAt.toISOString(),
        payload: input.payload
    });
    return `sha256:${createHash('sha256').update(canonical).digest('hex')}`;
}

// ============================================================================
// VALIDATION
// ============================================================================

export function validateEvent(raw: unknown, options: ValidateOptions = {}): NormalizedEvent {
    const now = options.now ?? new Date();
    const tolerance = options.clockSkewToleranceMs ?? DEFAULT_CLOCK_SKEW_TOLERANCE_MS;

    const parsed = rawEventSchema.safeParse(raw);
    if (!parsed.success) {
        throw new InvalidEventError(
            'Malformed event',
            parsed.error.issues.map((issue) => `${issue.path.join('.') || 'event'}: ${issue.message}`)
        );
    }

    const data = parsed.data;

    if (!isEventType(data.event_type)) {
        throw new InvalidEventError(`Unknown event_type "${data.event_type}"`, [
            `event_type: must be one of ${[...EVENT_TYPES].join(', ')}`
        ]);
    }
    const eventType = data.event_type;

    if (RESERVED_EVENT_TYPES.includes(eventType)) {
        throw new InvalidEventError(`Event type "${eventType}" is reserved for the routing executor`, [
            'event_type: reserved'
        ]);
    }

    if (!data.lead_id && !data.email) {
        throw new InvalidEventError('Event has no lead identity', ['lead_id or email is required']);
    }

    const occurredAt = parseTimestamp(data.occurred_at);
    if (!occurredAt) {
        throw new InvalidEventError('Unparseable occurred_at', [`occurred_at: "${String(data.occurred_at)}"`]);
    }
    if (occurredAt.getTime() > now.getTime() + tolerance) {
        throw new InvalidEventError('occurred_at is in the future', [
            `occurred_at: ${occurredAt.toISOString()} exceeds now + ${tolerance}ms`
        ]);
    }

    const source = normalizeSource(data.source);

    if (eventType === EngagementEventType.SIGNAL_RESET && source !== EventSource.MANUAL) {
        throw new InvalidEventError('signal_reset is only accepted from the manual source', [
            `source: "${data.source}" is not manual`
        ]);
    }

    return {
        leadId: data.lead_id,
        email: data.email,
        eventType,
        source,
        rawSource: data.source,
        payload: data.payload,
        occurredAt,
        externalId: data.external_id,
        dedupKey: computeDedupKey({
            leadId: data.lead_id,
            email: data.email,
            eventType,
            source,
            occurredAt,
            payload: data.payload,
            externalId: data.external_id
        })
    };
}
