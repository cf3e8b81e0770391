import { canonicalJson, normalizeSource, validateEvent } from '../src/services/eventValidator';
import { InvalidEventError } from '../src/utils/appError';
import { EngagementEventType, EventSource } from '../src/types';

const NOW = new Date('2026-03-10T12:00:00.000Z');

function raw(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        lead_id: 'lead-1',
        email: ' Ada@Example.com ',
        event_type: 'email_opened',
        source: 'outreach',
        occurred_at: '2026-03-10T11:00:00.000Z',
        payload: { campaign: 'spring' },
        ...overrides
    };
}

function rejectionOf(input: unknown, clockSkewToleranceMs?: number): InvalidEventError {
    try {
        validateEvent(input, { now: NOW, clockSkewToleranceMs });
    } catch (err) {
        if (err instanceof InvalidEventError) return err;
        throw err;
    }
    throw new Error('expected the event to be rejected');
}

describe('Event Validator', () => {
    describe('normalization', () => {
        it('should normalize identity, type and source', () => {
            const event = validateEvent(raw(), { now: NOW });

            expect(event.leadId).toBe('lead-1');
            expect(event.email).toBe('ada@example.com');
            expect(event.eventType).toBe(EngagementEventType.EMAIL_OPENED);
            expect(event.source).toBe(EventSource.OUTREACH_PLATFORM);
            expect(event.rawSource).toBe('outreach');
            expect(event.occurredAt.toISOString()).toBe('2026-03-10T11:00:00.000Z');
            expect(event.payload).toEqual({ campaign: 'spring' });
            expect(event.externalId).toBeNull();
            expect(event.dedupKey).toMatch(/^sha256:[0-9a-f]{64}$/);
        });

        it('should stringify numeric lead ids', () => {
            expect(validateEvent(raw({ lead_id: 42 }), { now: NOW }).leadId).toBe('42');
        });

        it('should accept epoch milliseconds', () => {
            const event = validateEvent(raw({ occurred_at: Date.parse('2026-03-10T10:00:00.000Z') }), { now: NOW });
            expect(event.occurredAt.toISOString()).toBe('2026-03-10T10:00:00.000Z');
        });

        it('should default a missing payload to an empty object', () => {
            expect(validateEvent(raw({ payload: null }), { now: NOW }).payload).toEqual({});
        });

        it('should map vendor names onto source families', () => {
            expect(normalizeSource('HubSpot')).toBe(EventSource.CRM_PLATFORM);
            expect(normalizeSource('crm_platform')).toBe(EventSource.CRM_PLATFORM);
            expect(normalizeSource('heyreach')).toBe(EventSource.NETWORK_PLATFORM);
            expect(normalizeSource('operator')).toBe(EventSource.MANUAL);
        });

        it('should accept unknown sources as unverified', () => {
            const event = validateEvent(raw({ source: 'zapier' }), { now: NOW });
            expect(event.source).toBe(EventSource.UNVERIFIED);
            expect(event.rawSource).toBe('zapier');
        });
    });

    describe('dedup key', () => {
        it('should use the adapter id when present', () => {
            const event = validateEvent(raw({ external_id: 'evt-9' }), { now: NOW });
            expect(event.dedupKey).toBe('src:outreach_platform:evt-9');
        });

        it('should not depend on payload key order', () => {
            const a = validateEvent(raw({ payload: { a: 1, b: { c: 2, d: 3 } } }), { now: NOW });
            const b = validateEvent(raw({ payload: { b: { d: 3, c: 2 }, a: 1 } }), { now: NOW });
            expect(a.dedupKey).toBe(b.dedupKey);
        });

        it('should differ when occurred_at differs', () => {
            const a = validateEvent(raw(), { now: NOW });
            const b = validateEvent(raw({ occurred_at: '2026-03-10T11:00:01.000Z' }), { now: NOW });
            expect(a.dedupKey).not.toBe(b.dedupKey);
        });

        it('should serialize canonically', () => {
            const value = { b: 1, a: [{ d: undefined, c: new Date('2026-01-01T00:00:00.000Z') }] };
            expect(canonicalJson(value)).toBe('{"a":[{"c":"2026-01-01T00:00:00.000Z"}],"b":1}');
        });
    });

    describe('rejections', () => {
        it('should reject an event with no identity', () => {
            const err = rejectionOf(raw({ lead_id: undefined, email: undefined }));
            expect(err.message).toBe('Event has no lead identity');
            expect(err.details).toEqual(['lead_id or email is required']);
        });

        it('should reject a blank lead id with no email', () => {
            expect(rejectionOf(raw({ lead_id: '   ', email: null })).message).toBe('Event has no lead identity');
        });

        it('should reject a malformed email', () => {
            const err = rejectionOf(raw({ email: 'not-an-email' }));
            expect(err.message).toBe('Malformed event');
            expect(err.details).toContain('email: Invalid email');
        });

        it('should reject a missing event_type', () => {
            const err = rejectionOf(raw({ event_type: undefined }));
            expect(err.message).toBe('Malformed event');
            expect(err.details).toContain('event_type: Required');
        });

        it('should reject input that is not an object', () => {
            expect(rejectionOf('hello').message).toBe('Malformed event');
        });

        it('should reject an unknown event type', () => {
            expect(rejectionOf(raw({ event_type: 'email_forwarded' })).message).toBe('Unknown event_type "email_forwarded"');
        });

        it('should reject platform_transition from adapters', () => {
            expect(rejectionOf(raw({ event_type: 'platform_transition' })).message).toBe(
                'Event type "platform_transition" is reserved for the routing executor'
            );
        });

        it('should only accept signal_reset from the manual source', () => {
            expect(rejectionOf(raw({ event_type: 'signal_reset' })).message).toBe(
                'signal_reset is only accepted from the manual source'
            );

            const accepted = validateEvent(raw({ event_type: 'signal_reset', source: 'operator' }), { now: NOW });
            expect(accepted.source).toBe(EventSource.MANUAL);
        });

        it('should reject an unparseable timestamp', () => {
            const err = rejectionOf(raw({ occurred_at: 'yesterday' }));
            expect(err.message).toBe('Unparseable occurred_at');
            expect(err.details).toEqual(['occurred_at: "yesterday"']);
        });

        it('should reject events beyond the clock-skew tolerance', () => {
            expect(rejectionOf(raw({ occurred_at: '2026-03-10T12:10:00.000Z' })).message).toBe('occurred_at is in the future');
            expect(validateEvent(raw({ occurred_at: '2026-03-10T12:04:59.000Z' }), { now: NOW }).occurredAt.toISOString()).toBe(
                '2026-03-10T12:04:59.000Z'
            );
            expect(rejectionOf(raw({ occurred_at: '2026-03-10T12:00:01.000Z' }), 0).message).toBe('occurred_at is in the future');
        });
    });
});
