import { InMemorySignalStore } from '../src/services/signalStore';
import { applyEvent } from '../src/services/eventService';
import { validateEvent } from '../src/services/eventValidator';
import { createEmptySignal } from '../src/services/signalAggregator';
import { DEFAULT_ENGINE_CONFIG } from '../src/config';
import { InvalidEventError } from '../src/utils/appError';
import { AlarmKind, EngagementEventType, EngagementLevel, EventSource, Platform } from '../src/types';
import { committed, EventInput, makeEvent, NOW } from './helpers/fixtures';

jest.mock('../src/services/observabilityService', () => ({
    logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() }
}));

const scoring = DEFAULT_ENGINE_CONFIG.scoring;

function normalized(input: EventInput) {
    return validateEvent(makeEvent(input), { now: NOW });
}

describe('In-memory Signal Store', () => {
    let store: InMemorySignalStore;

    beforeEach(() => {
        store = new InMemorySignalStore({ maxRetries: 3 });
    });

    describe('unit of work', () => {
        it('should commit nothing when the work fails', async () => {
            await expect(
                store.withLead({ leadId: 'lead-1' }, async (tx) => {
                    const saved = await tx.saveSignal(createEmptySignal({ leadId: 'lead-1' }));
                    await tx.appendEvent({
                        signal_id: saved.id,
                        lead_id: 'lead-1',
                        email: null,
                        event_type: EngagementEventType.EMAIL_OPENED,
                        source: EventSource.OUTREACH_PLATFORM,
                        raw_source: 'outreach',
                        dedup_key: 'k-1',
                        payload: {},
                        occurred_at: NOW
                    });
                    throw new Error('boom');
                })
            ).rejects.toThrow('boom');

            expect(await store.findSignal({ leadId: 'lead-1' })).toBeNull();
            expect(await store.withLead({ leadId: 'lead-1' }, (tx) => tx.hasEvent('k-1'))).toBe(false);
        });

        it('should bump the version on every save', async () => {
            const first = await store.withLead({ leadId: 'lead-1' }, (tx) =>
                tx.saveSignal(createEmptySignal({ leadId: 'lead-1' }))
            );
            expect(first.version).toBe(1);

            const seen = await store.withLead({ leadId: 'lead-1' }, async (tx) => {
                const current = committed(tx.signal, 'stored signal');
                await tx.saveSignal(current);
                return current.version;
            });
            expect(seen).toBe(1);
            expect((await store.findSignal({ leadId: 'lead-1' }))?.version).toBe(2);
        });
    });

    describe('applyEvent', () => {
        it('should ignore a redelivered event', async () => {
            const event = normalized({ event_type: 'email_opened', external_id: 'open-1' });

            const first = await applyEvent(event, { store, scoring });
            const second = await applyEvent(event, { store, scoring });

            expect(first.applied).toBe(true);
            expect(second.applied).toBe(false);
            expect(second.snapshot.emails_opened).toBe(1);
            expect(await store.listEvents(first.snapshot.id)).toHaveLength(1);
        });

        it('should serialize concurrent events for one lead', async () => {
            const events = Array.from({ length: 20 }, (_, i) =>
                normalized({ event_type: 'email_opened', external_id: `open-${i}` })
            );

            await Promise.all(events.map((event) => applyEvent(event, { store, scoring })));

            const snapshot = committed(await store.findSignal({ leadId: 'lead-1' }), 'stored signal');
            expect(snapshot.emails_opened).toBe(20);
            expect(snapshot.version).toBe(20);

            const log = await store.listEvents(snapshot.id);
            expect(log).toHaveLength(20);
            const sequences = log.map((record) => record.sequence);
            expect(sequences).toEqual([...sequences].sort((a, b) => a - b));
        });

        it('should apply concurrent redeliveries exactly once', async () => {
            const event = normalized({ event_type: 'email_replied', external_id: 'reply-1' });

            const results = await Promise.all(
                Array.from({ length: 5 }, () => applyEvent(event, { store, scoring }))
            );

            expect(results.filter((result) => result.applied)).toHaveLength(1);
            expect((await store.findSignal({ leadId: 'lead-1' }))?.emails_replied).toBe(1);
        });

        it('should let an email-only lead adopt its lead id', async () => {
            const first = await applyEvent(
                normalized({ event_type: 'email_opened', lead_id: '', email: 'bo@example.com', external_id: 'a' }),
                { store, scoring }
            );
            expect(first.snapshot.lead_id).toBeNull();

            const second = await applyEvent(
                normalized({ event_type: 'email_opened', lead_id: 'lead-b', email: 'bo@example.com', external_id: 'b' }),
                { store, scoring }
            );

            expect(second.snapshot.id).toBe(first.snapshot.id);
            expect(second.snapshot.lead_id).toBe('lead-b');
            expect((await store.findSignal({ leadId: 'lead-b' }))?.emails_opened).toBe(2);
        });

        it('should refuse a lead id and email that belong to different leads', async () => {
            await applyEvent(normalized({ event_type: 'email_opened', lead_id: 'lead-a', email: 'a@example.com', external_id: 'a' }), { store, scoring });
            await applyEvent(normalized({ event_type: 'email_opened', lead_id: 'lead-b', external_id: 'b' }), { store, scoring });

            await expect(
                applyEvent(normalized({ event_type: 'email_opened', lead_id: 'lead-b', email: 'a@example.com', external_id: 'c' }), { store, scoring })
            ).rejects.toThrow('Identity conflict: lead id and email belong to different leads');
        });

        it('should refuse an email already owned by another lead id', async () => {
            await applyEvent(normalized({ event_type: 'email_opened', lead_id: 'lead-a', email: 'a@example.com', external_id: 'a' }), { store, scoring });

            await expect(
                applyEvent(normalized({ event_type: 'email_opened', lead_id: 'lead-c', email: 'a@example.com', external_id: 'c' }), { store, scoring })
            ).rejects.toBeInstanceOf(InvalidEventError);
            expect(await store.findSignal({ leadId: 'lead-c' })).toBeNull();
        });
    });

    describe('reads', () => {
        it('should page aggregates in id order', async () => {
            for (const leadId of ['lead-a', 'lead-b', 'lead-c']) {
                await applyEvent(normalized({ event_type: 'email_opened', lead_id: leadId }), { store, scoring });
            }

            const first = await store.listSignals({ limit: 2 });
            const rest = await store.listSignals({ afterId: first[1].id, limit: 2 });

            expect(first).toHaveLength(2);
            expect(rest).toHaveLength(1);
            expect(first[0].id < first[1].id).toBe(true);
            expect(first[1].id < rest[0].id).toBe(true);
        });

        it('should count leads by platform and level', async () => {
            await applyEvent(normalized({ event_type: 'email_opened', lead_id: 'lead-a' }), { store, scoring });
            await applyEvent(normalized({ event_type: 'email_opened', lead_id: 'lead-b' }), { store, scoring });

            expect(await store.countByPlatformAndLevel()).toEqual([
                { platform: Platform.NONE, engagement_level: EngagementLevel.LUKEWARM, lead_count: 2, avg_score: 15 }
            ]);
        });

        it('should list rejections and alarms newest first', async () => {
            await store.recordRejectedEvent({ reason: 'first', details: [], raw_event: {} });
            await store.recordRejectedEvent({ reason: 'second', details: [], raw_event: {} });
            await store.recordAlarm({ kind: AlarmKind.ILLEGAL_TRANSITION, lead_key: 'lead-1', message: 'm', details: {} });

            expect((await store.listRejectedEvents(10)).map((r) => r.reason)).toEqual(['second', 'first']);
            expect(await store.listAlarms(10)).toHaveLength(1);
        });
    });
});
