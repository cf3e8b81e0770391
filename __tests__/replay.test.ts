import { InMemorySignalStore, setSignalStore } from '../src/services/signalStore';
import { ingestEvent, IngestOptions } from '../src/services/routingService';
import { assignPlatform } from '../src/services/stateTransitionService';
import { replayLead } from '../src/services/replayService';
import { DEFAULT_ENGINE_CONFIG } from '../src/config';
import { NotFoundError } from '../src/utils/appError';
import { Platform } from '../src/types';
import { committed, makeEvent, NOW } from './helpers/fixtures';

jest.mock('../src/services/observabilityService', () => ({
    logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() }
}));

const scoring = DEFAULT_ENGINE_CONFIG.scoring;

describe('Replay Service', () => {
    let store: InMemorySignalStore;
    let options: IngestOptions;

    beforeEach(() => {
        store = new InMemorySignalStore();
        setSignalStore(store);
        options = { store, config: DEFAULT_ENGINE_CONFIG, now: NOW };
    });

    it('should rebuild the stored aggregate from its log, transitions included', async () => {
        await assignPlatform(
            { identity: { leadId: 'lead-1' }, target: Platform.OUTREACH, actor: 'ops@example.com' },
            { store, config: DEFAULT_ENGINE_CONFIG }
        );
        for (const [i, occurredAt] of ['2026-03-08T09:00:00.000Z', '2026-03-09T09:00:00.000Z', '2026-03-10T09:00:00.000Z'].entries()) {
            await ingestEvent(makeEvent({ event_type: 'email_opened', external_id: `open-${i}`, occurred_at: occurredAt }), options);
        }
        await ingestEvent(makeEvent({ event_type: 'email_replied', external_id: 'reply-1', occurred_at: '2026-03-10T10:00:00.000Z' }), options);

        const result = await replayLead({ leadId: 'lead-1' }, { store, scoring });

        expect(result.eventCount).toBe(7);
        expect(result.differences).toEqual([]);
        expect(result.matches).toBe(true);
        expect(result.replayed.current_platform).toBe(Platform.CRM);
        expect(result.replayed.transition_count).toBe(3);
        expect(result.replayed.version).toBe(result.stored.version);
    });

    it('should report fields that drifted from the log', async () => {
        await ingestEvent(makeEvent({ event_type: 'email_opened', external_id: 'open-1' }), options);
        await ingestEvent(makeEvent({ event_type: 'email_opened', external_id: 'open-2' }), options);
        await store.withLead({ leadId: 'lead-1' }, async (tx) => {
            const current = committed(tx.signal, 'stored signal');
            await tx.saveSignal({ ...current, emails_opened: 99 });
        });

        const result = await replayLead({ leadId: 'lead-1' }, { store, scoring });

        expect(result.matches).toBe(false);
        expect(result.differences).toEqual([{ field: 'emails_opened', stored: 99, replayed: 2 }]);
    });

    it('should refuse a lead it has never seen', async () => {
        await expect(replayLead({ leadId: 'ghost' }, { store, scoring })).rejects.toBeInstanceOf(NotFoundError);
    });
});
