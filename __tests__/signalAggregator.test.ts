import {
    createEmptySignal,
    foldAndScore,
    foldEvent,
    MAX_RECENT_OPENS
} from '../src/services/signalAggregator';
import { DEFAULT_ENGINE_CONFIG } from '../src/config';
import { EngagementEventType, EngagementLevel, Platform } from '../src/types';
import { NOW, transitionRecord } from './helpers/fixtures';

const T1 = new Date('2026-03-08T09:00:00.000Z');
const T2 = new Date('2026-03-09T09:00:00.000Z');

function event(type: EngagementEventType, occurredAt: Date, payload: Record<string, unknown> = {}) {
    return { event_type: type, occurred_at: occurredAt, payload };
}

describe('Signal Aggregator', () => {
    it('should start every lead cold, unrouted and at version 0', () => {
        const signal = createEmptySignal({ leadId: 'lead-1', email: 'ada@example.com' }, NOW, 'sig-1');
        expect(signal).toMatchObject({
            id: 'sig-1',
            lead_id: 'lead-1',
            email: 'ada@example.com',
            engagement_score: 0,
            engagement_level: EngagementLevel.COLD,
            current_platform: Platform.NONE,
            version: 0
        });
    });

    it('should not mutate the aggregate it folds into', () => {
        const base = createEmptySignal({ leadId: 'lead-1' }, NOW, 'sig-1');
        const next = foldEvent(base, event(EngagementEventType.EMAIL_OPENED, T1));
        expect(base.emails_opened).toBe(0);
        expect(base.recent_open_at).toEqual([]);
        expect(next.emails_opened).toBe(1);
    });

    it('should only move last-occurrence timestamps forward', () => {
        let signal = createEmptySignal({ leadId: 'lead-1' }, NOW, 'sig-1');
        signal = foldEvent(signal, event(EngagementEventType.EMAIL_OPENED, T2));
        signal = foldEvent(signal, event(EngagementEventType.EMAIL_OPENED, T1));

        expect(signal.emails_opened).toBe(2);
        expect(signal.last_email_open_at).toEqual(T2);
        expect(signal.recent_open_at).toEqual([T1, T2]);
    });

    it('should keep the first connection time', () => {
        let signal = createEmptySignal({ leadId: 'lead-1' }, NOW, 'sig-1');
        signal = foldEvent(signal, event(EngagementEventType.NETWORK_CONNECTED, T2));
        signal = foldEvent(signal, event(EngagementEventType.NETWORK_CONNECTED, T1));

        expect(signal.network_connected).toBe(true);
        expect(signal.network_connected_at).toEqual(T1);
        expect(signal.last_network_activity_at).toEqual(T2);
    });

    it('should flag pricing and demo pages and keep pages distinct', () => {
        let signal = createEmptySignal({ leadId: 'lead-1' }, NOW, 'sig-1');
        signal = foldEvent(signal, event(EngagementEventType.PAGE_VIEW, T1, { url: '/Pricing' }));
        signal = foldEvent(signal, event(EngagementEventType.WEBSITE_VISIT, T1, { page: '/demo' }));
        signal = foldEvent(signal, event(EngagementEventType.PAGE_VIEW, T2, { path: '/Pricing' }));

        expect(signal.website_visits).toBe(1);
        expect(signal.viewed_pricing).toBe(true);
        expect(signal.viewed_demo).toBe(true);
        expect(signal.pages_viewed).toEqual(['/demo', '/Pricing']);
        expect(signal.last_website_visit_at).toEqual(T2);
    });

    it('should record the pipeline stage', () => {
        const signal = foldEvent(
            createEmptySignal({ leadId: 'lead-1' }, NOW, 'sig-1'),
            event(EngagementEventType.PIPELINE_STAGE_CHANGED, T1, { stage: 'qualified' })
        );
        expect(signal.crm_stage).toBe('qualified');
        expect(signal.last_crm_activity_at).toEqual(T1);
    });

    it('should lower only resettable flags on signal_reset', () => {
        let signal = createEmptySignal({ leadId: 'lead-1' }, NOW, 'sig-1');
        signal = foldEvent(signal, event(EngagementEventType.PAGE_VIEW, T1, { url: '/pricing' }));
        signal = foldEvent(signal, event(EngagementEventType.EMAIL_OPENED, T1));
        signal = foldEvent(signal, event(EngagementEventType.SIGNAL_RESET, T2, { flags: ['viewed_pricing', 'emails_opened'] }));

        expect(signal.viewed_pricing).toBe(false);
        expect(signal.emails_opened).toBe(1);
    });

    it('should keep only the most recent opens', () => {
        let signal = createEmptySignal({ leadId: 'lead-1' }, NOW, 'sig-1');
        for (let i = 0; i < MAX_RECENT_OPENS + 5; i++) {
            signal = foldEvent(signal, event(EngagementEventType.EMAIL_OPENED, new Date(T1.getTime() + i * 1000)));
        }
        expect(signal.emails_opened).toBe(MAX_RECENT_OPENS + 5);
        expect(signal.recent_open_at).toHaveLength(MAX_RECENT_OPENS);
        expect(signal.recent_open_at[0]).toEqual(new Date(T1.getTime() + 5000));
    });

    it('should apply a platform transition with its routing decision', () => {
        const { routing_decision } = transitionRecord(Platform.OUTREACH, Platform.HYBRID);
        const signal = foldEvent(
            createEmptySignal({ leadId: 'lead-1' }, NOW, 'sig-1'),
            event(EngagementEventType.PLATFORM_TRANSITION, T2, { to_platform: 'hybrid', routing_decision })
        );

        expect(signal.current_platform).toBe(Platform.HYBRID);
        expect(signal.transition_count).toBe(1);
        expect(signal.last_routed_at).toEqual(T2);
        expect(signal.last_routing_decision).toEqual(routing_decision);
    });

    describe('foldAndScore', () => {
        it('should score as of the latest instant seen', () => {
            let signal = createEmptySignal({ leadId: 'lead-1' }, NOW, 'sig-1');
            signal = foldAndScore(signal, event(EngagementEventType.EMAIL_OPENED, T2), DEFAULT_ENGINE_CONFIG.scoring);
            signal = foldAndScore(signal, event(EngagementEventType.EMAIL_CLICKED, T1), DEFAULT_ENGINE_CONFIG.scoring);

            expect(signal.scored_at).toEqual(T2);
            expect(signal.engagement_score).toBe(18);
            expect(signal.engagement_level).toBe(EngagementLevel.LUKEWARM);
        });

        it('should not rescore on a platform transition', () => {
            const base = foldAndScore(
                createEmptySignal({ leadId: 'lead-1' }, NOW, 'sig-1'),
                event(EngagementEventType.EMAIL_OPENED, T1),
                DEFAULT_ENGINE_CONFIG.scoring
            );
            const routed = foldAndScore(base, event(EngagementEventType.PLATFORM_TRANSITION, NOW, { to_platform: 'outreach' }));

            expect(routed.current_platform).toBe(Platform.OUTREACH);
            expect(routed.engagement_score).toBe(base.engagement_score);
            expect(routed.scored_at).toEqual(T1);
        });
    });
});
