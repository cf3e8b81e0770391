import {
    AuthorizingSnapshot,
    EngagementLevel,
    EngagementSignal,
    Platform,
    PlatformTransitionRecord,
    RoutedPlatform,
    TransitionReason
} from '../../src/types';
import { createEmptySignal } from '../../src/services/signalAggregator';

export const DAY_MS = 24 * 60 * 60 * 1000;

export const NOW = new Date('2026-03-10T12:00:00.000Z');

export function daysBefore(asOf: Date, days: number): Date {
    return new Date(asOf.getTime() - days * DAY_MS);
}

export interface EventInput {
    event_type: string;
    lead_id?: string;
    email?: string;
    source?: string;
    occurred_at?: string;
    external_id?: string;
    payload?: Record<string, unknown>;
}

/**
 * Raw adapter payload, defaulting to lead-1 on the outreach platform.
 */
export function makeEvent(input: EventInput): Record<string, unknown> {
    const event: Record<string, unknown> = {
        lead_id: input.lead_id ?? 'lead-1',
        event_type: input.event_type,
        source: input.source ?? 'outreach',
        occurred_at: input.occurred_at ?? '2026-03-10T09:00:00.000Z',
        payload: input.payload ?? {}
    };
    if (input.email !== undefined) event.email = input.email;
    if (input.external_id !== undefined) event.external_id = input.external_id;
    return event;
}

export function signalWith(fields: Partial<EngagementSignal>): EngagementSignal {
    return { ...createEmptySignal({ leadId: 'lead-1' }, NOW, 'sig-1'), ...fields };
}

export function transitionRecord(from: Platform, to: RoutedPlatform): PlatformTransitionRecord {
    const inputs: AuthorizingSnapshot = {
        signal_id: 'sig-1',
        version: 3,
        engagement_score: 55,
        engagement_level: EngagementLevel.WARM,
        emails_opened: 3,
        recent_opens: 3,
        emails_replied: 0,
        meetings_booked: 0,
        forms_submitted: 0,
        requested_contact: false,
        network_connected: false,
        website_visits: 0,
        crm_activity: false
    };
    return {
        id: 'tr-1',
        sequence: 7,
        signal_id: 'sig-1',
        lead_id: 'lead-1',
        email: 'ada@example.com',
        from_platform: from,
        to_platform: to,
        reason: TransitionReason.SCORE_THRESHOLD,
        trigger_event: 'email_opened',
        trigger_payload: {},
        engagement_score_at_transition: 55,
        engagement_level_at_transition: EngagementLevel.WARM,
        routing_decision: {
            decision_id: 'd-1',
            from_platform: from,
            to_platform: to,
            reason: TransitionReason.SCORE_THRESHOLD,
            priority: 3,
            manual_override: false,
            actor: null,
            note: null,
            evaluated_at: NOW.toISOString(),
            inputs,
            confidence: 0.6,
            recommended_sequence: 'engaged_followup_sequence',
            urgency: 7,
            reasoning: ['Score reached the high-water mark']
        },
        decision_id: 'd-1',
        manual_override: false,
        actor: null,
        created_at: NOW
    };
}

export function committed<T>(value: T | null | undefined, what = 'value'): T {
    if (value === null || value === undefined) {
        throw new Error(`expected a ${what}`);
    }
    return value;
}

export function flushAsync(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}
