/**
 * Signal Aggregator
 *
 * Folds one engagement event into a lead aggregate. Pure: returns a new
 * aggregate, never mutates its input. Shared by the write path
 * (eventService) and replay so both produce the same state from the same
 * event sequence.
 *
 * Rules:
 *   - counters only increment
 *   - flags only go true (signal_reset may lower the resettable ones)
 *   - last-occurrence timestamps only move forward
 */

import { randomUUID } from 'crypto';
import {
    EngagementEventRecord,
    EngagementEventType,
    EngagementLevel,
    EngagementSignal,
    LeadIdentity,
    Platform,
    PLATFORMS,
    RESETTABLE_FLAGS,
    ResettableFlag,
    RoutingDecisionRecord
} from '../types';
import { ScoringConfig, DEFAULT_ENGINE_CONFIG } from '../config';
import { scoreSignal } from './engagementScoringService';

export const MAX_RECENT_OPENS = 20;
export const MAX_PAGES_VIEWED = 50;

export type FoldableEvent = Pick<EngagementEventRecord, 'event_type' | 'payload' | 'occurred_at'>;

// ============================================================================
// CONSTRUCTION
// ============================================================================

/**
 * Default aggregate for a lead with no events: score 0, cold, not routed.
 */
export function createEmptySignal(identity: LeadIdentity, now: Date = new Date(), id: string = randomUUID()): EngagementSignal {
    return {
        id,
        lead_id: identity.leadId ?? null,
        email: identity.email ?? null,

        emails_sent: 0,
        emails_opened: 0,
        emails_clicked: 0,
        emails_replied: 0,
        emails_bounced: 0,
        last_email_sent_at: null,
        last_email_open_at: null,
        last_email_click_at: null,
        last_email_reply_at: null,
        last_email_bounce_at: null,
        recent_open_at: [],

        network_connected: false,
        network_connected_at: null,
        network_messages_sent: 0,
        network_messages_received: 0,
        network_profile_viewed: false,
        last_network_activity_at: null,

        website_visits: 0,
        pages_viewed: [],
        last_website_visit_at: null,
        visitor_identified: false,
        visitor_identified_at: null,
        viewed_pricing: false,
        viewed_demo: false,

        forms_submitted: 0,
        last_form_submitted_at: null,
        downloaded_content: false,
        requested_contact: false,
        requested_contact_at: null,
        meetings_booked: 0,
        meetings_completed: 0,
        meetings_no_show: 0,
        last_meeting_at: null,
        crm_stage: null,
        last_crm_activity_at: null,

        engagement_score: 0,
        engagement_level: EngagementLevel.COLD,
        scored_at: null,

        current_platform: Platform.NONE,
        last_routing_decision: null,
        last_routed_at: null,
        transition_count: 0,

        version: 0,
        created_at: now,
        updated_at: now
    };
}

// ============================================================================
// HELPERS
// ============================================================================

function laterOf(existing: Date | null, candidate: Date): Date {
    return existing && existing.getTime() >= candidate.getTime() ? existing : candidate;
}

function earlierOf(existing: Date | null, candidate: Date): Date {
    return existing && existing.getTime() <= candidate.getTime() ? existing : candidate;
}

function recordOpen(opens: Date[], openedAt: Date): Date[] {
    return [...opens, openedAt]
        .sort((a, b) => a.getTime() - b.getTime())
        .slice(-MAX_RECENT_OPENS);
}

function recordPage(pages: string[], page: string): string[] {
    return [...pages.filter((p) => p !== page), page].slice(-MAX_PAGES_VIEWED);
}

function pageOf(payload: Record<string, unknown>): string | null {
    const page = payload.page ?? payload.url ?? payload.path;
    return typeof page === 'string' && page.trim().length > 0 ? page.trim() : null;
}

function isResettableFlag(value: unknown): value is ResettableFlag {
    return typeof value === 'string' && RESETTABLE_FLAGS.some((flag) => flag === value);
}

export function parsePlatform(value: unknown): Platform | null {
    return PLATFORMS.find((platform) => platform === value) ?? null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow a routing decision read back from a JSON payload.
 */
export function isRoutingDecisionRecord(value: unknown): value is RoutingDecisionRecord {
    return (
        isRecord(value) &&
        typeof value.decision_id === 'string' &&
        parsePlatform(value.from_platform) !== null &&
        parsePlatform(value.to_platform) !== null &&
        typeof value.reason === 'string' &&
        typeof value.manual_override === 'boolean' &&
        isRecord(value.inputs) &&
        typeof value.recommended_sequence === 'string' &&
        typeof value.urgency === 'number' &&
        Array.isArray(value.reasoning)
    );
}

function applyPageView(signal: EngagementSignal, page: string | null, at: Date): void {
    signal.last_website_visit_at = laterOf(signal.last_website_visit_at, at);
    if (!page) return;

    const normalized = page.toLowerCase();
    if (normalized.includes('pricing')) signal.viewed_pricing = true;
    if (normalized.includes('demo')) signal.viewed_demo = true;
    signal.pages_viewed = recordPage(signal.pages_viewed, page);
}

// ============================================================================
// FOLD
// ============================================================================

/**
 * Apply one event's effect to the aggregate. Does not touch score, level or
 * version.
 */
export function foldEvent(current: EngagementSignal, event: FoldableEvent): EngagementSignal {
    const signal: EngagementSignal = {
        ...current,
        recent_open_at: [...current.recent_open_at],
        pages_viewed: [...current.pages_viewed]
    };
    const at = event.occurred_at;
    const payload = event.payload;

    switch (event.event_type) {
        case EngagementEventType.EMAIL_SENT:
            signal.emails_sent++;
            signal.last_email_sent_at = laterOf(signal.last_email_sent_at, at);
            break;

        case EngagementEventType.EMAIL_OPENED:
            signal.emails_opened++;
            signal.last_email_open_at = laterOf(signal.last_email_open_at, at);
            signal.recent_open_at = recordOpen(signal.recent_open_at, at);
            break;

        case EngagementEventType.EMAIL_CLICKED:
            signal.emails_clicked++;
            signal.last_email_click_at = laterOf(signal.last_email_click_at, at);
            break;

        case EngagementEventType.EMAIL_REPLIED:
            signal.emails_replied++;
            signal.last_email_reply_at = laterOf(signal.last_email_reply_at, at);
            break;

        case EngagementEventType.EMAIL_BOUNCED:
            signal.emails_bounced++;
            signal.last_email_bounce_at = laterOf(signal.last_email_bounce_at, at);
            break;

        case EngagementEventType.NETWORK_CONNECTED:
            signal.network_connected = true;
            signal.network_connected_at = earlierOf(signal.network_connected_at, at);
            signal.last_network_activity_at = laterOf(signal.last_network_activity_at, at);
            break;

        case EngagementEventType.NETWORK_MESSAGE_SENT:
            signal.network_messages_sent++;
            signal.last_network_activity_at = laterOf(signal.last_network_activity_at, at);
            break;

        case EngagementEventType.NETWORK_MESSAGE_RECEIVED:
            signal.network_messages_received++;
            signal.last_network_activity_at = laterOf(signal.last_network_activity_at, at);
            break;

        case EngagementEventType.NETWORK_PROFILE_VIEWED:
            signal.network_profile_viewed = true;
            signal.last_network_activity_at = laterOf(signal.last_network_activity_at, at);
            break;

        case EngagementEventType.WEBSITE_VISIT:
            signal.website_visits++;
            applyPageView(signal, pageOf(payload), at);
            break;

        case EngagementEventType.PAGE_VIEW:
            applyPageView(signal, pageOf(payload), at);
            break;

        case EngagementEventType.VISITOR_IDENTIFIED:
            signal.visitor_identified = true;
            signal.visitor_identified_at = earlierOf(signal.visitor_identified_at, at);
            signal.last_website_visit_at = laterOf(signal.last_website_visit_at, at);
            break;

        case EngagementEventType.FORM_SUBMITTED:
            signal.forms_submitted++;
            signal.last_form_submitted_at = laterOf(signal.last_form_submitted_at, at);
            signal.last_crm_activity_at = laterOf(signal.last_crm_activity_at, at);
            break;

        case EngagementEventType.CONTENT_DOWNLOADED:
            signal.downloaded_content = true;
            signal.last_crm_activity_at = laterOf(signal.last_crm_activity_at, at);
            break;

        case EngagementEventType.CONTACT_REQUESTED:
            signal.requested_contact = true;
            signal.requested_contact_at = earlierOf(signal.requested_contact_at, at);
            signal.last_crm_activity_at = laterOf(signal.last_crm_activity_at, at);
            break;

        case EngagementEventType.MEETING_BOOKED:
            signal.meetings_booked++;
            signal.last_meeting_at = laterOf(signal.last_meeting_at, at);
            signal.last_crm_activity_at = laterOf(signal.last_crm_activity_at, at);
            break;

        case EngagementEventType.MEETING_COMPLETED:
            signal.meetings_completed++;
            signal.last_meeting_at = laterOf(signal.last_meeting_at, at);
            signal.last_crm_activity_at = laterOf(signal.last_crm_activity_at, at);
            break;

        case EngagementEventType.MEETING_NO_SHOW:
            signal.meetings_no_show++;
            signal.last_crm_activity_at = laterOf(signal.last_crm_activity_at, at);
            break;

        case EngagementEventType.PIPELINE_STAGE_CHANGED:
            if (typeof payload.stage === 'string') {
                signal.crm_stage = payload.stage;
            }
            signal.last_crm_activity_at = laterOf(signal.last_crm_activity_at, at);
            break;

        case EngagementEventType.SIGNAL_RESET: {
            const flags = Array.isArray(payload.flags) ? payload.flags : [];
            for (const flag of flags) {
                if (isResettableFlag(flag)) {
                    signal[flag] = false;
                }
            }
            break;
        }

        case EngagementEventType.PLATFORM_TRANSITION: {
            const target = parsePlatform(payload.to_platform);
            if (target) {
                signal.current_platform = target;
            }
            signal.transition_count++;
            signal.last_routed_at = laterOf(signal.last_routed_at, at);
            if (isRoutingDecisionRecord(payload.routing_decision)) {
                signal.last_routing_decision = payload.routing_decision;
            }
            break;
        }
    }

    return signal;
}

/**
 * Fold an event and rescore. The score is taken as of the later of the
 * previous scoring instant and the event's occurred_at, so replaying the log
 * in sequence order reproduces the stored score. Platform transitions do not
 * rescore.
 */
export function foldAndScore(
    current: EngagementSignal,
    event: FoldableEvent,
    config: ScoringConfig = DEFAULT_ENGINE_CONFIG.scoring
): EngagementSignal {
    const folded = foldEvent(current, event);
    if (event.event_type === EngagementEventType.PLATFORM_TRANSITION) {
        return folded;
    }

    const asOf = laterOf(current.scored_at, event.occurred_at);
    const { score, level } = scoreSignal(folded, asOf, config);
    folded.engagement_score = score;
    folded.engagement_level = level;
    folded.scored_at = asOf;
    return folded;
}
