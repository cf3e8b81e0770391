/**
 * Routing Decision Service
 *
 * Decides whether a lead should move along none → outreach → hybrid → crm.
 * Pure: returns a TransitionDecision value (or null) and never writes.
 * The transition executor commits what this returns.
 *
 * Priorities (only the highest applicable one is considered):
 *   1. reply, meeting booked, form submitted or contact request   → crm
 *   2. open streak in the trailing window while on outreach       → hybrid
 *   3. score at or above the high-water mark on outreach/hybrid   → crm
 */

import { createHash } from 'crypto';
import {
    AuthorizingSnapshot,
    EngagementLevel,
    EngagementSignal,
    EventSource,
    Platform,
    PLATFORM_RANK,
    RoutedPlatform,
    RoutingDecisionRecord,
    TransitionDecision,
    TransitionReason
} from '../types';
import { EngineConfig, DEFAULT_ENGINE_CONFIG } from '../config';
import { IllegalTransitionError } from '../utils/appError';
import { countRecentOpens, scoreSignal } from './engagementScoringService';

// ============================================================================
// TYPES
// ============================================================================

export interface DecisionTrigger {
    eventType: string;
    source: EventSource;
    payload: Record<string, unknown>;
}

export const RECONCILIATION_TRIGGER: DecisionTrigger = {
    eventType: 'reconciliation',
    source: EventSource.MANUAL,
    payload: {}
};

interface Proposal {
    target: RoutedPlatform;
    reason: TransitionReason;
    priority: number;
}

// ============================================================================
// TRANSITION GRAPH
// ============================================================================

/**
 * True when `to` is strictly further along the graph than `from`.
 */
export function isForwardTransition(from: Platform, to: Platform): boolean {
    return PLATFORM_RANK[to] > PLATFORM_RANK[from];
}

export type TransitionMode = 'automated' | 'assignment' | 'override';

/**
 * Throws IllegalTransitionError unless the move is allowed for the mode.
 * - automated / assignment: forward only, never out of crm
 * - override: any direction, but crm only to crm, never to none
 */
export function assertLegalTransition(from: Platform, to: Platform, mode: TransitionMode): void {
    if (to === Platform.NONE) {
        throw new IllegalTransitionError(from, to, `Cannot route a lead to ${Platform.NONE}`);
    }

    if (mode === 'override') {
        if (from === Platform.CRM && to !== Platform.CRM) {
            throw new IllegalTransitionError(from, to, `Override cannot move a lead out of ${Platform.CRM}`);
        }
        return;
    }

    if (from === Platform.CRM) {
        throw new IllegalTransitionError(from, to, `${Platform.CRM} is terminal for ${mode} routing`);
    }
    if (!isForwardTransition(from, to)) {
        throw new IllegalTransitionError(from, to, `Backward ${mode} transition ${from} -> ${to}`);
    }
}

// ============================================================================
// DECISION
// ============================================================================

export function buildAuthorizingSnapshot(
    snapshot: EngagementSignal,
    asOf: Date,
    config: EngineConfig = DEFAULT_ENGINE_CONFIG
): AuthorizingSnapshot {
    return {
        signal_id: snapshot.id,
        version: snapshot.version,
        engagement_score: snapshot.engagement_score,
        engagement_level: snapshot.engagement_level,
        emails_opened: snapshot.emails_opened,
        recent_opens: countRecentOpens(snapshot, asOf, config.scoring.openWindowDays),
        emails_replied: snapshot.emails_replied,
        meetings_booked: snapshot.meetings_booked,
        forms_submitted: snapshot.forms_submitted,
        requested_contact: snapshot.requested_contact,
        network_connected: snapshot.network_connected,
        website_visits: snapshot.website_visits,
        crm_activity: snapshot.last_crm_activity_at !== null
    };
}

/**
 * The snapshot with its score and level recomputed as of `asOf`. Stored
 * scores are as of the last event; sweeps that decide later decay them first.
 */
export function rescoreAt(snapshot: EngagementSignal, asOf: Date, config: EngineConfig = DEFAULT_ENGINE_CONFIG): EngagementSignal {
    const { score, level } = scoreSignal(snapshot, asOf, config.scoring);
    return { ...snapshot, engagement_score: score, engagement_level: level };
}

export function decisionIdFor(leadKey: string, target: Platform, version: number): string {
    return createHash('sha256').update(`${leadKey}|${target}|${version}`).digest('hex').slice(0, 32);
}

function intentReason(snapshot: EngagementSignal): TransitionReason | null {
    if (snapshot.emails_replied > 0) return TransitionReason.EMAIL_REPLY;
    if (snapshot.meetings_booked > 0) return TransitionReason.MEETING_BOOKED;
    if (snapshot.forms_submitted > 0) return TransitionReason.FORM_SUBMITTED;
    if (snapshot.requested_contact) return TransitionReason.REQUESTED_CONTACT;
    return null;
}

function propose(current: Platform, snapshot: EngagementSignal, asOf: Date, config: EngineConfig): Proposal | null {
    const reason = intentReason(snapshot);
    if (reason) {
        return { target: Platform.CRM, reason, priority: 1 };
    }

    const recentOpens = countRecentOpens(snapshot, asOf, config.scoring.openWindowDays);
    if (recentOpens >= config.scoring.openWindowMinOpens && current === Platform.OUTREACH) {
        return { target: Platform.HYBRID, reason: TransitionReason.HIGH_OPEN_ENGAGEMENT, priority: 2 };
    }

    if (
        snapshot.engagement_score >= config.routing.highWaterMark &&
        (current === Platform.OUTREACH || current === Platform.HYBRID)
    ) {
        return { target: Platform.CRM, reason: TransitionReason.SCORE_THRESHOLD, priority: 3 };
    }

    return null;
}

/**
 * Decide the next platform for a lead, or null when it should stay put.
 * `crm` is terminal; a target that is not strictly forward is never proposed.
 */
export function decideTransition(
    current: Platform,
    snapshot: EngagementSignal,
    trigger: DecisionTrigger,
    asOf: Date,
    config: EngineConfig = DEFAULT_ENGINE_CONFIG
): TransitionDecision | null {
    if (current === Platform.CRM) {
        return null;
    }

    const proposal = propose(current, snapshot, asOf, config);
    if (!proposal || !isForwardTransition(current, proposal.target)) {
        return null;
    }

    const leadKey = snapshot.lead_id ?? `email:${snapshot.email ?? ''}`;

    return {
        decisionId: decisionIdFor(leadKey, proposal.target, snapshot.version),
        signalId: snapshot.id,
        leadId: snapshot.lead_id,
        email: snapshot.email,
        from: current,
        target: proposal.target,
        reason: proposal.reason,
        priority: proposal.priority,
        triggerEventType: trigger.eventType,
        triggerSource: trigger.source,
        triggerPayload: trigger.payload,
        authorizingSnapshot: buildAuthorizingSnapshot(snapshot, asOf, config),
        evaluatedAt: asOf,
        manualOverride: false,
        actor: null,
        note: null
    };
}

// ============================================================================
// GUIDANCE
// ============================================================================

const FOLLOW_UP: Record<EngagementLevel, { sequence: string; urgency: number }> = {
    [EngagementLevel.HOT]: { sequence: 'hot_lead_immediate', urgency: 9 },
    [EngagementLevel.WARM]: { sequence: 'engaged_followup_sequence', urgency: 7 },
    [EngagementLevel.LUKEWARM]: { sequence: 'warm_nurture_sequence', urgency: 5 },
    [EngagementLevel.COLD]: { sequence: 'cold_outbound_sequence', urgency: 3 }
};

const REASON_TEXT: Record<TransitionReason, string> = {
    [TransitionReason.EMAIL_REPLY]: 'Replied to an email',
    [TransitionReason.MEETING_BOOKED]: 'Booked a meeting',
    [TransitionReason.FORM_SUBMITTED]: 'Submitted a form',
    [TransitionReason.REQUESTED_CONTACT]: 'Requested contact',
    [TransitionReason.HIGH_OPEN_ENGAGEMENT]: 'Repeated opens in the trailing window',
    [TransitionReason.SCORE_THRESHOLD]: 'Score reached the high-water mark',
    [TransitionReason.OPERATOR_ASSIGNMENT]: 'Assigned by an operator',
    [TransitionReason.MANUAL_OVERRIDE]: 'Manual override'
};

export interface DecisionGuidance {
    confidence: number;
    recommendedSequence: string;
    urgency: number;
    reasoning: string[];
}

/**
 * Follow-up guidance derived from the inputs alone. Confidence grows with the
 * number of channels the lead has shown activity on.
 */
export function guidanceFor(inputs: AuthorizingSnapshot, reason: TransitionReason): DecisionGuidance {
    const channels = [
        inputs.emails_opened > 0,
        inputs.emails_replied > 0,
        inputs.network_connected,
        inputs.website_visits > 0,
        inputs.crm_activity
    ].filter(Boolean).length;
    const followUp = FOLLOW_UP[inputs.engagement_level];

    const reasoning = [REASON_TEXT[reason], `Engagement ${inputs.engagement_level} at score ${inputs.engagement_score}`];
    if (inputs.emails_replied > 0) reasoning.push(`Replied to ${inputs.emails_replied} email(s)`);
    if (inputs.meetings_booked > 0) reasoning.push(`Has ${inputs.meetings_booked} meeting(s) booked`);
    if (inputs.recent_opens > 0) reasoning.push(`Opened ${inputs.recent_opens} email(s) recently`);
    if (inputs.website_visits > 0) reasoning.push(`Visited the website ${inputs.website_visits} time(s)`);

    return {
        confidence: Math.round(Math.min(0.5 + channels * 0.1, 0.95) * 100) / 100,
        recommendedSequence: followUp.sequence,
        urgency: followUp.urgency,
        reasoning
    };
}

/**
 * The inputs a decision considered, in the form stored with the transition
 * and as the aggregate's last_routing_decision.
 */
export function explainDecision(decision: TransitionDecision): RoutingDecisionRecord {
    const guidance = guidanceFor(decision.authorizingSnapshot, decision.reason);
    return {
        decision_id: decision.decisionId,
        from_platform: decision.from,
        to_platform: decision.target,
        reason: decision.reason,
        priority: decision.priority,
        manual_override: decision.manualOverride,
        actor: decision.actor,
        note: decision.note,
        evaluated_at: decision.evaluatedAt.toISOString(),
        inputs: { ...decision.authorizingSnapshot },
        confidence: guidance.confidence,
        recommended_sequence: guidance.recommendedSequence,
        urgency: guidance.urgency,
        reasoning: guidance.reasoning
    };
}
