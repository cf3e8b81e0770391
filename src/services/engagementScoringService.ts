/**
 * Engagement Scoring Service
 *
 * Deterministic score (0-100) and level for a lead aggregate, as of a given
 * instant. Derived only from counters, flags and last-occurrence timestamps;
 * counters themselves are never decayed or rewritten.
 *
 * Families:
 *   - Intent      reply, meeting, form, contact request (each alone reaches hot)
 *   - Repeated    open streak, repeat visits, repeat messages, pricing/demo (reaches warm)
 *   - Light       any single touch (reaches lukewarm)
 */

import { EngagementLevel, EngagementSignal } from '../types';
import { LevelThresholds, ScoringConfig, DEFAULT_ENGINE_CONFIG } from '../config';

// ============================================================================
// TYPES
// ============================================================================

export type ScoreFamily = 'intent' | 'repeated' | 'light';

export interface SignalContribution {
    family: ScoreFamily;
    signal: string;
    factor: number;
    points: number;
}

export interface ScoreBreakdown {
    intent: number;
    repeated: number;
    light: number;
    contributions: SignalContribution[];
}

export interface ScoreResult {
    score: number;
    level: EngagementLevel;
    breakdown: ScoreBreakdown;
}

/**
 * Fields the scorer reads. Snapshots from the store and freshly folded
 * aggregates both satisfy it.
 */
export type ScorableSignal = Pick<
    EngagementSignal,
    | 'emails_opened'
    | 'emails_clicked'
    | 'emails_replied'
    | 'last_email_open_at'
    | 'last_email_click_at'
    | 'last_email_reply_at'
    | 'recent_open_at'
    | 'network_connected'
    | 'network_messages_received'
    | 'network_profile_viewed'
    | 'last_network_activity_at'
    | 'website_visits'
    | 'last_website_visit_at'
    | 'visitor_identified'
    | 'viewed_pricing'
    | 'viewed_demo'
    | 'forms_submitted'
    | 'last_form_submitted_at'
    | 'downloaded_content'
    | 'requested_contact'
    | 'requested_contact_at'
    | 'meetings_booked'
    | 'meetings_completed'
    | 'last_meeting_at'
    | 'last_crm_activity_at'
>;

interface CandidateSignal {
    signal: string;
    present: boolean;
    at: Date | null;
}

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// PRIMITIVES
// ============================================================================

/**
 * Recency multiplier for a signal last seen at `at`. Whole days elapsed pick
 * the band; a missing or future timestamp counts as fresh.
 */
export function recencyFactor(at: Date | null, asOf: Date, config: ScoringConfig): number {
    if (!at) return 1;

    const days = Math.floor((asOf.getTime() - at.getTime()) / DAY_MS);
    if (days < 0) return 1;

    for (const band of config.recencyBands) {
        if (days <= band.maxDays) {
            return band.factor;
        }
    }
    return config.staleFactor;
}

/**
 * Opens inside the trailing window ending at asOf.
 */
export function countRecentOpens(
    snapshot: Pick<EngagementSignal, 'recent_open_at'>,
    asOf: Date,
    windowDays: number
): number {
    const cutoff = asOf.getTime() - windowDays * DAY_MS;
    return snapshot.recent_open_at.filter((openedAt) => openedAt.getTime() >= cutoff).length;
}

/**
 * Map a score onto its level. Thresholds are validated ascending at load,
 * so the bands never overlap.
 */
export function classifyScore(score: number, thresholds: LevelThresholds): EngagementLevel {
    if (score >= thresholds.hot) return EngagementLevel.HOT;
    if (score >= thresholds.warm) return EngagementLevel.WARM;
    if (score >= thresholds.lukewarm) return EngagementLevel.LUKEWARM;
    return EngagementLevel.COLD;
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

// ============================================================================
// FAMILIES
// ============================================================================

function scoreIntent(snapshot: ScorableSignal, asOf: Date, config: ScoringConfig): SignalContribution[] {
    const weights = config.intentWeights;
    const candidates: Array<CandidateSignal & { weight: number }> = [
        { signal: 'email_reply', present: snapshot.emails_replied > 0, at: snapshot.last_email_reply_at, weight: weights.emailReply },
        { signal: 'meeting_booked', present: snapshot.meetings_booked > 0, at: snapshot.last_meeting_at, weight: weights.meetingBooked },
        { signal: 'meeting_completed', present: snapshot.meetings_completed > 0, at: snapshot.last_meeting_at, weight: weights.meetingCompleted },
        { signal: 'form_submitted', present: snapshot.forms_submitted > 0, at: snapshot.last_form_submitted_at, weight: weights.formSubmitted },
        { signal: 'requested_contact', present: snapshot.requested_contact, at: snapshot.requested_contact_at, weight: weights.requestedContact }
    ];

    const active = candidates
        .filter((c) => c.present)
        .map((c) => {
            const factor = recencyFactor(c.at, asOf, config);
            return { signal: c.signal, factor, full: c.weight * factor };
        })
        .filter((c) => c.factor > 0)
        .sort((a, b) => b.full - a.full);

    return active.map((c, index) => ({
        family: 'intent' as const,
        signal: c.signal,
        factor: c.factor,
        points: index === 0 ? c.full : config.intentAdditionalBonus * c.factor
    }));
}

function scoreRepeated(snapshot: ScorableSignal, asOf: Date, config: ScoringConfig): SignalContribution[] {
    const qualifying: Array<{ signal: string; factor: number }> = [];

    if (countRecentOpens(snapshot, asOf, config.openWindowDays) >= config.openWindowMinOpens) {
        qualifying.push({ signal: 'open_streak', factor: 1 });
    }
    if (snapshot.website_visits >= config.repeatedVisitsMin) {
        qualifying.push({ signal: 'repeat_visits', factor: recencyFactor(snapshot.last_website_visit_at, asOf, config) });
    }
    if (snapshot.network_messages_received >= config.repeatedMessagesMin) {
        qualifying.push({ signal: 'repeat_messages', factor: recencyFactor(snapshot.last_network_activity_at, asOf, config) });
    }
    if (snapshot.viewed_pricing || snapshot.viewed_demo) {
        qualifying.push({ signal: 'pricing_or_demo', factor: recencyFactor(snapshot.last_website_visit_at, asOf, config) });
    }

    const best = qualifying.filter((q) => q.factor > 0).sort((a, b) => b.factor - a.factor)[0];
    if (!best) return [];

    return [{
        family: 'repeated',
        signal: best.signal,
        factor: best.factor,
        points: config.repeatedEngagementWeight * best.factor
    }];
}

function scoreLight(snapshot: ScorableSignal, asOf: Date, config: ScoringConfig): SignalContribution[] {
    const candidates: CandidateSignal[] = [
        { signal: 'email_open', present: snapshot.emails_opened > 0, at: snapshot.last_email_open_at },
        { signal: 'email_click', present: snapshot.emails_clicked > 0, at: snapshot.last_email_click_at },
        { signal: 'network_connected', present: snapshot.network_connected, at: snapshot.last_network_activity_at },
        { signal: 'network_message_received', present: snapshot.network_messages_received > 0, at: snapshot.last_network_activity_at },
        { signal: 'network_profile_viewed', present: snapshot.network_profile_viewed, at: snapshot.last_network_activity_at },
        { signal: 'website_visit', present: snapshot.website_visits > 0, at: snapshot.last_website_visit_at },
        { signal: 'visitor_identified', present: snapshot.visitor_identified, at: snapshot.last_website_visit_at },
        { signal: 'content_downloaded', present: snapshot.downloaded_content, at: snapshot.last_crm_activity_at }
    ];

    const active = candidates
        .filter((c) => c.present)
        .map((c) => ({ signal: c.signal, factor: recencyFactor(c.at, asOf, config) }))
        .filter((c) => c.factor > 0)
        .sort((a, b) => b.factor - a.factor);

    let remaining = config.lightCap;
    const contributions: SignalContribution[] = [];
    active.forEach((c, index) => {
        const weight = index === 0 ? config.lightFirstWeight : config.lightAdditionalWeight;
        const points = Math.min(weight * c.factor, remaining);
        remaining -= points;
        contributions.push({ family: 'light', signal: c.signal, factor: c.factor, points });
    });
    return contributions;
}

// ============================================================================
// SCORE
// ============================================================================

/**
 * Score a snapshot as of `asOf`. Same inputs, same output.
 */
export function scoreSignal(
    snapshot: ScorableSignal,
    asOf: Date,
    config: ScoringConfig = DEFAULT_ENGINE_CONFIG.scoring
): ScoreResult {
    const contributions = [
        ...scoreIntent(snapshot, asOf, config),
        ...scoreRepeated(snapshot, asOf, config),
        ...scoreLight(snapshot, asOf, config)
    ];

    const sumOf = (family: ScoreFamily) =>
        contributions.filter((c) => c.family === family).reduce((total, c) => total + c.points, 0);

    const intent = sumOf('intent');
    const repeated = sumOf('repeated');
    const light = sumOf('light');

    const score = round2(Math.min(100, Math.max(0, intent + repeated + light)));

    return {
        score,
        level: classifyScore(score, config.thresholds),
        breakdown: {
            intent: round2(intent),
            repeated: round2(repeated),
            light: round2(light),
            contributions
        }
    };
}
