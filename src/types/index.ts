/**
 * Lead Routing Type Definitions
 *
 * Central location for the enums, records and interfaces shared by the
 * event model, signal store, scoring, decision engine and executor.
 * Persisted records use the column names of sql/schema.sql.
 */

// ============================================================================
// EVENT TYPES
// ============================================================================

/**
 * Closed set of engagement event types. Anything else is rejected at the
 * validator.
 */
export enum EngagementEventType {
    // Cold-outreach email
    EMAIL_SENT = 'email_sent',
    EMAIL_OPENED = 'email_opened',
    EMAIL_CLICKED = 'email_clicked',
    EMAIL_REPLIED = 'email_replied',
    EMAIL_BOUNCED = 'email_bounced',

    // Professional network
    NETWORK_CONNECTED = 'network_connected',
    NETWORK_MESSAGE_SENT = 'network_message_sent',
    NETWORK_MESSAGE_RECEIVED = 'network_message_received',
    NETWORK_PROFILE_VIEWED = 'network_profile_viewed',

    // Website / visitor identification
    WEBSITE_VISIT = 'website_visit',
    PAGE_VIEW = 'page_view',
    VISITOR_IDENTIFIED = 'visitor_identified',

    // CRM / inbound intent
    FORM_SUBMITTED = 'form_submitted',
    CONTENT_DOWNLOADED = 'content_downloaded',
    CONTACT_REQUESTED = 'contact_requested',
    MEETING_BOOKED = 'meeting_booked',
    MEETING_COMPLETED = 'meeting_completed',
    MEETING_NO_SHOW = 'meeting_no_show',
    PIPELINE_STAGE_CHANGED = 'pipeline_stage_changed',

    // Administrative
    SIGNAL_RESET = 'signal_reset',

    // Written only by the transition executor
    PLATFORM_TRANSITION = 'platform_transition'
}

export const ENGAGEMENT_EVENT_TYPES = Object.values(EngagementEventType);

/**
 * Event types an upstream adapter may not submit.
 */
export const RESERVED_EVENT_TYPES: readonly EngagementEventType[] = [
    EngagementEventType.PLATFORM_TRANSITION
];

// ============================================================================
// EVENT SOURCES
// ============================================================================

/**
 * Originating system of an event. Provenance is advisory: unknown sources
 * are accepted and tagged UNVERIFIED.
 */
export enum EventSource {
    OUTREACH_PLATFORM = 'outreach_platform',
    CRM_PLATFORM = 'crm_platform',
    NETWORK_PLATFORM = 'network_platform',
    VISITOR_ID_PROVIDER = 'visitor_id_provider',
    WEBSITE = 'website',
    MANUAL = 'manual',
    UNVERIFIED = 'unverified'
}

/**
 * Vendor and shorthand names adapters commonly send, by source family.
 */
export const SOURCE_ALIASES: Record<string, EventSource> = {
    outreach: EventSource.OUTREACH_PLATFORM,
    instantly: EventSource.OUTREACH_PLATFORM,
    crm: EventSource.CRM_PLATFORM,
    gohighlevel: EventSource.CRM_PLATFORM,
    ghl: EventSource.CRM_PLATFORM,
    hubspot: EventSource.CRM_PLATFORM,
    network: EventSource.NETWORK_PLATFORM,
    linkedin: EventSource.NETWORK_PLATFORM,
    heyreach: EventSource.NETWORK_PLATFORM,
    rb2b: EventSource.VISITOR_ID_PROVIDER,
    clearbit: EventSource.VISITOR_ID_PROVIDER,
    web: EventSource.WEBSITE,
    site: EventSource.WEBSITE,
    admin: EventSource.MANUAL,
    operator: EventSource.MANUAL
};

// ============================================================================
// PLATFORMS & LEVELS
// ============================================================================

/**
 * Outbound-communication platform a lead is currently routed through.
 * - NONE: not yet routed
 * - OUTREACH: cold-outreach sequences
 * - HYBRID: engaged on outreach, mirrored into the CRM
 * - CRM: relationship platform (terminal for automated routing)
 */
export enum Platform {
    NONE = 'none',
    OUTREACH = 'outreach',
    HYBRID = 'hybrid',
    CRM = 'crm'
}

export type RoutedPlatform = Exclude<Platform, Platform.NONE>;

/**
 * Position on the legal graph none → outreach → hybrid → crm.
 */
export const PLATFORM_RANK: Record<Platform, number> = {
    [Platform.NONE]: 0,
    [Platform.OUTREACH]: 1,
    [Platform.HYBRID]: 2,
    [Platform.CRM]: 3
};

export enum EngagementLevel {
    COLD = 'cold',
    LUKEWARM = 'lukewarm',
    WARM = 'warm',
    HOT = 'hot'
}

export const ENGAGEMENT_LEVELS: readonly EngagementLevel[] = [
    EngagementLevel.COLD,
    EngagementLevel.LUKEWARM,
    EngagementLevel.WARM,
    EngagementLevel.HOT
];

export const PLATFORMS: readonly Platform[] = [
    Platform.NONE,
    Platform.OUTREACH,
    Platform.HYBRID,
    Platform.CRM
];

// ============================================================================
// TRANSITIONS & COMMANDS
// ============================================================================

export enum TransitionReason {
    EMAIL_REPLY = 'email_reply',
    MEETING_BOOKED = 'meeting_booked',
    FORM_SUBMITTED = 'form_submitted',
    REQUESTED_CONTACT = 'requested_contact',
    HIGH_OPEN_ENGAGEMENT = 'high_open_engagement',
    SCORE_THRESHOLD = 'score_threshold',
    OPERATOR_ASSIGNMENT = 'operator_assignment',
    MANUAL_OVERRIDE = 'manual_override'
}

/**
 * Commands for the platform-adapter executors. This service never calls a
 * vendor API; it only emits these after a transition commits.
 */
export enum RoutingCommandType {
    ENROLL_IN_CRM = 'EnrollInCRM',
    REMOVE_FROM_OUTREACH = 'RemoveFromOutreach',
    MARK_HYBRID = 'MarkHybrid',
    ENROLL_IN_OUTREACH = 'EnrollInOutreach'
}

export interface RoutingCommand {
    commandId: string;          // <transitionId>:<type>, idempotency key for executors
    type: RoutingCommandType;
    leadId: string | null;
    email: string | null;
    transitionId: string;
    fromPlatform: Platform;
    toPlatform: RoutedPlatform;
    recommendedSequence: string;
    urgency: number;
    issuedAt: Date;
}

/**
 * Flags the administrative reset event may lower.
 */
export const RESETTABLE_FLAGS = [
    'network_connected',
    'network_profile_viewed',
    'visitor_identified',
    'viewed_pricing',
    'viewed_demo',
    'downloaded_content',
    'requested_contact'
] as const;

export type ResettableFlag = typeof RESETTABLE_FLAGS[number];

// ============================================================================
// IDENTITY
// ============================================================================

/**
 * A lead is addressed by its upstream id, its primary email, or both.
 */
export interface LeadIdentity {
    leadId?: string;
    email?: string;
}

// ============================================================================
// PERSISTED RECORDS
// ============================================================================

/**
 * Inputs the decision engine considered, stored with every transition and
 * as the aggregate's last_routing_decision.
 */
export interface RoutingDecisionRecord {
    decision_id: string;
    from_platform: Platform;
    to_platform: RoutedPlatform;
    reason: TransitionReason;
    priority: number;
    manual_override: boolean;
    actor: string | null;
    note: string | null;
    evaluated_at: string;
    inputs: AuthorizingSnapshot;
    confidence: number;             // 0.5-0.95, from how many signal channels are present
    recommended_sequence: string;   // follow-up sequence for the level at decision time
    urgency: number;                // 1-10, higher is more urgent
    reasoning: string[];
}

/**
 * Snapshot of the aggregate that authorized a decision.
 */
export interface AuthorizingSnapshot {
    signal_id: string;
    version: number;
    engagement_score: number;
    engagement_level: EngagementLevel;
    emails_opened: number;
    recent_opens: number;
    emails_replied: number;
    meetings_booked: number;
    forms_submitted: number;
    requested_contact: boolean;
    network_connected: boolean;
    website_visits: number;
    crm_activity: boolean;
}

/**
 * Per-lead aggregate (engagement_signals). One row per lead id and per email.
 */
export interface EngagementSignal {
    id: string;
    lead_id: string | null;
    email: string | null;

    // Email
    emails_sent: number;
    emails_opened: number;
    emails_clicked: number;
    emails_replied: number;
    emails_bounced: number;
    last_email_sent_at: Date | null;
    last_email_open_at: Date | null;
    last_email_click_at: Date | null;
    last_email_reply_at: Date | null;
    last_email_bounce_at: Date | null;
    recent_open_at: Date[];

    // Professional network
    network_connected: boolean;
    network_connected_at: Date | null;
    network_messages_sent: number;
    network_messages_received: number;
    network_profile_viewed: boolean;
    last_network_activity_at: Date | null;

    // Website / visitor identification
    website_visits: number;
    pages_viewed: string[];
    last_website_visit_at: Date | null;
    visitor_identified: boolean;
    visitor_identified_at: Date | null;
    viewed_pricing: boolean;
    viewed_demo: boolean;

    // CRM / inbound intent
    forms_submitted: number;
    last_form_submitted_at: Date | null;
    downloaded_content: boolean;
    requested_contact: boolean;
    requested_contact_at: Date | null;
    meetings_booked: number;
    meetings_completed: number;
    meetings_no_show: number;
    last_meeting_at: Date | null;
    crm_stage: string | null;
    last_crm_activity_at: Date | null;

    // Derived
    engagement_score: number;
    engagement_level: EngagementLevel;
    scored_at: Date | null;

    // Routing
    current_platform: Platform;
    last_routing_decision: RoutingDecisionRecord | null;
    last_routed_at: Date | null;
    transition_count: number;

    version: number;
    created_at: Date;
    updated_at: Date;
}

/**
 * Append-only event log row (engagement_events).
 */
export interface EngagementEventRecord {
    id: string;
    sequence: number;
    signal_id: string;
    lead_id: string | null;
    email: string | null;
    event_type: EngagementEventType;
    source: EventSource;
    raw_source: string;
    dedup_key: string;
    payload: Record<string, unknown>;
    occurred_at: Date;
    created_at: Date;
}

export type NewEngagementEvent = Omit<EngagementEventRecord, 'id' | 'sequence' | 'created_at'>;

/**
 * Append-only transition log row (platform_transitions).
 */
export interface PlatformTransitionRecord {
    id: string;
    sequence: number;
    signal_id: string;
    lead_id: string | null;
    email: string | null;
    from_platform: Platform;
    to_platform: RoutedPlatform;
    reason: TransitionReason;
    trigger_event: string;
    trigger_payload: Record<string, unknown>;
    engagement_score_at_transition: number;
    engagement_level_at_transition: EngagementLevel;
    routing_decision: RoutingDecisionRecord;
    decision_id: string;
    manual_override: boolean;
    actor: string | null;
    created_at: Date;
}

export type NewPlatformTransition = Omit<PlatformTransitionRecord, 'sequence' | 'created_at'>;

/**
 * Inbound event refused by the validator, kept for operators.
 */
export interface RejectedEventRecord {
    id: string;
    reason: string;
    details: string[];
    raw_event: unknown;
    created_at: Date;
}

export enum AlarmKind {
    ILLEGAL_TRANSITION = 'illegal_transition',
    COMMAND_DISPATCH_FAILED = 'command_dispatch_failed'
}

export interface RoutingAlarmRecord {
    id: string;
    kind: AlarmKind;
    lead_key: string | null;
    message: string;
    details: Record<string, unknown>;
    created_at: Date;
}

// ============================================================================
// SERVICE-LEVEL TYPES
// ============================================================================

/**
 * Validated, normalized inbound event.
 */
export interface NormalizedEvent {
    leadId: string | null;
    email: string | null;
    eventType: EngagementEventType;
    source: EventSource;
    rawSource: string;
    payload: Record<string, unknown>;
    occurredAt: Date;
    externalId: string | null;
    dedupKey: string;
}

/**
 * Output of the decision engine. A value, never a side effect.
 */
export interface TransitionDecision {
    decisionId: string;
    signalId: string;
    leadId: string | null;
    email: string | null;
    from: Platform;
    target: RoutedPlatform;
    reason: TransitionReason;
    priority: number;
    triggerEventType: string;
    triggerSource: EventSource;
    triggerPayload: Record<string, unknown>;
    authorizingSnapshot: AuthorizingSnapshot;
    evaluatedAt: Date;
    manualOverride: boolean;
    actor: string | null;
    note: string | null;
}

export interface RoutingStatsRow {
    platform: Platform;
    engagement_level: EngagementLevel;
    lead_count: number;
    avg_score: number;
}
