/**
 * State Transition Service
 *
 * Commits routing decisions. Every transition is validated against the
 * platform graph, recorded in the transition log and the event log, and
 * applied to the aggregate in one unit of work on the lead. Commands are
 * built and dispatched only after that unit of work has committed.
 *
 * Key principles:
 * - Re-executing a decision is a no-op (current == target, or already recorded)
 * - A decision made against a platform the lead has since left is dropped
 * - Automated moves are forward only and never leave crm; a violation is an
 *   alarm, never silently corrected
 */

import { randomUUID } from 'crypto';
import {
    AlarmKind,
    EngagementEventType,
    EngagementSignal,
    EventSource,
    LeadIdentity,
    Platform,
    PlatformTransitionRecord,
    RoutedPlatform,
    RoutingCommand,
    TransitionDecision,
    TransitionReason
} from '../types';
import { IllegalTransitionError } from '../utils/appError';
import { resolveEngineConfig, EngineConfig } from '../config';
import { logger } from './observabilityService';
import { raiseAlarm } from './alarmService';
import { buildCommands, dispatchCommands } from './commandDispatcher';
import { createEmptySignal, foldEvent } from './signalAggregator';
import { getSignalStore, leadKeyFor, SignalStore } from './signalStore';
import {
    assertLegalTransition,
    buildAuthorizingSnapshot,
    decisionIdFor,
    explainDecision,
    isForwardTransition,
    TransitionMode
} from './routingDecisionService';

// ============================================================================
// TYPES
// ============================================================================

export interface ExecuteOptions {
    store?: SignalStore;
    now?: Date;
}

export interface TransitionResult {
    transition: PlatformTransitionRecord;
    commands: RoutingCommand[];
}

export interface ManualTransitionRequest {
    identity: LeadIdentity;
    target: RoutedPlatform;
    actor: string;
    note?: string | null;
}

const EXECUTOR_SOURCE = 'routing_executor';

function modeOf(decision: TransitionDecision): TransitionMode {
    if (decision.manualOverride) return 'override';
    if (decision.reason === TransitionReason.OPERATOR_ASSIGNMENT) return 'assignment';
    return 'automated';
}

function identityOfDecision(decision: TransitionDecision): LeadIdentity {
    return {
        leadId: decision.leadId ?? undefined,
        email: decision.email ?? undefined
    };
}

// ============================================================================
// EXECUTION
// ============================================================================

/**
 * Commit a decision. Returns null when there is nothing to do (already
 * executed, or stale). Throws IllegalTransitionError (after raising an
 * alarm) when the move is not allowed; nothing is written in that case.
 */
export async function executeTransition(
    decision: TransitionDecision,
    options: ExecuteOptions = {}
): Promise<TransitionResult | null> {
    const store = options.store ?? getSignalStore();
    const identity = identityOfDecision(decision);
    const leadKey = leadKeyFor(identity);
    const mode = modeOf(decision);

    let transition: PlatformTransitionRecord | null;
    try {
        transition = await store.withLead(identity, async (tx) => {
            let signal: EngagementSignal | null = tx.signal;

            if (!signal) {
                if (mode === 'automated') {
                    logger.warn('[STATE] Decision for unknown lead dropped', { leadKey, decisionId: decision.decisionId });
                    return null;
                }
                signal = createEmptySignal(identity);
            }

            const last = await tx.lastTransition();
            if (last && last.decision_id === decision.decisionId) {
                logger.info('[STATE] Decision already executed', { leadKey, decisionId: decision.decisionId });
                return null;
            }

            const current = signal.current_platform;

            if (current === decision.target && mode !== 'override') {
                logger.info(`[STATE] Lead already on ${current}, nothing to do`, { leadKey, decisionId: decision.decisionId });
                return null;
            }

            if (current !== decision.from) {
                logger.warn(`[STATE] Stale decision dropped: expected ${decision.from}, lead is on ${current}`, {
                    leadKey,
                    decisionId: decision.decisionId,
                    target: decision.target
                });
                return null;
            }

            assertLegalTransition(current, decision.target, mode);

            const now = options.now ?? new Date();
            const routingDecision = explainDecision(decision);
            const transitionId = randomUUID();

            const record = await tx.appendTransition({
                id: transitionId,
                signal_id: signal.id,
                lead_id: signal.lead_id,
                email: signal.email,
                from_platform: current,
                to_platform: decision.target,
                reason: decision.reason,
                trigger_event: decision.triggerEventType,
                trigger_payload: decision.triggerPayload,
                engagement_score_at_transition: signal.engagement_score,
                engagement_level_at_transition: signal.engagement_level,
                routing_decision: routingDecision,
                decision_id: decision.decisionId,
                manual_override: decision.manualOverride,
                actor: decision.actor
            });

            const payload = {
                transition_id: transitionId,
                from_platform: current,
                to_platform: decision.target,
                reason: decision.reason,
                decision_id: decision.decisionId,
                manual_override: decision.manualOverride,
                routing_decision: routingDecision
            };
            const routed = foldEvent(signal, {
                event_type: EngagementEventType.PLATFORM_TRANSITION,
                payload,
                occurred_at: now
            });
            const saved = await tx.saveSignal(routed);

            await tx.appendEvent({
                signal_id: saved.id,
                lead_id: saved.lead_id,
                email: saved.email,
                event_type: EngagementEventType.PLATFORM_TRANSITION,
                source: mode === 'automated' ? decision.triggerSource : EventSource.MANUAL,
                raw_source: EXECUTOR_SOURCE,
                dedup_key: `transition:${transitionId}`,
                payload,
                occurred_at: now
            });

            return record;
        });
    } catch (err) {
        if (err instanceof IllegalTransitionError) {
            await raiseAlarm(
                {
                    kind: AlarmKind.ILLEGAL_TRANSITION,
                    leadKey,
                    message: err.message,
                    details: {
                        decisionId: decision.decisionId,
                        from: err.fromPlatform,
                        to: err.toPlatform,
                        reason: decision.reason,
                        mode
                    }
                },
                { store }
            );
        }
        throw err;
    }

    if (!transition) {
        return null;
    }

    logger.info(`[STATE] Transition ${transition.from_platform} -> ${transition.to_platform}`, {
        leadKey,
        transitionId: transition.id,
        reason: transition.reason,
        manualOverride: transition.manual_override
    });

    // Committed: only now may the outside world hear about it.
    const commands = buildCommands(transition);
    await dispatchCommands(commands, { store });

    return { transition, commands };
}

// ============================================================================
// MANUAL PATHS
// ============================================================================

function manualDecision(
    signal: EngagementSignal | null,
    request: ManualTransitionRequest,
    reason: TransitionReason,
    manualOverride: boolean,
    config: EngineConfig
): TransitionDecision {
    const now = new Date();
    const snapshot = signal ?? createEmptySignal(request.identity, now);
    const leadKey = leadKeyFor(request.identity);

    return {
        decisionId: `${decisionIdFor(leadKey, request.target, snapshot.version)}:${reason}:${randomUUID()}`,
        signalId: snapshot.id,
        leadId: snapshot.lead_id ?? request.identity.leadId ?? null,
        email: snapshot.email ?? request.identity.email ?? null,
        from: snapshot.current_platform,
        target: request.target,
        reason,
        priority: 0,
        triggerEventType: reason,
        triggerSource: EventSource.MANUAL,
        triggerPayload: { actor: request.actor, note: request.note ?? null },
        authorizingSnapshot: buildAuthorizingSnapshot(snapshot, now, config),
        evaluatedAt: now,
        manualOverride,
        actor: request.actor,
        note: request.note ?? null
    };
}

/**
 * Operator or lead-management assignment. Forward moves only; creates the
 * aggregate when the lead has no events yet.
 */
export async function assignPlatform(
    request: ManualTransitionRequest,
    options: ExecuteOptions & { config?: EngineConfig } = {}
): Promise<TransitionResult | null> {
    const store = options.store ?? getSignalStore();
    const config = resolveEngineConfig(options.config);
    const signal = await store.findSignal(request.identity);
    const from = signal?.current_platform ?? Platform.NONE;

    if (from === request.target) {
        return null;
    }
    if (!isForwardTransition(from, request.target) || from === Platform.CRM) {
        throw new IllegalTransitionError(from, request.target, `Assignment must move forward (${from} -> ${request.target})`);
    }

    const decision = manualDecision(signal, request, TransitionReason.OPERATOR_ASSIGNMENT, false, config);
    return executeTransition(decision, { ...options, store });
}

/**
 * Explicit manual override. May move backward, but never out of crm
 * (crm → crm refreshes routing metadata and emits no command).
 */
export async function overridePlatform(
    request: ManualTransitionRequest,
    options: ExecuteOptions & { config?: EngineConfig } = {}
): Promise<TransitionResult | null> {
    const store = options.store ?? getSignalStore();
    const config = resolveEngineConfig(options.config);
    const signal = await store.findSignal(request.identity);
    const from = signal?.current_platform ?? Platform.NONE;

    assertLegalTransition(from, request.target, 'override');

    const decision = manualDecision(signal, request, TransitionReason.MANUAL_OVERRIDE, true, config);
    return executeTransition(decision, { ...options, store });
}
