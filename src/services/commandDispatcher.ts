/**
 * Command Dispatcher
 *
 * Hands routing commands to the platform-adapter executors after a
 * transition has committed. This service never calls a vendor API.
 *
 *   Redis configured  → BullMQ queue `lead-routing-commands`, jobId derived from commandId
 *   otherwise         → in-process handlers (registerCommandHandler)
 *
 * Dispatch never throws back into the commit path: a failure is logged and
 * raised as an alarm, and the command can be re-sent with
 * redispatchTransition().
 */

import { Queue } from 'bullmq';
import {
    AlarmKind,
    Platform,
    PlatformTransitionRecord,
    RoutingCommand,
    RoutingCommandType
} from '../types';
import { NotFoundError } from '../utils/appError';
import { getConfig } from '../config';
import { parseRedisUrl } from '../utils/redis';
import { logger } from './observabilityService';
import { raiseAlarm } from './alarmService';
import { getSignalStore, SignalStore } from './signalStore';

// ============================================================================
// TYPES
// ============================================================================

export type CommandHandler = (command: RoutingCommand) => Promise<void>;

export interface DispatchedCommand extends RoutingCommand {
    channel: 'queue' | 'in_process';
    status: 'dispatched' | 'failed';
    dispatchedAt: Date;
    error?: string;
}

// ============================================================================
// STATE
// ============================================================================

export const COMMAND_QUEUE_NAME = 'lead-routing-commands';
const MAX_HISTORY = 500;

let commandQueue: Queue | null = null;
const handlers = new Set<CommandHandler>();
const history: DispatchedCommand[] = [];

// ============================================================================
// COMMAND CONSTRUCTION
// ============================================================================

function commandTypesFor(from: Platform, to: Platform): RoutingCommandType[] {
    switch (to) {
        case Platform.CRM:
            if (from === Platform.CRM) return [];
            if (from === Platform.NONE) return [RoutingCommandType.ENROLL_IN_CRM];
            return [RoutingCommandType.ENROLL_IN_CRM, RoutingCommandType.REMOVE_FROM_OUTREACH];
        case Platform.HYBRID:
            return from === Platform.HYBRID ? [] : [RoutingCommandType.MARK_HYBRID];
        case Platform.OUTREACH:
            return [RoutingCommandType.ENROLL_IN_OUTREACH];
        default:
            return [];
    }
}

/**
 * Commands implied by a committed transition. Deterministic: the same
 * transition always yields the same command ids.
 */
export function buildCommands(transition: PlatformTransitionRecord): RoutingCommand[] {
    return commandTypesFor(transition.from_platform, transition.to_platform).map((type) => ({
        commandId: `${transition.id}:${type}`,
        type,
        leadId: transition.lead_id,
        email: transition.email,
        transitionId: transition.id,
        fromPlatform: transition.from_platform,
        toPlatform: transition.to_platform,
        recommendedSequence: transition.routing_decision.recommended_sequence,
        urgency: transition.routing_decision.urgency,
        issuedAt: transition.created_at
    }));
}

// ============================================================================
// LIFECYCLE
// ============================================================================

export function initCommandDispatcher(): boolean {
    const redisUrl = getConfig().env.REDIS_URL;
    if (!redisUrl) {
        logger.warn('[COMMANDS] REDIS_URL not set, dispatching to in-process handlers');
        return false;
    }

    commandQueue = new Queue(COMMAND_QUEUE_NAME, {
        connection: parseRedisUrl(redisUrl),
        defaultJobOptions: {
            attempts: 5,
            backoff: { type: 'exponential', delay: 5000 },
            removeOnComplete: { count: 1000 },
            removeOnFail: false
        }
    });
    logger.info('[COMMANDS] Command queue initialized', { queue: COMMAND_QUEUE_NAME });
    return true;
}

export async function shutdownCommandDispatcher(): Promise<void> {
    if (commandQueue) {
        await commandQueue.close();
        commandQueue = null;
        logger.info('[COMMANDS] Command queue closed');
    }
}

/**
 * Register an in-process executor. Returns an unregister function.
 */
export function registerCommandHandler(handler: CommandHandler): () => void {
    handlers.add(handler);
    return () => {
        handlers.delete(handler);
    };
}

// ============================================================================
// DISPATCH
// ============================================================================

function remember(entry: DispatchedCommand): void {
    history.push(entry);
    if (history.length > MAX_HISTORY) {
        history.splice(0, history.length - MAX_HISTORY);
    }
}

async function sendOne(command: RoutingCommand): Promise<void> {
    if (commandQueue) {
        // BullMQ reserves ':' in custom job ids.
        await commandQueue.add(command.type, command, { jobId: command.commandId.replace(/:/g, '-') });
        return;
    }
    for (const handler of handlers) {
        await handler(command);
    }
}

export async function dispatchCommands(
    commands: RoutingCommand[],
    options: { store?: SignalStore } = {}
): Promise<DispatchedCommand[]> {
    const results: DispatchedCommand[] = [];

    for (const command of commands) {
        const channel = commandQueue ? 'queue' : 'in_process';
        try {
            await sendOne(command);
            const entry: DispatchedCommand = { ...command, channel, status: 'dispatched', dispatchedAt: new Date() };
            remember(entry);
            results.push(entry);
            logger.info(`[COMMANDS] Dispatched ${command.type}`, {
                commandId: command.commandId,
                transitionId: command.transitionId,
                channel
            });
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            const entry: DispatchedCommand = {
                ...command,
                channel,
                status: 'failed',
                dispatchedAt: new Date(),
                error: message
            };
            remember(entry);
            results.push(entry);
            logger.error(`[COMMANDS] Dispatch of ${command.type} failed`, err, { commandId: command.commandId });
            await raiseAlarm(
                {
                    kind: AlarmKind.COMMAND_DISPATCH_FAILED,
                    leadKey: command.leadId ?? (command.email ? `email:${command.email}` : null),
                    message: `Command ${command.commandId} could not be dispatched: ${message}`,
                    details: { commandId: command.commandId, transitionId: command.transitionId, type: command.type }
                },
                { store: options.store }
            );
        }
    }

    return results;
}

/**
 * Re-send the commands of a committed transition. Command ids are unchanged,
 * so executors can drop the ones they already applied.
 */
export async function redispatchTransition(
    transitionId: string,
    store: SignalStore = getSignalStore()
): Promise<DispatchedCommand[]> {
    const transition = await store.findTransition(transitionId);
    if (!transition) {
        throw new NotFoundError(`Transition ${transitionId} not found`);
    }

    const commands = buildCommands(transition);
    logger.info('[COMMANDS] Redispatching transition', { transitionId, commands: commands.length });
    return dispatchCommands(commands, { store });
}

/**
 * Most recent dispatches, newest first.
 */
export function getDispatchedCommands(limit = 100): DispatchedCommand[] {
    return history.slice(-limit).reverse().map((entry) => ({ ...entry }));
}
