/**
 * Routing Alarm Service
 *
 * Data-integrity alarms (illegal transitions, failed command dispatch).
 * Every alarm is persisted, logged at error level and, when
 * ALARM_WEBHOOK_URL is configured, paged to operators.
 *
 * Never throws: an alarm is raised from inside failure paths and must not
 * replace the error that caused it.
 */

import axios from 'axios';
import { AlarmKind, RoutingAlarmRecord } from '../types';
import { getConfig } from '../config';
import { logger } from './observabilityService';
import { getSignalStore, SignalStore } from './signalStore';

export interface RaiseAlarmParams {
    kind: AlarmKind;
    leadKey: string | null;
    message: string;
    details?: Record<string, unknown>;
}

export interface RaiseAlarmOptions {
    store?: SignalStore;
    webhookUrl?: string;
}

const KIND_COLORS: Record<AlarmKind, string> = {
    [AlarmKind.ILLEGAL_TRANSITION]: '#e01e5a',
    [AlarmKind.COMMAND_DISPATCH_FAILED]: '#ecb22e'
};

const MAX_PAGE_RETRIES = 3;

/**
 * Persist, log and page an alarm. Returns the stored record, or null when
 * the store itself was unreachable.
 */
export async function raiseAlarm(params: RaiseAlarmParams, options: RaiseAlarmOptions = {}): Promise<RoutingAlarmRecord | null> {
    const store = options.store ?? getSignalStore();
    const details = params.details ?? {};

    logger.error(`[ALARM] ${params.kind}: ${params.message}`, undefined, {
        kind: params.kind,
        leadKey: params.leadKey,
        ...details
    });

    let record: RoutingAlarmRecord | null = null;
    try {
        record = await store.recordAlarm({
            kind: params.kind,
            lead_key: params.leadKey,
            message: params.message,
            details
        });
    } catch (err) {
        logger.error('[ALARM] Failed to persist alarm', err, { kind: params.kind, leadKey: params.leadKey });
    }

    const webhookUrl = options.webhookUrl ?? getConfig().env.ALARM_WEBHOOK_URL;
    if (webhookUrl) {
        await pageOperators(webhookUrl, params, details);
    }

    return record;
}

async function pageOperators(
    webhookUrl: string,
    params: RaiseAlarmParams,
    details: Record<string, unknown>,
    retryCount = 0
): Promise<void> {
    const payload = {
        text: `Routing alarm: ${params.kind}`,
        attachments: [
            {
                color: KIND_COLORS[params.kind],
                title: params.message,
                fields: [
                    { title: 'Lead', value: params.leadKey ?? 'n/a', short: true },
                    { title: 'Kind', value: params.kind, short: true }
                ],
                text: JSON.stringify(details),
                fallback: params.message
            }
        ]
    };

    try {
        await axios.post(webhookUrl, payload, {
            headers: { 'Content-Type': 'application/json' },
            timeout: 5000
        });
    } catch (err) {
        if (axios.isAxiosError(err) && err.response?.status === 429 && retryCount < MAX_PAGE_RETRIES) {
            const retryAfter = parseInt(String(err.response.headers['retry-after'] ?? '2'), 10);
            logger.warn(`[ALARM] Pager rate limited, retrying in ${retryAfter}s`);
            await new Promise((resolve) => setTimeout(resolve, Math.min(retryAfter * 1000, 10000)));
            return pageOperators(webhookUrl, params, details, retryCount + 1);
        }
        logger.error('[ALARM] Failed to page operators', err, { kind: params.kind, leadKey: params.leadKey });
    }
}

export async function getAlarms(limit = 50, store: SignalStore = getSignalStore()): Promise<RoutingAlarmRecord[]> {
    return store.listAlarms(limit);
}
