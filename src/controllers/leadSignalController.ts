/**
 * Lead Signal Controller
 *
 * Per-lead views (snapshot, logs, replay) and the operator's manual routing
 * actions. `:leadKey` is a lead id, or an email when it contains '@'.
 */

import { Request, Response } from 'express';
import { LeadIdentity } from '../types';
import { successResponse } from '../utils/response';
import { limitQuerySchema, platformChangeSchema } from '../middleware/validation';
import * as routingQueryService from '../services/routingQueryService';
import * as stateTransitionService from '../services/stateTransitionService';
import { replayLead } from '../services/replayService';

export function identityFromLeadKey(leadKey: string): LeadIdentity {
    const key = leadKey.trim();
    return key.includes('@') ? { email: key.toLowerCase() } : { leadId: key };
}

export const getSignal = async (req: Request, res: Response): Promise<void> => {
    const snapshot = await routingQueryService.getSnapshot(identityFromLeadKey(req.params.leadKey));
    successResponse(res, snapshot);
};

export const getEvents = async (req: Request, res: Response): Promise<void> => {
    const { limit } = limitQuerySchema.parse(req.query);
    const events = await routingQueryService.getLeadEvents(identityFromLeadKey(req.params.leadKey), limit);
    successResponse(res, events);
};

export const getTransitions = async (req: Request, res: Response): Promise<void> => {
    const transitions = await routingQueryService.getLeadTransitions(identityFromLeadKey(req.params.leadKey));
    successResponse(res, transitions);
};

export const replay = async (req: Request, res: Response): Promise<void> => {
    const result = await replayLead(identityFromLeadKey(req.params.leadKey));
    successResponse(res, {
        leadKey: result.leadKey,
        matches: result.matches,
        eventCount: result.eventCount,
        differences: result.differences,
        durationMs: result.durationMs
    });
};

/**
 * POST /api/leads/:leadKey/assign (forward only)
 */
export const assign = async (req: Request, res: Response): Promise<void> => {
    const body = platformChangeSchema.parse(req.body);
    const result = await stateTransitionService.assignPlatform({
        identity: identityFromLeadKey(req.params.leadKey),
        target: body.platform,
        actor: body.actor,
        note: body.note ?? null
    });

    successResponse(res, {
        changed: result !== null,
        transition: result?.transition ?? null,
        commands: result?.commands ?? []
    });
};

/**
 * POST /api/leads/:leadKey/override
 */
export const override = async (req: Request, res: Response): Promise<void> => {
    const body = platformChangeSchema.parse(req.body);
    const result = await stateTransitionService.overridePlatform({
        identity: identityFromLeadKey(req.params.leadKey),
        target: body.platform,
        actor: body.actor,
        note: body.note ?? null
    });

    successResponse(res, {
        changed: result !== null,
        transition: result?.transition ?? null,
        commands: result?.commands ?? []
    });
};
