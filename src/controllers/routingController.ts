/**
 * Routing Controller
 *
 * Operator reporting over the routing engine, plus on-demand reconciliation
 * and command redispatch.
 */

import { Request, Response } from 'express';
import { successResponse } from '../utils/response';
import { eligibleQuerySchema, limitQuerySchema, reconcileSchema } from '../middleware/validation';
import * as routingQueryService from '../services/routingQueryService';
import { getDispatchedCommands, redispatchTransition } from '../services/commandDispatcher';
import { triggerReconciliation } from '../services/reconciliationWorker';
import { logger } from '../services/observabilityService';

export const getStats = async (_req: Request, res: Response): Promise<void> => {
    successResponse(res, await routingQueryService.getRoutingStats());
};

export const getEligible = async (req: Request, res: Response): Promise<void> => {
    const query = eligibleQuerySchema.parse(req.query);
    const page = await routingQueryService.findEligibleTransitions({
        asOf: query.asOf,
        limit: query.limit,
        cursor: query.cursor ?? null
    });
    successResponse(res, page);
};

export const getAlarms = async (req: Request, res: Response): Promise<void> => {
    const { limit } = limitQuerySchema.parse(req.query);
    successResponse(res, await routingQueryService.getAlarms(limit));
};

export const getRejections = async (req: Request, res: Response): Promise<void> => {
    const { limit } = limitQuerySchema.parse(req.query);
    successResponse(res, await routingQueryService.getRejectedEvents(limit));
};

export const getCommands = async (req: Request, res: Response): Promise<void> => {
    const { limit } = limitQuerySchema.parse(req.query);
    successResponse(res, getDispatchedCommands(limit));
};

/**
 * POST /api/routing/reconcile
 */
export const reconcile = async (req: Request, res: Response): Promise<void> => {
    const body = reconcileSchema.parse(req.body ?? {});
    logger.info('[API] Manual reconciliation requested', { correlationId: req.correlationId, cursor: body.cursor ?? null });

    const result = await triggerReconciliation({
        batchSize: body.batchSize,
        cursor: body.cursor ?? null,
        asOf: body.asOf
    });
    successResponse(res, result);
};

/**
 * POST /api/routing/transitions/:id/redispatch
 */
export const redispatch = async (req: Request, res: Response): Promise<void> => {
    const dispatched = await redispatchTransition(req.params.id);
    successResponse(res, dispatched);
};
