/**
 * Event Controller
 *
 * Ingestion endpoints for platform adapters. Responses follow the
 * { success, data } contract; invalid events answer 422 with the
 * validator's details.
 */

import { Request, Response } from 'express';
import * as eventQueue from '../services/eventQueue';
import { logger } from '../services/observabilityService';
import { errorResponse, successResponse } from '../utils/response';

function statusCodeFor(result: eventQueue.SubmitResult): number {
    switch (result.status) {
        case 'queued':
            return 202;
        case 'rejected':
            return 422;
        case 'failed':
            return 503;
        default:
            return 200;
    }
}

/**
 * POST /api/events
 */
export const submitEvent = async (req: Request, res: Response): Promise<void> => {
    const result = await eventQueue.submitEvent(req.body);

    if (result.status === 'rejected') {
        errorResponse(res, 422, {
            error: result.reason ?? 'Invalid event',
            code: 'INVALID_EVENT',
            retryable: false,
            details: result.details ?? []
        });
        return;
    }

    logger.debug('[API] Event accepted', { status: result.status, correlationId: req.correlationId });
    successResponse(res, result, statusCodeFor(result));
};

/**
 * POST /api/events/batch
 *
 * Always 200 (or 202 when everything was queued): per-item outcomes are in
 * the body.
 */
export const submitBatch = async (req: Request, res: Response): Promise<void> => {
    const events: unknown[] = req.body.events;
    const { results, summary } = await eventQueue.submitBatch(events);

    logger.info('[API] Batch submitted', { ...summary, correlationId: req.correlationId });
    successResponse(res, { summary, results }, summary.queued === summary.total ? 202 : 200);
};
