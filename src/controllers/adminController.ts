/**
 * Admin Controller
 *
 * Dead-letter operations on the ingestion queue.
 */

import { Request, Response } from 'express';
import { successResponse } from '../utils/response';
import { limitQuerySchema } from '../middleware/validation';
import { NotFoundError } from '../utils/appError';
import * as eventQueue from '../services/eventQueue';

export const getDeadLetterJobs = async (req: Request, res: Response): Promise<void> => {
    const { limit } = limitQuerySchema.parse(req.query);
    successResponse(res, await eventQueue.getDeadLetterJobs(limit));
};

export const retryDeadLetterJob = async (req: Request, res: Response): Promise<void> => {
    const retried = await eventQueue.retryDeadLetterJob(req.params.jobId);
    if (!retried) {
        throw new NotFoundError(`Dead-letter job ${req.params.jobId} not found`);
    }
    successResponse(res, { jobId: req.params.jobId, retried: true });
};
