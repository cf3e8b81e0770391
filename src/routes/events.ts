import { Router } from 'express';
import * as eventController from '../controllers/eventController';
import { asyncHandler } from '../middleware/asyncHandler';
import { validateBody, eventBatchSchema, eventEnvelopeSchema } from '../middleware/validation';

const router = Router();

// Engagement ingestion from platform adapters
router.post('/', validateBody(eventEnvelopeSchema), asyncHandler(eventController.submitEvent));
router.post('/batch', validateBody(eventBatchSchema), asyncHandler(eventController.submitBatch));

export default router;
