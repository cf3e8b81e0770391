import { Router } from 'express';
import * as leadSignalController from '../controllers/leadSignalController';
import { asyncHandler } from '../middleware/asyncHandler';
import { requireAdminKey } from '../middleware/security';
import { validateBody, validateQuery, limitQuerySchema, platformChangeSchema } from '../middleware/validation';

const router = Router();

// Read views
router.get('/:leadKey/signal', asyncHandler(leadSignalController.getSignal));
router.get('/:leadKey/events', validateQuery(limitQuerySchema), asyncHandler(leadSignalController.getEvents));
router.get('/:leadKey/transitions', asyncHandler(leadSignalController.getTransitions));
router.get('/:leadKey/replay', asyncHandler(leadSignalController.replay));

// Operator actions
router.post('/:leadKey/assign', requireAdminKey, validateBody(platformChangeSchema), asyncHandler(leadSignalController.assign));
router.post('/:leadKey/override', requireAdminKey, validateBody(platformChangeSchema), asyncHandler(leadSignalController.override));

export default router;
