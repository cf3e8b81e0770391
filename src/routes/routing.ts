import { Router } from 'express';
import * as routingController from '../controllers/routingController';
import { asyncHandler } from '../middleware/asyncHandler';
import { requireAdminKey } from '../middleware/security';
import {
    validateBody,
    validateQuery,
    eligibleQuerySchema,
    limitQuerySchema,
    reconcileSchema
} from '../middleware/validation';

const router = Router();

// Reporting
router.get('/stats', asyncHandler(routingController.getStats));
router.get('/eligible', validateQuery(eligibleQuerySchema), asyncHandler(routingController.getEligible));
router.get('/alarms', validateQuery(limitQuerySchema), asyncHandler(routingController.getAlarms));
router.get('/rejections', validateQuery(limitQuerySchema), asyncHandler(routingController.getRejections));
router.get('/commands', validateQuery(limitQuerySchema), asyncHandler(routingController.getCommands));

// Operator actions
router.post('/reconcile', requireAdminKey, validateBody(reconcileSchema), asyncHandler(routingController.reconcile));
router.post('/transitions/:id/redispatch', requireAdminKey, asyncHandler(routingController.redispatch));

export default router;
