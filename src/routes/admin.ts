import { Router } from 'express';
import * as adminController from '../controllers/adminController';
import { asyncHandler } from '../middleware/asyncHandler';
import { requireAdminKey } from '../middleware/security';
import { validateQuery, limitQuerySchema } from '../middleware/validation';

const router = Router();

router.use(requireAdminKey);

// Dead-letter queue
router.get('/dlq', validateQuery(limitQuerySchema), asyncHandler(adminController.getDeadLetterJobs));
router.post('/dlq/:jobId/retry', asyncHandler(adminController.retryDeadLetterJob));

export default router;
