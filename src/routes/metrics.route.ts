import { Router } from 'express';
import { metricsEndpoint } from '../utils/metrics';
import { authenticate } from '../middleware/authMiddleware';
import { requireUserType } from '../middleware/authRole';
import { asyncHandler } from '../middleware/asyncHandler';

export const metricsRouter = Router();

metricsRouter.get('/', authenticate, requireUserType(['super_admin']), asyncHandler(metricsEndpoint));
