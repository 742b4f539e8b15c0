import { Router } from 'express';
import { authenticate } from '../middleware/authMiddleware';
import { requireCapability, requireUserType } from '../middleware/authRole';
import { asyncHandler } from '../middleware/asyncHandler';

import {
  createPlan,
  updatePlan,
  listPlans,
  listAvailablePlans,
  getPlan,
  deactivatePlan,
  activatePlan,
} from '../controller/subscriptionPlan.controller';

import { createSubscriptionPlanSchema, updateSubscriptionPlanSchema, validate } from '../middleware/validate';

export const subscriptionPlanRouter = Router();

subscriptionPlanRouter.use(authenticate);

subscriptionPlanRouter.get('/available', requireCapability('entity_self_service'), asyncHandler(listAvailablePlans));

subscriptionPlanRouter.use(requireUserType(['admin', 'super_admin']));

subscriptionPlanRouter.post('/', validate(createSubscriptionPlanSchema), asyncHandler(createPlan));

subscriptionPlanRouter.get('/', asyncHandler(listPlans));

subscriptionPlanRouter.get('/:id', asyncHandler(getPlan));

subscriptionPlanRouter.put('/:id', validate(updateSubscriptionPlanSchema), asyncHandler(updatePlan));

subscriptionPlanRouter.put('/:id/deactivate', asyncHandler(deactivatePlan));

subscriptionPlanRouter.put('/:id/activate', asyncHandler(activatePlan));
