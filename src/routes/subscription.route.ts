import { Router } from 'express';
import { authenticate } from '../middleware/authMiddleware';
import { requireCapability } from '../middleware/authRole';
import { asyncHandler } from '../middleware/asyncHandler';
import { createSubscriptionRequestSchema, processSubscriptionRequestSchema, validate } from '../middleware/validate';
import {
  cancelMySubscription,
  getMySubscription,
  listPending,
  processRequest,
  requestSubscription,
} from '../controller/subscription.controller';

export const subscriptionRouter = Router();

subscriptionRouter.use(authenticate);

// entity self-service
subscriptionRouter.post(
  '/request',
  requireCapability('entity_self_service'),
  validate(createSubscriptionRequestSchema),
  asyncHandler(requestSubscription),
);
subscriptionRouter.get('/current', requireCapability('entity_self_service'), asyncHandler(getMySubscription));
subscriptionRouter.post('/cancel', requireCapability('entity_self_service'), asyncHandler(cancelMySubscription));

// admin approval
subscriptionRouter.get('/requests/:kind', requireCapability('subscription_approval'), asyncHandler(listPending));
subscriptionRouter.put(
  '/requests/:kind/:requestId',
  requireCapability('subscription_approval'),
  validate(processSubscriptionRequestSchema),
  asyncHandler(processRequest),
);
