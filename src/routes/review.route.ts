import { Router } from 'express';
import { authenticate } from '../middleware/authMiddleware';
import { requireCapability, requireUserType } from '../middleware/authRole';
import { asyncHandler } from '../middleware/asyncHandler';
import { reviewMediaUpload } from '../middleware/upload';
import { replyToReviewSchema, validate, verifyReviewSchema } from '../middleware/validate';
import {
  addReview,
  getProviderReviews,
  getReviews,
  removeReview,
  replyReview,
  verifyReview,
} from '../controller/review.controller';

export const reviewRouter = Router();

reviewRouter.use(authenticate);

reviewRouter.post('/', requireUserType(['user']), reviewMediaUpload, asyncHandler(addReview));
reviewRouter.get('/provider/:serviceProviderId', asyncHandler(getProviderReviews));
reviewRouter.post(
  '/:id/reply',
  requireCapability('entity_self_service'),
  validate(replyToReviewSchema),
  asyncHandler(replyReview),
);

// moderation
const moderators = requireCapability('business_management');
reviewRouter.get('/', moderators, asyncHandler(getReviews));
reviewRouter.put('/:id/verify', moderators, validate(verifyReviewSchema), asyncHandler(verifyReview));
reviewRouter.delete('/:id', moderators, asyncHandler(removeReview));
