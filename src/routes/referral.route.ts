import { Router } from 'express';
import { authenticate } from '../middleware/authMiddleware';
import { requireUserType } from '../middleware/authRole';
import { asyncHandler } from '../middleware/asyncHandler';
import { applyReferralSchema, validate } from '../middleware/validate';
import { applyReferral, getMyReferral } from '../controller/referral.controller';

export const referralRouter = Router();

// referrals are tracked on `users`, so only account holders take part
referralRouter.use(authenticate, requireUserType(['user', 'company', 'wholesaler', 'serviceProvider']));

referralRouter.post('/apply', validate(applyReferralSchema), asyncHandler(applyReferral));
referralRouter.get('/me', asyncHandler(getMyReferral));
