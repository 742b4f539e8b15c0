import { Router } from 'express';
import { metricsRouter } from './metrics.route';
import { healthRouter } from './health.route';
import { authRouter } from './auth.route';
import { subscriptionPlanRouter } from './subscriptionPlan.route';
import { subscriptionRouter } from './subscription.route';
import { walletRouter } from './wallet.route';
import { commissionRouter } from './commission.route';
import { referralRouter } from './referral.route';
import { staffRouter } from './staff.route';
import { branchRouter } from './branch.route';
import { sponsorshipRouter } from './sponsorship.route';
import { voucherRouter } from './voucher.route';
import { reviewRouter } from './review.route';

const router = Router();

router.use('/auth', authRouter);
router.use('/metrics', metricsRouter);
router.use('/health', healthRouter);

//Subscription
router.use('/subscriptionPlan', subscriptionPlanRouter);
router.use('/subscriptions', subscriptionRouter);
router.use('/sponsorships', sponsorshipRouter);

//Finance
router.use('/wallet', walletRouter);
router.use('/commissions', commissionRouter);

router.use('/referrals', referralRouter);
router.use('/vouchers', voucherRouter);
router.use('/reviews', reviewRouter);
router.use('/staff', staffRouter);
router.use('/branches', branchRouter);

export default router;
