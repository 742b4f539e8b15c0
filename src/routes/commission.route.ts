import { Router } from 'express';
import { authenticate } from '../middleware/authMiddleware';
import { requireCapability, requireUserType } from '../middleware/authRole';
import { asyncHandler } from '../middleware/asyncHandler';
import { getCommissions, payCommission } from '../controller/commission.controller';

export const commissionRouter = Router();

commissionRouter.use(authenticate, requireCapability('financial_dashboard_revenue'));

commissionRouter.get('/', asyncHandler(getCommissions));
commissionRouter.put('/:id/pay', requireUserType(['admin', 'super_admin']), asyncHandler(payCommission));
