import { Router } from 'express';
import { authenticate } from '../middleware/authMiddleware';
import { requireCapability } from '../middleware/authRole';
import { asyncHandler } from '../middleware/asyncHandler';
import { getWallet, getWalletTransactions } from '../controller/wallet.controller';

export const walletRouter = Router();

walletRouter.use(authenticate, requireCapability('financial_dashboard_revenue'));

walletRouter.get('/', asyncHandler(getWallet));
walletRouter.get('/transactions', asyncHandler(getWalletTransactions));
