import { Router } from 'express';
import { authenticate } from '../middleware/authMiddleware';
import { requireUserType } from '../middleware/authRole';
import { asyncHandler } from '../middleware/asyncHandler';
import { createVoucherSchema, updateVoucherSchema, validate } from '../middleware/validate';
import {
  addVoucher,
  buyVoucher,
  editVoucher,
  getAvailableVouchers,
  getMyVouchers,
  getVouchers,
  removeVoucher,
  switchVoucher,
} from '../controller/voucher.controller';

export const voucherRouter = Router();

voucherRouter.use(authenticate);

const holders = requireUserType(['user', 'company', 'wholesaler', 'serviceProvider']);
const admins = requireUserType(['admin', 'super_admin']);

voucherRouter.get('/available', holders, asyncHandler(getAvailableVouchers));
voucherRouter.get('/mine', holders, asyncHandler(getMyVouchers));
voucherRouter.post('/:id/purchase', holders, asyncHandler(buyVoucher));

voucherRouter.post('/', admins, validate(createVoucherSchema), asyncHandler(addVoucher));
voucherRouter.get('/', admins, asyncHandler(getVouchers));
voucherRouter.put('/:id', admins, validate(updateVoucherSchema), asyncHandler(editVoucher));
voucherRouter.put('/:id/toggle', admins, asyncHandler(switchVoucher));
voucherRouter.delete('/:id', admins, asyncHandler(removeVoucher));
