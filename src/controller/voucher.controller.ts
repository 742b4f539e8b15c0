import { Request, Response } from 'express';
import { currentClaims } from '../middleware/authRole';
import { parseQuery, voucherListQuerySchema } from '../middleware/validate';
import {
  createVoucher,
  deleteVoucher,
  listAvailableVouchers,
  listMyVouchers,
  listVouchers,
  purchaseVoucher,
  toggleVoucher,
  updateVoucher,
} from '../services/voucher.service';

// ---------- account holders ----------

export const getAvailableVouchers = async (req: Request, res: Response) => {
  const data = await listAvailableVouchers(currentClaims(req));
  res.json({ status: 200, message: 'Available vouchers', data });
};

export const buyVoucher = async (req: Request, res: Response) => {
  const data = await purchaseVoucher(currentClaims(req), req.params.id);
  res.status(201).json({ status: 201, message: 'Voucher purchased successfully', data });
};

export const getMyVouchers = async (req: Request, res: Response) => {
  const data = await listMyVouchers(currentClaims(req));
  res.json({ status: 200, message: 'My vouchers', data });
};

// ---------- admin ----------

export const addVoucher = async (req: Request, res: Response) => {
  const data = await createVoucher(req.body, currentClaims(req).userId);
  res.status(201).json({ status: 201, message: 'Voucher created', data });
};

export const getVouchers = async (req: Request, res: Response) => {
  const { items, meta } = await listVouchers(parseQuery(voucherListQuerySchema, req.query));
  res.json({ status: 200, message: 'Vouchers', data: items, meta });
};

export const editVoucher = async (req: Request, res: Response) => {
  const data = await updateVoucher(req.params.id, req.body);
  res.json({ status: 200, message: 'Voucher updated', data });
};

export const switchVoucher = async (req: Request, res: Response) => {
  const data = await toggleVoucher(req.params.id);
  res.json({ status: 200, message: data.isActive ? 'Voucher activated' : 'Voucher deactivated', data });
};

export const removeVoucher = async (req: Request, res: Response) => {
  await deleteVoucher(req.params.id);
  res.json({ status: 200, message: 'Voucher deleted' });
};
