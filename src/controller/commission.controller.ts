import { Request, Response } from 'express';
import { listCommissions, markCommissionPaid } from '../services/commission.service';
import { commissionListQuerySchema, parseQuery } from '../middleware/validate';

export const getCommissions = async (req: Request, res: Response) => {
  const query = parseQuery(commissionListQuerySchema, req.query);
  const { items, meta } = await listCommissions(query);
  res.json({ status: 200, message: 'Commissions', data: items, meta });
};

export const payCommission = async (req: Request, res: Response) => {
  const data = await markCommissionPaid(req.params.id);
  res.json({ status: 200, message: 'Commission marked as paid', data });
};
