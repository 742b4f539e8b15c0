import { Request, Response } from 'express';
import { getWalletSummary, listWalletTransactions } from '../services/wallet.service';
import { parseQuery, walletTransactionsQuerySchema } from '../middleware/validate';

export const getWallet = async (_req: Request, res: Response) => {
  const data = await getWalletSummary();
  res.json({ status: 200, message: 'Admin wallet summary', data });
};

export const getWalletTransactions = async (req: Request, res: Response) => {
  const query = parseQuery(walletTransactionsQuerySchema, req.query);
  const { items, meta } = await listWalletTransactions(query);
  res.json({ status: 200, message: 'Wallet transactions', data: items, meta });
};
