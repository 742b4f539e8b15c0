import { Request, Response } from 'express';

export const healthController = (_req: Request, res: Response) => {
  res.json({ status: 200, message: 'ok', data: { uptime: process.uptime() } });
};
