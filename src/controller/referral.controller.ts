import { Request, Response } from 'express';
import { currentClaims } from '../middleware/authRole';
import { applyReferralCode, getReferralData } from '../services/referral.service';

export const applyReferral = async (req: Request, res: Response) => {
  const { userId } = currentClaims(req);
  const data = await applyReferralCode(userId, req.body.referralCode);
  res.json({ status: 200, message: 'Referral code applied successfully', data });
};

export const getMyReferral = async (req: Request, res: Response) => {
  const { userId } = currentClaims(req);
  const data = await getReferralData(userId);
  res.json({ status: 200, message: 'Referral data', data });
};
