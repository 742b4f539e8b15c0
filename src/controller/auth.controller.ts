import { Request, Response } from 'express';
import { forgotAdminPassword, login as loginWithPassword, resetAdminPassword } from '../services/adminAuth.service';

export const login = async (req: Request, res: Response) => {
  const { email, password } = req.body;
  const data = await loginWithPassword(email, password);
  res.json({ status: 200, message: 'Login successful', data });
};

export const forgotPassword = async (_req: Request, res: Response) => {
  await forgotAdminPassword();
  res.json({ status: 200, message: 'OTP sent to admin email' });
};

export const resetPassword = async (req: Request, res: Response) => {
  const { otp, newPassword } = req.body;
  resetAdminPassword(otp, newPassword);
  res.json({ status: 200, message: 'Password reset successfully' });
};
