import { Router } from 'express';
import { forgotPassword, login, resetPassword } from '../controller/auth.controller';
import { asyncHandler } from '../middleware/asyncHandler';
import { authLimiter } from '../middleware/rateLimiter';
import { loginSchema, resetAdminPasswordSchema, validate } from '../middleware/validate';

export const authRouter = Router();

authRouter.post('/login', authLimiter, validate(loginSchema), asyncHandler(login));
authRouter.post('/admin/forgot-password', authLimiter, asyncHandler(forgotPassword));
authRouter.post('/admin/reset-password', authLimiter, validate(resetAdminPasswordSchema), asyncHandler(resetPassword));
