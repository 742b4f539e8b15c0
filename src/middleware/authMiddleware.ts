import '../types/express';
import { Request, Response, NextFunction } from 'express';
import createError from 'http-errors';
import { TokenExpiredError } from 'jsonwebtoken';
import { verifyAccessToken } from '../utils/token';

export const authenticate = (req: Request, _res: Response, next: NextFunction) => {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return next(createError(401, 'Unauthorized'));
  }

  try {
    req.user = verifyAccessToken(authHeader.slice('Bearer '.length).trim());
    next();
  } catch (err) {
    if (err instanceof TokenExpiredError) {
      return next(createError(401, 'Token expired'));
    }
    next(createError(401, 'Unauthorized'));
  }
};
