import { Request, Response, NextFunction } from 'express';
import createError from 'http-errors';

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(createError(404, `Route ${req.method} ${req.path} not found`));
};
