import { Request, Response, NextFunction } from 'express';
import createError, { isHttpError } from 'http-errors';
import mongoose from 'mongoose';
import { MulterError } from 'multer';
import { ZodError } from 'zod';
import { logger } from '../utils/logger';
import { captureException } from '../utils/sentry';
import { isDuplicateKeyError } from '../utils/db';

/** Normalises anything thrown by a handler into an HttpError. */
export const toHttpError = (err: unknown) => {
  if (isHttpError(err)) return err;
  if (err instanceof mongoose.Error.CastError) return createError(400, `Invalid ${err.path}`);
  if (err instanceof mongoose.Error.ValidationError) return createError(400, err.message);
  if (err instanceof MulterError) return createError(400, `Upload rejected: ${err.message}`);
  if (err instanceof ZodError) return createError(400, err.issues.map((i) => i.message).join(', '));
  if (isDuplicateKeyError(err)) return createError(409, 'A record with the same unique value already exists');
  return createError(500, err instanceof Error ? err.message : 'Internal Server Error', { cause: err });
};

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const httpError = toHttpError(err);
  const status = httpError.status;

  if (status >= 500) {
    logger.error('Error handled', {
      status,
      message: httpError.message,
      path: req.originalUrl,
      stack: err instanceof Error ? err.stack : undefined,
    });
    captureException(err);
  } else {
    logger.warn('Request rejected', { status, message: httpError.message, path: req.originalUrl });
  }

  res.status(status).json({
    status,
    message: httpError.expose ? httpError.message : 'Internal Server Error',
  });
};
