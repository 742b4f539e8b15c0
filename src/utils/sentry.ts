import * as Sentry from '@sentry/node';
import { env } from '../config/env';

export const initSentry = (dsn = env.SENTRY_DSN) => {
  if (!dsn) return;
  Sentry.init({
    dsn,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.2 : 1.0,
  });
};

export const captureException = (err: unknown) => {
  if (!env.SENTRY_DSN) return;
  Sentry.captureException(err);
};
