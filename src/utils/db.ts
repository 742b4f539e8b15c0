import mongoose, { ClientSession } from 'mongoose';
import { env } from '../config/env';
import { logger } from './logger';

export const connectDB = async () => {
  if (!env.MONGO_URI) {
    logger.error('MongoDB URI not set in environment variables');
    process.exit(1);
  }

  try {
    mongoose.set('strictQuery', true);

    await mongoose.connect(env.MONGO_URI, {
      autoIndex: env.NODE_ENV !== 'production',
      maxPoolSize: 10,
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: Math.max(env.DB_TIMEOUT_MS, 30000),
      connectTimeoutMS: env.DB_TIMEOUT_MS,
    });

    logger.info(`MongoDB connected (${env.NODE_ENV})`, { transactions: env.MONGO_USE_TRANSACTIONS });
  } catch (err) {
    logger.error('MongoDB connection error', { error: err });
    process.exit(1);
  }

  mongoose.connection.on('error', (err) => {
    logger.error('MongoDB connection error', { error: err });
  });

  mongoose.connection.on('disconnected', () => {
    logger.warn('MongoDB disconnected! Trying to reconnect...');
  });

  mongoose.connection.on('reconnected', () => {
    logger.info('MongoDB reconnected');
  });
};

/** Per-query deadline for reads and aggregations. */
export const queryTimeout = () => env.DB_TIMEOUT_MS;

/**
 * Runs `work` inside a MongoDB transaction when MONGO_USE_TRANSACTIONS is on
 * (requires a replica set). Otherwise `work` receives no session and its
 * writes land one by one.
 */
export const withTransaction = async <T>(work: (session: ClientSession | undefined) => Promise<T>): Promise<T> => {
  if (!env.MONGO_USE_TRANSACTIONS) {
    return work(undefined);
  }
  return mongoose.connection.transaction((session) => work(session));
};

/** MongoDB E11000: a unique index rejected the write. */
export const isDuplicateKeyError = (err: unknown) =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === 11000;
