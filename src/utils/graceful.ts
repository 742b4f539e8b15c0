import { Server } from 'http';
import mongoose from 'mongoose';
import { logger } from './logger';
import { otpCache } from '../services/otpCache';

export const setupGracefulShutdown = (server: Server) => {
  let shuttingDown = false;

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    otpCache.dispose();

    server.close((err) => {
      if (err) {
        logger.error('Error during server close', { err });
        process.exit(1);
      }
      mongoose.connection
        .close()
        .then(() => {
          logger.info('MongoDB connection closed due to app termination');
          logger.info('Closed out remaining connections. Exiting.');
          process.exit(0);
        })
        .catch((closeErr: unknown) => {
          logger.error('Error closing MongoDB connection', { error: closeErr });
          process.exit(1);
        });
    });

    setTimeout(() => {
      logger.error('Forcing shutdown due to timeout');
      process.exit(1);
    }, 30_000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};
