import winston from 'winston';
import { env } from '../config/env';

const { combine, timestamp, errors, json, colorize, printf, splat } = winston.format;

const devFormat = printf(({ timestamp: ts, level, message, stack, ...meta }) => {
  let line = `${ts} ${level}: ${message}`;
  if (Object.keys(meta).length) line += ` ${JSON.stringify(meta)}`;
  if (stack) line += `\n${stack}`;
  return line;
});

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  defaultMeta: { service: 'marketplace-backend' },
  format: combine(timestamp(), errors({ stack: true }), splat()),
  transports: [
    new winston.transports.Console({
      silent: env.NODE_ENV === 'test',
      format: env.NODE_ENV === 'production' ? json() : combine(colorize(), devFormat),
    }),
  ],
  exitOnError: false,
});

if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      level: 'error',
      filename: 'logs/error.log',
      format: json(),
      maxsize: 5242880,
      maxFiles: 5,
    }),
  );
}
