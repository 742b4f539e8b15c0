import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const serverSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  MONGO_URI: z.string().optional(),
  MONGO_USE_TRANSACTIONS: booleanString,
  DB_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  UPLOAD_DIR: z.string().default('uploads'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug']).default('info'),
  SENTRY_DSN: z.string().optional(),
  CORS_ORIGIN: z.string().default('*'),
  REFERRAL_LINK_BASE: z.string().default('http://localhost:3000/register'),
});

export type ServerConfig = z.infer<typeof serverSchema>;

const parsed = serverSchema.safeParse(process.env);
if (!parsed.success) {
  // logger depends on this module, so report straight to stderr
  console.error('Invalid environment configuration', parsed.error.issues);
  throw new Error('Invalid environment configuration');
}

export const env: ServerConfig = parsed.data;

// Credentials, token secrets and SMTP settings are re-read on every call so an
// updated environment takes effect without a restart.

export interface AdminCredentials {
  email: string;
  password: string;
}

const readCredentials = (emailKey: string, passwordKey: string): AdminCredentials | null => {
  const email = process.env[emailKey]?.trim();
  const password = process.env[passwordKey];
  if (!email || !password) return null;
  return { email: email.toLowerCase(), password };
};

export const getAdminCredentials = () => readCredentials('ADMIN_EMAIL', 'ADMIN_PASSWORD');
export const getSuperAdminCredentials = () => readCredentials('SUPER_ADMIN_EMAIL', 'SUPER_ADMIN_PASSWORD');

export const getSuperAdminEmail = (): string | undefined =>
  process.env.SUPER_ADMIN_EMAIL?.trim().toLowerCase() || undefined;

export const getAdminEmail = (): string | undefined => process.env.ADMIN_EMAIL?.trim().toLowerCase() || undefined;

export const setAdminPassword = (password: string) => {
  process.env.ADMIN_PASSWORD = password;
};

export interface JwtSettings {
  accessSecret: string;
  refreshSecret: string;
  /** Seconds. */
  accessTtl: number;
  refreshTtl: number;
}

export const getJwtSettings = (): JwtSettings => {
  const accessSecret = process.env.JWT_SECRET;
  const refreshSecret = process.env.JWT_REFRESH_SECRET;
  if (!accessSecret || !refreshSecret) {
    throw new Error('JWT_SECRET and JWT_REFRESH_SECRET must be set');
  }
  return {
    accessSecret,
    refreshSecret,
    accessTtl: Number(process.env.ACCESS_TOKEN_TTL_SECONDS) || 3600,
    refreshTtl: Number(process.env.REFRESH_TOKEN_TTL_SECONDS) || 7 * 24 * 3600,
  };
};

const smtpSchema = z.object({
  SMTP_HOST: z.string().default('mail.smtp2go.com'),
  SMTP_PORT: z.coerce.number().int().positive().default(2525),
  SMTP_USER: z.string().min(1, 'SMTP_USER is not set'),
  SMTP_PASS: z.string().min(1, 'SMTP_PASS is not set'),
  FROM_EMAIL: z.string().optional(),
});

export interface SmtpSettings {
  host: string;
  port: number;
  user: string;
  pass: string;
  from: string;
}

export const getSmtpSettings = (): SmtpSettings => {
  const result = smtpSchema.safeParse(process.env);
  if (!result.success) {
    throw new Error(`SMTP configuration is incomplete: ${result.error.issues.map((i) => i.message).join(', ')}`);
  }
  const { SMTP_HOST, SMTP_PORT, SMTP_USER, SMTP_PASS, FROM_EMAIL } = result.data;
  return { host: SMTP_HOST, port: SMTP_PORT, user: SMTP_USER, pass: SMTP_PASS, from: FROM_EMAIL || SMTP_USER };
};
