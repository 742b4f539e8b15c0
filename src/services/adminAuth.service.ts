import bcrypt from 'bcryptjs';
import createError from 'http-errors';
import { randomInt } from 'crypto';
import ManagerModel from '../models/manager.model';
import SalesManagerModel from '../models/salesManager.model';
import SalespersonModel from '../models/salesperson.model';
import { getAdminCredentials, getAdminEmail, getSuperAdminCredentials, setAdminPassword } from '../config/env';
import { ClaimUserType, generateTokens } from '../utils/token';
import { queryTimeout } from '../utils/db';
import { logger } from '../utils/logger';
import { otpCache } from './otpCache';
import { sendEmail } from './notification.service';

/** Env-configured admins have no stored record. */
export const ENV_ADMIN_USER_ID = '000000000000000000000000';

export interface StaffSummary {
  _id: string;
  fullName: string;
  email: string;
  rolesAccess?: string[];
}

export interface LoginResult {
  accessToken: string;
  refreshToken: string;
  userType: ClaimUserType;
  user: StaffSummary;
}

const issue = (userType: ClaimUserType, user: StaffSummary): LoginResult => ({
  ...generateTokens({ userId: user._id, email: user.email, userType }),
  userType,
  user,
});

const invalidCredentials = () => createError(401, 'Invalid email or password');

interface StaffRecord {
  _id: unknown;
  fullName: string;
  email: string;
  password: string;
  rolesAccess?: string[];
}

const findStaff = async (email: string): Promise<{ userType: ClaimUserType; record: StaffRecord } | null> => {
  const manager = await ManagerModel.findOne({ email }).maxTimeMS(queryTimeout()).lean();
  if (manager) return { userType: 'manager', record: manager };

  const salesManager = await SalesManagerModel.findOne({ email }).maxTimeMS(queryTimeout()).lean();
  if (salesManager) return { userType: 'sales_manager', record: salesManager };

  const salesperson = await SalespersonModel.findOne({ email }).maxTimeMS(queryTimeout()).lean();
  if (salesperson) return { userType: 'salesperson', record: salesperson };

  return null;
};

/**
 * Env-configured super admin and admin are checked first, then the staff
 * collections in order: managers, sales managers, salespersons.
 */
export const login = async (rawEmail: string, password: string): Promise<LoginResult> => {
  const email = rawEmail.trim().toLowerCase();

  for (const [userType, credentials] of [
    ['super_admin', getSuperAdminCredentials()],
    ['admin', getAdminCredentials()],
  ] as const) {
    if (credentials && credentials.email === email) {
      if (credentials.password !== password) throw invalidCredentials();
      logger.info('Admin login', { userType, email });
      return issue(userType, { _id: ENV_ADMIN_USER_ID, fullName: userType === 'admin' ? 'Admin' : 'Super Admin', email });
    }
  }

  const staff = await findStaff(email);
  if (!staff || !(await bcrypt.compare(password, staff.record.password))) {
    throw invalidCredentials();
  }

  const { record, userType } = staff;
  logger.info('Staff login', { userType, email });
  return issue(userType, {
    _id: String(record._id),
    fullName: record.fullName,
    email: record.email,
    rolesAccess: record.rolesAccess,
  });
};

const requireAdminEmail = () => {
  const email = getAdminEmail();
  if (!email) throw createError(500, 'Admin email not configured', { expose: true });
  return email;
};

export const generateOtp = () => randomInt(1000, 10000).toString();

/** Emails a 4-digit code to ADMIN_EMAIL; it stays valid for ten minutes. */
export const forgotAdminPassword = async () => {
  const email = requireAdminEmail();
  const otp = generateOtp();
  otpCache.set(email, otp);

  try {
    await sendEmail({
      to: email,
      subject: 'Admin password reset code',
      text: `Your password reset code is ${otp}. It expires in 10 minutes.`,
    });
  } catch (err) {
    otpCache.clear(email);
    logger.error('Failed to send admin OTP email', { error: err instanceof Error ? err.message : err });
    throw createError(500, 'Failed to send OTP email', { expose: true });
  }

  logger.info('Admin password reset requested');
};

const OTP_FAILURES = {
  missing: 'No OTP request found',
  expired: 'OTP has expired',
  invalid: 'Invalid OTP',
} as const;

/** Replaces ADMIN_PASSWORD for the life of the process. */
export const resetAdminPassword = (otp: string, newPassword: string) => {
  const email = requireAdminEmail();
  const check = otpCache.consume(email, otp);
  if (check !== 'ok') throw createError(400, OTP_FAILURES[check]);

  setAdminPassword(newPassword);
  logger.info('Admin password reset');
};
