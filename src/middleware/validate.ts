import { RequestHandler } from 'express';
import { z, ZodType } from 'zod';
import createError from 'http-errors';
import { ASSIGNABLE_ACCESS_ROLES } from '../services/access.service';
import { ENTITY_KINDS } from '../models/businessEntity';
import { PLAN_DURATIONS } from '../models/subscriptionPlan.model';
import { WALLET_TRANSACTION_TYPES } from '../models/adminWallet.model';
import { VOUCHER_HOLDER_TYPES } from '../models/voucher.model';

export const objectIdString = (label = 'id') =>
  z.string(`${label} is required`).regex(/^[a-f\d]{24}$/i, `Invalid ${label} format`);

// ---------- AUTH ----------
export const loginSchema = z.object({
  email: z.email('A valid email is required').transform((v) => v.toLowerCase()),
  password: z.string('Password is required').min(1, 'Password is required'),
});

export const resetAdminPasswordSchema = z.object({
  otp: z.string('OTP is required').regex(/^\d{4}$/, 'OTP must be 4 digits'),
  newPassword: z
    .string('New password is required')
    .min(8, 'New password must be at least 8 characters.')
    .refine((val) => /[A-Z]/.test(val) && /[a-z]/.test(val) && /\d/.test(val), {
      message: 'Password must include upper and lower case letters and a number.',
    }),
});

// ---------- STAFF ----------
const staffBase = {
  fullName: z.string('Full name is required').trim().min(1, 'Full name is required'),
  email: z.email('A valid email is required').transform((v) => v.toLowerCase()),
  password: z.string('Password is required').min(8, 'Password must be at least 8 characters.'),
  phoneNumber: z.string().optional(),
};

const rolesAccess = z.array(z.enum(ASSIGNABLE_ACCESS_ROLES, 'Unknown access role')).default([]);

// Percentages are stored as given; nothing requires the salesperson and
// sales-manager rates to sum to 100.
const commissionPercent = z.number('Commission percent must be a number').min(0, 'Commission percent cannot be negative');

export const createManagerSchema = z.object({ ...staffBase, rolesAccess });

export const createSalesManagerSchema = z.object({
  ...staffBase,
  rolesAccess,
  commissionPercent,
});

export const createSalespersonSchema = z.object({
  ...staffBase,
  region: z.string().optional(),
  commissionPercent,
  salesManagerId: objectIdString('salesManagerId').optional(),
});

// ---------- PLANS ----------
const planDuration = z
  .number('Duration is required')
  .int()
  .refine((v) => (PLAN_DURATIONS as readonly number[]).includes(v), {
    message: `Duration must be one of ${PLAN_DURATIONS.join(', ')} months`,
  });

export const createSubscriptionPlanSchema = z.object({
  title: z.string('Title is required').trim().min(1, 'Title is required'),
  price: z.number('Price is required').positive('Price must be greater than 0'),
  duration: planDuration,
  type: z.enum(ENTITY_KINDS, 'Type must be company, wholesaler or serviceProvider'),
  benefits: z.unknown().optional(),
  isActive: z.boolean().default(true),
});

export const updateSubscriptionPlanSchema = z.object({
  title: z.string().trim().min(1).optional(),
  price: z.number().positive('Price must be greater than 0').optional(),
  duration: planDuration.optional(),
  benefits: z.unknown().optional(),
  isActive: z.boolean().optional(),
});

// ---------- SUBSCRIPTIONS ----------
export const createSubscriptionRequestSchema = z.object({
  planId: objectIdString('planId'),
});

export const processSubscriptionRequestSchema = z.object({
  status: z.enum(['approved', 'rejected'], "Invalid status. Must be 'approved' or 'rejected'"),
  adminNote: z.string().trim().max(1000).optional().default(''),
});

// ---------- REFERRALS ----------
export const applyReferralSchema = z.object({
  referralCode: z.string('Referral code is required').trim().min(1, 'Referral code is required'),
});

// ---------- BRANCHES ----------
export const createBranchSchema = z.object({
  name: z.string('Branch name is required').trim().min(1, 'Branch name is required'),
  phone: z.string().optional(),
  category: z.string().optional(),
  description: z.string().max(2000).optional(),
});

export const branchStatusSchema = z.object({
  status: z.enum(['pending', 'active', 'inactive'], 'Status must be pending, active or inactive'),
});

// ---------- VOUCHERS ----------
const voucherFields = {
  name: z.string('Voucher name is required').trim().min(1, 'Voucher name is required'),
  description: z.string().max(2000).optional(),
  image: z.string().optional(),
  points: z.number('Points are required').int('Points must be a whole number').positive('Points must be greater than 0'),
  targetUserType: z.enum(VOUCHER_HOLDER_TYPES, 'Target user type must be user, company, wholesaler or serviceProvider'),
};

export const createVoucherSchema = z.object({ ...voucherFields, isActive: z.boolean().default(true) });

export const updateVoucherSchema = z.object({
  name: voucherFields.name.optional(),
  description: voucherFields.description,
  image: voucherFields.image,
  points: voucherFields.points.optional(),
  targetUserType: voucherFields.targetUserType.optional(),
  isActive: z.boolean().optional(),
});

// ---------- SPONSORSHIPS ----------
const sponsorshipDuration = z
  .number('Duration is required')
  .int('Duration must be a whole number of days')
  .min(1, 'Duration must be between 1 and 365 days')
  .max(365, 'Duration must be between 1 and 365 days');

const discount = z.number().min(0, 'Discount must be between 0 and 100').max(100, 'Discount must be between 0 and 100');

export const createSponsorshipSchema = z
  .object({
    title: z.string('Title is required').trim().min(1, 'Title is required'),
    description: z.string().max(2000).optional(),
    price: z.number('Price is required').positive('Price must be greater than 0'),
    duration: sponsorshipDuration,
    discount: discount.default(0),
    startDate: z.coerce.date().optional(),
    endDate: z.coerce.date().optional(),
    isActive: z.boolean().default(true),
  })
  .refine((v) => !v.startDate || !v.endDate || v.endDate > v.startDate, {
    message: 'End date must be after start date',
  });

export const updateSponsorshipSchema = z.object({
  title: z.string().trim().min(1).optional(),
  description: z.string().max(2000).optional(),
  price: z.number().positive('Price must be greater than 0').optional(),
  duration: sponsorshipDuration.optional(),
  discount: discount.optional(),
  startDate: z.coerce.date().optional(),
  endDate: z.coerce.date().optional(),
  isActive: z.boolean().optional(),
});

export const requestSponsorshipSchema = z.object({
  sponsorshipId: objectIdString('sponsorshipId'),
  branchId: objectIdString('branchId').optional(),
});

// ---------- REVIEWS ----------
// multipart bodies carry every field as a string
export const createReviewSchema = z.object({
  serviceProviderId: objectIdString('serviceProviderId'),
  rating: z.coerce
    .number('Rating is required')
    .int('Rating must be between 1 and 5')
    .min(1, 'Rating must be between 1 and 5')
    .max(5, 'Rating must be between 1 and 5'),
  comment: z.string().trim().max(2000).optional(),
});

export const replyToReviewSchema = z.object({
  replyText: z.string('Reply text is required').trim().min(1, 'Reply text is required').max(1000),
});

export const verifyReviewSchema = z.object({
  isVerified: z.boolean('isVerified must be true or false'),
});

// ---------- QUERIES ----------
const page = z
  .string()
  .optional()
  .transform((v) => (v ? parseInt(v, 10) : 1))
  .refine((v) => Number.isInteger(v) && v > 0, { message: 'Page must be greater than 0' });

const limit = z
  .string()
  .optional()
  .transform((v) => (v ? parseInt(v, 10) : 20))
  .refine((v) => Number.isInteger(v) && v > 0 && v <= 100, { message: 'Limit must be between 1 and 100' });

export const paginationQuerySchema = z.object({ page, limit });

export const walletTransactionsQuerySchema = z.object({
  page,
  limit,
  type: z.enum(WALLET_TRANSACTION_TYPES).optional(),
});

export const commissionListQuerySchema = z.object({
  page,
  limit,
  paid: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => (v === undefined ? undefined : v === 'true')),
  salespersonId: objectIdString('salespersonId').optional(),
});

export const planListQuerySchema = z.object({
  type: z.enum(ENTITY_KINDS).optional(),
  isActive: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => (v === undefined ? undefined : v === 'true')),
});

const booleanQuery = z
  .enum(['true', 'false'])
  .optional()
  .transform((v) => (v === undefined ? undefined : v === 'true'));

export const voucherListQuerySchema = z.object({
  page,
  limit,
  targetUserType: z.enum(VOUCHER_HOLDER_TYPES).optional(),
  isActive: booleanQuery,
});

export const sponsorshipListQuerySchema = z.object({ page, limit, isActive: booleanQuery });

export const sponsorshipRequestQuerySchema = z.object({
  page,
  limit,
  status: z.enum(['pending', 'approved', 'rejected'], 'Status must be pending, approved or rejected').default('pending'),
});

export const reviewListQuerySchema = z.object({
  page,
  limit,
  serviceProviderId: objectIdString('serviceProviderId').optional(),
  hasReply: booleanQuery,
  isVerified: booleanQuery,
  rating: z
    .enum(['1', '2', '3', '4', '5'], 'Rating must be between 1 and 5')
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v))),
});

export const validate = <T>(schema: ZodType<T>): RequestHandler => {
  return (req, _res, next) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      return next(createError(400, result.error.issues.map((e) => e.message).join(', ')));
    }

    req.body = result.data;
    next();
  };
};

/** Parses `req.query` (or a multipart body) with `schema` or throws a 400. */
export const parseQuery = <T>(schema: ZodType<T>, query: unknown): T => {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    throw createError(400, parsed.error.issues.map((e) => e.message).join(', '));
  }
  return parsed.data;
};

