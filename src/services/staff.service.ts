import bcrypt from 'bcryptjs';
import createError from 'http-errors';
import { Types } from 'mongoose';
import ManagerModel from '../models/manager.model';
import SalesManagerModel from '../models/salesManager.model';
import SalespersonModel from '../models/salesperson.model';
import { HIDDEN_FIELDS } from '../models/sensitive';
import { Principal } from './access.service';
import { generateUniqueReferralCode } from '../utils/referralCode';
import { parseObjectId } from '../utils/params';
import { queryTimeout } from '../utils/db';
import { logger } from '../utils/logger';

const SALT_ROUNDS = 10;

interface StaffInput {
  fullName: string;
  email: string;
  password: string;
  phoneNumber?: string;
}

export interface ManagerInput extends StaffInput {
  rolesAccess: string[];
}

export interface SalesManagerInput extends ManagerInput {
  commissionPercent: number;
}

export interface SalespersonInput extends StaffInput {
  region?: string;
  commissionPercent: number;
  salesManagerId?: string;
}

/** Staff log in with one email across managers, sales managers and salespersons. */
const assertEmailAvailable = async (email: string) => {
  const [manager, salesManager, salesperson] = await Promise.all([
    ManagerModel.exists({ email }),
    SalesManagerModel.exists({ email }),
    SalespersonModel.exists({ email }),
  ]);
  if (manager || salesManager || salesperson) throw createError(409, 'Email already in use');
};

const creatorId = (actor: Principal) => (Types.ObjectId.isValid(actor.userId) ? new Types.ObjectId(actor.userId) : null);

export const createManager = async (input: ManagerInput) => {
  await assertEmailAvailable(input.email);
  const manager = await ManagerModel.create({
    fullName: input.fullName,
    email: input.email,
    password: await bcrypt.hash(input.password, SALT_ROUNDS),
    rolesAccess: input.rolesAccess,
  });
  logger.info('Manager created', { managerId: String(manager._id) });
  return manager.toJSON();
};

export const createSalesManager = async (input: SalesManagerInput, actor: Principal) => {
  await assertEmailAvailable(input.email);
  const salesManager = await SalesManagerModel.create({
    fullName: input.fullName,
    email: input.email,
    password: await bcrypt.hash(input.password, SALT_ROUNDS),
    phoneNumber: input.phoneNumber,
    rolesAccess: input.rolesAccess,
    commissionPercent: input.commissionPercent,
    createdBy: creatorId(actor),
  });
  logger.info('Sales manager created', { salesManagerId: String(salesManager._id) });
  return salesManager.toJSON();
};

/** A sales manager may only add salespersons to their own team. */
export const createSalesperson = async (input: SalespersonInput, actor: Principal) => {
  let salesManagerId = input.salesManagerId;
  if (actor.kind === 'sales_manager') {
    if (salesManagerId && salesManagerId !== actor.userId) {
      throw createError(403, 'Sales managers can only add salespersons to their own team');
    }
    salesManagerId = actor.userId;
  }
  if (!salesManagerId) throw createError(400, 'salesManagerId is required');

  const managerId = parseObjectId(salesManagerId, 'sales manager ID');
  const manager = await SalesManagerModel.exists({ _id: managerId });
  if (!manager) throw createError(404, 'Sales manager not found');

  await assertEmailAvailable(input.email);

  const referralCode = await generateUniqueReferralCode('SPR', async (code) =>
    Boolean(await SalespersonModel.exists({ referralCode: code })),
  );

  const salesperson = await SalespersonModel.create({
    fullName: input.fullName,
    email: input.email,
    password: await bcrypt.hash(input.password, SALT_ROUNDS),
    phoneNumber: input.phoneNumber,
    region: input.region,
    commissionPercent: input.commissionPercent,
    salesManagerId: managerId,
    referralCode,
    createdBy: creatorId(actor),
  });

  await SalesManagerModel.updateOne({ _id: managerId }, { $addToSet: { salespersons: salesperson._id } });

  logger.info('Salesperson created', { salespersonId: String(salesperson._id), salesManagerId: String(managerId) });
  return salesperson.toJSON();
};

export interface StaffListQuery {
  page: number;
  limit: number;
}

const pageMeta = (page: number, limit: number, total: number) => ({
  page,
  limit,
  total,
  totalPages: Math.ceil(total / limit),
});

export const listManagers = async ({ page, limit }: StaffListQuery) => {
  const [items, total] = await Promise.all([
    ManagerModel.find()
      .select(HIDDEN_FIELDS)
      .sort({ createdAt: -1 })
      .skip((page - 1) * limit)
      .limit(limit)
      .maxTimeMS(queryTimeout())
      .lean(),
    ManagerModel.countDocuments().maxTimeMS(queryTimeout()),
  ]);
  return { items, meta: pageMeta(page, limit, total) };
};

export const listSalesManagers = async ({ page, limit }: StaffListQuery) => {
  const [items, total] = await Promise.all([
    SalesManagerModel.find()
      .select(HIDDEN_FIELDS)
      .sort({ createdAt: -1 })
      .skip((page - 1) * limit)
      .limit(limit)
      .maxTimeMS(queryTimeout())
      .lean(),
    SalesManagerModel.countDocuments().maxTimeMS(queryTimeout()),
  ]);
  return { items, meta: pageMeta(page, limit, total) };
};

/** Sales managers only see their own salespersons. */
export const listSalespersons = async ({ page, limit }: StaffListQuery, actor: Principal) => {
  const filter = actor.kind === 'sales_manager' ? { salesManagerId: parseObjectId(actor.userId, 'user ID') } : {};
  const [items, total] = await Promise.all([
    SalespersonModel.find(filter)
      .select(HIDDEN_FIELDS)
      .sort({ createdAt: -1 })
      .skip((page - 1) * limit)
      .limit(limit)
      .maxTimeMS(queryTimeout())
      .lean(),
    SalespersonModel.countDocuments(filter).maxTimeMS(queryTimeout()),
  ]);
  return { items, meta: pageMeta(page, limit, total) };
};
