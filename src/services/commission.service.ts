import { ClientSession, Types } from 'mongoose';
import createError from 'http-errors';
import CommissionModel, { ICommission } from '../models/commission.model';
import SalespersonModel from '../models/salesperson.model';
import SalesManagerModel from '../models/salesManager.model';
import AdminWalletModel from '../models/adminWallet.model';
import { EntityKind } from '../models/businessEntity';
import { parseObjectId } from '../utils/params';
import { queryTimeout } from '../utils/db';
import { logger } from '../utils/logger';

export interface CommissionAmounts {
  salespersonCommission: number;
  salesManagerCommission: number;
  totalCommission: number;
  adminNet: number;
}

/**
 * Both shares are taken from the full plan price. The percentages are not
 * clamped and may sum past 100, in which case `adminNet` goes negative.
 */
export const calculateCommission = (
  planPrice: number,
  salespersonPercent: number,
  salesManagerPercent: number,
): CommissionAmounts => {
  const salespersonCommission = (planPrice * salespersonPercent) / 100;
  const salesManagerCommission = (planPrice * salesManagerPercent) / 100;
  return {
    salespersonCommission,
    salesManagerCommission,
    totalCommission: salespersonCommission + salesManagerCommission,
    adminNet: planPrice - salespersonCommission - salesManagerCommission,
  };
};

export interface CommissionSource {
  entityType: EntityKind;
  entity: {
    _id: Types.ObjectId;
    userId: Types.ObjectId;
    businessName: string;
    createdBy?: Types.ObjectId | null;
  };
  plan: { _id: Types.ObjectId; title: string; price: number };
  subscriptionId: Types.ObjectId;
  session?: ClientSession;
}

export type CommissionOutcome =
  | { kind: 'direct_income'; amount: number }
  | { kind: 'skipped'; reason: 'salesperson_not_found' | 'sales_manager_not_found' }
  | { kind: 'commission'; commission: ICommission & { _id: Types.ObjectId } };

const isSelfRegistered = (entity: CommissionSource['entity']) =>
  !entity.createdBy || entity.createdBy.equals(entity.userId);

/**
 * Books the revenue of a freshly approved subscription: admin wallet income
 * for self-registered entities, otherwise one commission line for the
 * onboarding salesperson and their sales manager.
 */
export const recordSubscriptionCommission = async (source: CommissionSource): Promise<CommissionOutcome> => {
  const { entityType, entity, plan, subscriptionId, session } = source;

  if (isSelfRegistered(entity)) {
    await AdminWalletModel.create(
      [
        {
          type: 'subscription_income',
          amount: plan.price,
          entityType,
          entityId: entity._id,
          description: `Subscription "${plan.title}" for ${entity.businessName}`,
        },
      ],
      { session },
    );
    logger.info('Direct subscription income recorded', { entityId: String(entity._id), amount: plan.price });
    return { kind: 'direct_income', amount: plan.price };
  }

  const salesperson = await SalespersonModel.findById(entity.createdBy)
    .select('salesManagerId commissionPercent')
    .session(session ?? null)
    .lean();

  if (!salesperson) {
    logger.warn('Salesperson not found; commission skipped', {
      entityId: String(entity._id),
      createdBy: String(entity.createdBy),
    });
    return { kind: 'skipped', reason: 'salesperson_not_found' };
  }

  const salesManager = await SalesManagerModel.findById(salesperson.salesManagerId)
    .select('commissionPercent')
    .session(session ?? null)
    .lean();

  if (!salesManager) {
    logger.warn('Sales manager not found; commission skipped', {
      entityId: String(entity._id),
      salespersonId: String(salesperson._id),
      salesManagerId: String(salesperson.salesManagerId),
    });
    return { kind: 'skipped', reason: 'sales_manager_not_found' };
  }

  const amounts = calculateCommission(plan.price, salesperson.commissionPercent, salesManager.commissionPercent);

  const [commission] = await CommissionModel.create(
    [
      {
        subscriptionId,
        entityId: entity._id,
        entityType,
        planId: plan._id,
        planPrice: plan.price,
        salespersonId: salesperson._id,
        salespersonCommissionPercent: salesperson.commissionPercent,
        salespersonCommission: amounts.salespersonCommission,
        salesManagerId: salesManager._id,
        salesManagerCommissionPercent: salesManager.commissionPercent,
        salesManagerCommission: amounts.salesManagerCommission,
        paid: false,
        paidAt: null,
      },
    ],
    { session },
  );

  logger.info('Commission recorded', {
    subscriptionId: String(subscriptionId),
    salespersonCommission: amounts.salespersonCommission,
    salesManagerCommission: amounts.salesManagerCommission,
  });

  return { kind: 'commission', commission: commission.toObject() };
};

export const markCommissionPaid = async (id: string) => {
  const commissionId = parseObjectId(id, 'commission ID');

  const updated = await CommissionModel.findOneAndUpdate(
    { _id: commissionId, paid: false },
    { $set: { paid: true, paidAt: new Date() } },
    { new: true },
  ).lean();

  if (updated) return updated;

  const exists = await CommissionModel.exists({ _id: commissionId });
  if (!exists) throw createError(404, 'Commission not found');
  throw createError(409, 'Commission is already paid');
};

export interface CommissionQuery {
  page: number;
  limit: number;
  paid?: boolean;
  salespersonId?: string;
}

export const listCommissions = async ({ page, limit, paid, salespersonId }: CommissionQuery) => {
  const filter: { paid?: boolean; salespersonId?: Types.ObjectId } = {};
  if (paid !== undefined) filter.paid = paid;
  if (salespersonId) filter.salespersonId = parseObjectId(salespersonId, 'salesperson ID');

  const [items, total] = await Promise.all([
    CommissionModel.find(filter)
      .sort({ createdAt: -1 })
      .skip((page - 1) * limit)
      .limit(limit)
      .maxTimeMS(queryTimeout())
      .lean(),
    CommissionModel.countDocuments(filter).maxTimeMS(queryTimeout()),
  ]);

  return {
    items,
    meta: { page, limit, total, totalPages: Math.ceil(total / limit) },
  };
};
