import { Model, PipelineStage } from 'mongoose';
import { ENTITY_KINDS, EntityKind } from '../models/businessEntity';
import { getEntityModels } from '../models/registry';
import { IEntitySubscription } from '../models/entitySubscription.model';
import SponsorshipSubscriptionModel from '../models/sponsorshipSubscription.model';
import { SPONSORSHIPS_COLLECTION } from '../models/sponsorship.model';
import { SUBSCRIPTION_PLANS_COLLECTION } from '../models/subscriptionPlan.model';
import AdminWalletModel, { WalletTransactionType } from '../models/adminWallet.model';
import CommissionModel from '../models/commission.model';
import { queryTimeout } from '../utils/db';
import { logger } from '../utils/logger';

export type IncomeSource = EntityKind | 'sponsorship';

export interface IncomeLine {
  income: number;
  error: string | null;
}

export interface CommissionShare {
  commission: number;
  percentage: number;
}

export interface WalletSummary {
  totalIncome: number;
  subscriptionIncome: number;
  adminWalletIncome: number;
  withdrawalIncome: number;
  totalCommissions: number;
  netProfit: number;
  incomeBreakdown: Record<IncomeSource, IncomeLine>;
  commissionBreakdown: {
    salesperson: CommissionShare;
    salesManager: CommissionShare;
    total: number;
  };
}

interface TotalRow {
  total: number;
}

const activePriceSum = (priceFrom: string, localField: string): PipelineStage[] => [
  { $match: { status: 'active' } },
  { $lookup: { from: priceFrom, localField, foreignField: '_id', as: 'priced' } },
  { $unwind: '$priced' },
  { $group: { _id: null, total: { $sum: '$priced.price' } } },
];

const sumActiveSubscriptions = async (model: Model<IEntitySubscription>) => {
  const rows = await model
    .aggregate<TotalRow>(activePriceSum(SUBSCRIPTION_PLANS_COLLECTION, 'planId'))
    .option({ maxTimeMS: queryTimeout() });
  return rows[0]?.total ?? 0;
};

const sumActiveSponsorships = async () => {
  const rows = await SponsorshipSubscriptionModel.aggregate<TotalRow>(
    activePriceSum(SPONSORSHIPS_COLLECTION, 'sponsorshipId'),
  ).option({ maxTimeMS: queryTimeout() });
  return rows[0]?.total ?? 0;
};

const toIncomeLine = async (source: IncomeSource, run: () => Promise<number>): Promise<IncomeLine> => {
  try {
    return { income: await run(), error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error('Income query failed', { source, error: message });
    return { income: 0, error: message };
  }
};

const percentageOf = (part: number, total: number) => (total === 0 ? 0 : Math.round((part / total) * 10000) / 100);

/**
 * Read-only revenue picture across every income source. A failing per-kind
 * income query is reported in `incomeBreakdown` and counted as zero.
 */
export const getWalletSummary = async (): Promise<WalletSummary> => {
  const [company, wholesaler, serviceProvider, sponsorship] = await Promise.all([
    ...ENTITY_KINDS.map((kind) => toIncomeLine(kind, () => sumActiveSubscriptions(getEntityModels(kind).subscription))),
    toIncomeLine('sponsorship', sumActiveSponsorships),
  ]);

  const [walletRows, commissionRows] = await Promise.all([
    AdminWalletModel.aggregate<{ _id: WalletTransactionType; total: number }>([
      { $match: { type: { $in: ['subscription_income', 'withdrawal_income'] } } },
      { $group: { _id: '$type', total: { $sum: '$amount' } } },
    ]).option({ maxTimeMS: queryTimeout() }),
    CommissionModel.aggregate<{ salesperson: number; salesManager: number }>([
      {
        $group: {
          _id: null,
          salesperson: { $sum: '$salespersonCommission' },
          salesManager: { $sum: '$salesManagerCommission' },
        },
      },
    ]).option({ maxTimeMS: queryTimeout() }),
  ]);

  const walletTotal = (type: WalletTransactionType) => walletRows.find((row) => row._id === type)?.total ?? 0;

  const subscriptionIncome = company.income + wholesaler.income + serviceProvider.income + sponsorship.income;
  const adminWalletIncome = walletTotal('subscription_income');
  const withdrawalIncome = walletTotal('withdrawal_income');
  const totalIncome = subscriptionIncome + adminWalletIncome + withdrawalIncome;

  const salespersonTotal = commissionRows[0]?.salesperson ?? 0;
  const salesManagerTotal = commissionRows[0]?.salesManager ?? 0;
  const totalCommissions = salespersonTotal + salesManagerTotal;

  return {
    totalIncome,
    subscriptionIncome,
    adminWalletIncome,
    withdrawalIncome,
    totalCommissions,
    netProfit: totalIncome - totalCommissions,
    incomeBreakdown: { company, wholesaler, serviceProvider, sponsorship },
    commissionBreakdown: {
      salesperson: { commission: salespersonTotal, percentage: percentageOf(salespersonTotal, totalCommissions) },
      salesManager: { commission: salesManagerTotal, percentage: percentageOf(salesManagerTotal, totalCommissions) },
      total: totalCommissions,
    },
  };
};

export interface WalletTransactionQuery {
  page: number;
  limit: number;
  type?: WalletTransactionType;
}

export const listWalletTransactions = async ({ page, limit, type }: WalletTransactionQuery) => {
  const filter = type ? { type } : {};

  const [items, total] = await Promise.all([
    AdminWalletModel.find(filter)
      .sort({ createdAt: -1 })
      .skip((page - 1) * limit)
      .limit(limit)
      .maxTimeMS(queryTimeout())
      .lean(),
    AdminWalletModel.countDocuments(filter).maxTimeMS(queryTimeout()),
  ]);

  return {
    items,
    meta: { page, limit, total, totalPages: Math.ceil(total / limit) },
  };
};
