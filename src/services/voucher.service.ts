import { Types } from 'mongoose';
import createError from 'http-errors';
import VoucherModel, { IVoucher } from '../models/voucher.model';
import VoucherPurchaseModel from '../models/voucherPurchase.model';
import UserModel, { UserType } from '../models/user';
import { isEntityKind } from '../models/businessEntity';
import { getEntityModels } from '../models/registry';
import { TokenClaims } from '../utils/token';
import { parseObjectId } from '../utils/params';
import { isDuplicateKeyError, queryTimeout } from '../utils/db';
import { logger } from '../utils/logger';

/** Where a caller's points live: `users` for plain users, the owned entity otherwise. */
interface PointsHolder {
  type: UserType;
  accountId: Types.ObjectId;
  balance: () => Promise<number | null>;
  /** Deducts only when the balance covers `cost`. */
  deduct: (cost: number) => Promise<boolean>;
  refund: (cost: number) => Promise<void>;
}

const pointsHolderFor = (claims: TokenClaims): PointsHolder => {
  const accountId = parseObjectId(claims.userId, 'user ID');
  const { userType } = claims;

  if (userType === 'user') {
    return {
      type: 'user',
      accountId,
      balance: async () => {
        const user = await UserModel.findById(accountId).select('points').maxTimeMS(queryTimeout()).lean();
        return user ? user.points : null;
      },
      deduct: async (cost) => {
        const result = await UserModel.updateOne(
          { _id: accountId, points: { $gte: cost } },
          { $inc: { points: -cost } },
        );
        return result.modifiedCount > 0;
      },
      refund: async (cost) => {
        await UserModel.updateOne({ _id: accountId }, { $inc: { points: cost } });
      },
    };
  }

  if (isEntityKind(userType)) {
    const { entity } = getEntityModels(userType);
    return {
      type: userType,
      accountId,
      balance: async () => {
        const doc = await entity.findOne({ userId: accountId }).select('points').maxTimeMS(queryTimeout()).lean();
        return doc ? doc.points : null;
      },
      deduct: async (cost) => {
        const result = await entity.updateOne(
          { userId: accountId, points: { $gte: cost } },
          { $inc: { points: -cost } },
        );
        return result.modifiedCount > 0;
      },
      refund: async (cost) => {
        await entity.updateOne({ userId: accountId }, { $inc: { points: cost } });
      },
    };
  }

  throw createError(403, 'Only account holders can use vouchers');
};

// ---------- account holders ----------

export const listAvailableVouchers = async (claims: TokenClaims) => {
  const holder = pointsHolderFor(claims);
  const points = await holder.balance();
  if (points === null) throw createError(404, 'Account not found');

  const vouchers = await VoucherModel.find({ isActive: true, targetUserType: holder.type })
    .sort({ points: 1 })
    .maxTimeMS(queryTimeout())
    .lean();

  const purchases = await VoucherPurchaseModel.find({
    holderId: holder.accountId,
    voucherId: { $in: vouchers.map((v) => v._id) },
  })
    .select('voucherId')
    .lean();
  const purchased = new Set(purchases.map((p) => String(p.voucherId)));

  return {
    points,
    vouchers: vouchers.map((voucher) => {
      const alreadyPurchased = purchased.has(String(voucher._id));
      return { ...voucher, purchased: alreadyPurchased, canPurchase: !alreadyPurchased && points >= voucher.points };
    }),
  };
};

/**
 * Spends the caller's points on one voucher. The deduction is conditional on
 * the balance, and the unique (account, voucher) index turns a racing second
 * purchase into a 409 after its points are given back.
 */
export const purchaseVoucher = async (claims: TokenClaims, id: string) => {
  const holder = pointsHolderFor(claims);
  const voucherId = parseObjectId(id, 'voucher ID');

  const voucher = await VoucherModel.findOne({ _id: voucherId, isActive: true }).maxTimeMS(queryTimeout()).lean();
  if (!voucher) throw createError(404, 'Voucher not found or inactive');
  if (voucher.targetUserType !== holder.type) {
    throw createError(403, 'This voucher is not available for your account type');
  }

  const owned = await VoucherPurchaseModel.exists({ holderId: holder.accountId, voucherId });
  if (owned) throw createError(409, 'You have already purchased this voucher');

  const deducted = await holder.deduct(voucher.points);
  if (!deducted) {
    const balance = await holder.balance();
    if (balance === null) throw createError(404, 'Account not found');
    throw createError(400, 'Insufficient points');
  }

  const now = new Date();
  try {
    const purchase = await VoucherPurchaseModel.create({
      voucherId,
      holderId: holder.accountId,
      holderType: holder.type,
      pointsUsed: voucher.points,
      isUsed: true,
      usedAt: now,
    });
    logger.info('Voucher purchased', {
      voucherId: String(voucherId),
      holderId: String(holder.accountId),
      points: voucher.points,
    });
    return { purchase: purchase.toObject(), voucher };
  } catch (err) {
    try {
      await holder.refund(voucher.points);
    } catch (refundErr) {
      logger.error('Voucher refund failed', {
        voucherId: String(voucherId),
        holderId: String(holder.accountId),
        points: voucher.points,
        error: refundErr instanceof Error ? refundErr.message : refundErr,
      });
    }
    if (isDuplicateKeyError(err)) throw createError(409, 'You have already purchased this voucher');
    throw err;
  }
};

export const listMyVouchers = async (claims: TokenClaims) => {
  const accountId = parseObjectId(claims.userId, 'user ID');
  const purchases = await VoucherPurchaseModel.find({ holderId: accountId })
    .sort({ createdAt: -1 })
    .maxTimeMS(queryTimeout())
    .lean();

  const vouchers = await VoucherModel.find({ _id: { $in: purchases.map((p) => p.voucherId) } })
    .select('name description image points')
    .lean();
  const byId = new Map(vouchers.map((v) => [String(v._id), v]));

  return purchases.map((purchase) => ({ ...purchase, voucher: byId.get(String(purchase.voucherId)) ?? null }));
};

// ---------- admin ----------

export type VoucherInput = Pick<IVoucher, 'name' | 'points' | 'targetUserType' | 'isActive'> &
  Partial<Pick<IVoucher, 'description' | 'image'>>;

export const createVoucher = async (input: VoucherInput, createdBy: string) => {
  const voucher = await VoucherModel.create({ ...input, createdBy: parseObjectId(createdBy, 'user ID') });
  logger.info('Voucher created', { voucherId: String(voucher._id), targetUserType: voucher.targetUserType });
  return voucher.toObject();
};

export interface VoucherQuery {
  page: number;
  limit: number;
  targetUserType?: UserType;
  isActive?: boolean;
}

export const listVouchers = async ({ page, limit, targetUserType, isActive }: VoucherQuery) => {
  const filter: { targetUserType?: UserType; isActive?: boolean } = {};
  if (targetUserType) filter.targetUserType = targetUserType;
  if (isActive !== undefined) filter.isActive = isActive;

  const [items, total] = await Promise.all([
    VoucherModel.find(filter)
      .sort({ createdAt: -1 })
      .skip((page - 1) * limit)
      .limit(limit)
      .maxTimeMS(queryTimeout())
      .lean(),
    VoucherModel.countDocuments(filter).maxTimeMS(queryTimeout()),
  ]);

  return { items, meta: { page, limit, total, totalPages: Math.ceil(total / limit) } };
};

export const updateVoucher = async (id: string, patch: Partial<VoucherInput>) => {
  const voucher = await VoucherModel.findByIdAndUpdate(parseObjectId(id, 'voucher ID'), patch, {
    new: true,
    runValidators: true,
  }).lean();
  if (!voucher) throw createError(404, 'Voucher not found');
  return voucher;
};

export const toggleVoucher = async (id: string) => {
  const voucherId = parseObjectId(id, 'voucher ID');
  const current = await VoucherModel.findById(voucherId).select('isActive').lean();
  if (!current) throw createError(404, 'Voucher not found');

  const voucher = await VoucherModel.findOneAndUpdate(
    { _id: voucherId, isActive: current.isActive },
    { $set: { isActive: !current.isActive } },
    { new: true },
  ).lean();
  if (!voucher) throw createError(409, 'Voucher was changed concurrently');
  return voucher;
};

/** Removes the voucher; purchases already made stay on record. */
export const deleteVoucher = async (id: string) => {
  const result = await VoucherModel.deleteOne({ _id: parseObjectId(id, 'voucher ID') });
  if (result.deletedCount === 0) throw createError(404, 'Voucher not found');
};
