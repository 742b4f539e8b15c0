import { Model, Types } from 'mongoose';
import createError from 'http-errors';
import UserModel from '../models/user';
import CompanyModel from '../models/company.model';
import WholesalerModel from '../models/wholesaler.model';
import ServiceProviderModel from '../models/serviceProvider.model';
import { IBusinessEntity } from '../models/businessEntity';
import { env } from '../config/env';
import { generateUniqueReferralCode } from '../utils/referralCode';
import { parseObjectId } from '../utils/params';
import { queryTimeout } from '../utils/db';
import { logger } from '../utils/logger';

export const REFERRAL_POINTS = 5;

export type ReferrerSource = 'users' | 'companies' | 'wholesalers' | 'serviceProviders';

interface ReferrerDoc {
  _id: Types.ObjectId;
  userId?: Types.ObjectId;
  referrals?: Types.ObjectId[];
}

interface ReferrerMatch {
  source: ReferrerSource;
  _id: Types.ObjectId;
  /** Owning account for business entities. */
  userId: Types.ObjectId | null;
  referrals: Types.ObjectId[];
  award: (referred: Types.ObjectId) => Promise<boolean>;
}

const awardUpdate = (referred: Types.ObjectId) => ({
  $inc: { points: REFERRAL_POINTS },
  $push: { referrals: referred },
  $set: { updatedAt: new Date() },
});

interface ReferrerLookup {
  source: ReferrerSource;
  find: (code: string) => Promise<ReferrerDoc | null>;
  award: (id: Types.ObjectId, referred: Types.ObjectId) => Promise<boolean>;
}

const userReferrers: ReferrerLookup = {
  source: 'users',
  find: (code) =>
    UserModel.findOne({ referralCode: code })
      .select('_id referrals')
      .maxTimeMS(queryTimeout())
      .lean<ReferrerDoc>()
      .exec(),
  award: async (id, referred) => {
    const result = await UserModel.updateOne({ _id: id, referrals: { $ne: referred } }, awardUpdate(referred));
    return result.modifiedCount > 0;
  },
};

const entityReferrers = (source: ReferrerSource, model: Model<IBusinessEntity>): ReferrerLookup => ({
  source,
  find: (code) =>
    model
      .findOne({ referralCode: code })
      .select('_id userId referrals')
      .maxTimeMS(queryTimeout())
      .lean<ReferrerDoc>()
      .exec(),
  award: async (id, referred) => {
    const result = await model.updateOne({ _id: id, referrals: { $ne: referred } }, awardUpdate(referred));
    return result.modifiedCount > 0;
  },
});

// searched in this order
const referrerSources = (): ReferrerLookup[] => [
  userReferrers,
  entityReferrers('companies', CompanyModel),
  entityReferrers('wholesalers', WholesalerModel),
  entityReferrers('serviceProviders', ServiceProviderModel),
];

const findReferrer = async (code: string): Promise<ReferrerMatch | null> => {
  for (const { source, find, award } of referrerSources()) {
    const doc = await find(code);
    if (doc) {
      return {
        source,
        _id: doc._id,
        userId: doc.userId ?? null,
        referrals: doc.referrals ?? [],
        award: (referred) => award(doc._id, referred),
      };
    }
  }
  return null;
};

const isReferralCodeTaken = async (code: string) => Boolean(await UserModel.exists({ referralCode: code }));

const ensureOwnReferralCode = async (userId: Types.ObjectId, current: string | undefined) => {
  if (current) return current;
  const code = await generateUniqueReferralCode('USR', isReferralCodeTaken);
  await UserModel.updateOne({ _id: userId }, { $set: { referralCode: code } });
  return code;
};

export interface ApplyReferralResult {
  referrerType: ReferrerSource;
  pointsAwarded: number;
  referralCode: string | null;
}

/**
 * Credits the owner of `code` with REFERRAL_POINTS for referring `callerId`.
 * A caller can be credited to a given referrer only once.
 */
export const applyReferralCode = async (callerId: string, rawCode: string): Promise<ApplyReferralResult> => {
  const code = rawCode.trim();
  if (!code) throw createError(400, 'Referral code is required');

  const caller = parseObjectId(callerId, 'user ID');

  const referrer = await findReferrer(code);
  if (!referrer) throw createError(404, 'Invalid referral code');

  if (referrer._id.equals(caller) || referrer.userId?.equals(caller)) {
    throw createError(400, 'You cannot use your own referral code');
  }

  if (referrer.referrals.some((id) => id.equals(caller))) {
    throw createError(409, 'This referral code has already been used');
  }

  const awarded = await referrer.award(caller);
  if (!awarded) {
    throw createError(409, 'This referral code has already been used');
  }

  logger.info('Referral points awarded', {
    referrerType: referrer.source,
    referrerId: String(referrer._id),
    referredId: callerId,
    points: REFERRAL_POINTS,
  });

  let ownCode: string | null = null;
  try {
    const user = await UserModel.findById(caller).select('referralCode').lean();
    if (user) ownCode = await ensureOwnReferralCode(caller, user.referralCode);
  } catch (err) {
    logger.warn('Failed to assign referral code to caller', {
      userId: callerId,
      error: err instanceof Error ? err.message : err,
    });
  }

  return { referrerType: referrer.source, pointsAwarded: REFERRAL_POINTS, referralCode: ownCode };
};

export const buildReferralLink = (code: string) => `${env.REFERRAL_LINK_BASE}?ref=${encodeURIComponent(code)}`;

export const getReferralData = async (callerId: string) => {
  const userId = parseObjectId(callerId, 'user ID');
  const user = await UserModel.findById(userId)
    .select('referralCode referrals points')
    .maxTimeMS(queryTimeout())
    .lean();
  if (!user) throw createError(404, 'User not found');

  const referralCode = await ensureOwnReferralCode(userId, user.referralCode);

  return {
    referralCode,
    referralCount: user.referrals.length,
    points: user.points,
    referralLink: buildReferralLink(referralCode),
  };
};
