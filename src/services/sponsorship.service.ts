import { ClientSession, Types } from 'mongoose';
import createError from 'http-errors';
import { addDays } from 'date-fns';
import SponsorshipModel, { ISponsorship } from '../models/sponsorship.model';
import SponsorshipRequestModel, { SponsorshipRequestStatus } from '../models/sponsorshipRequest.model';
import SponsorshipSubscriptionModel from '../models/sponsorshipSubscription.model';
import AdminWalletModel from '../models/adminWallet.model';
import { EntityKind } from '../models/businessEntity';
import { EntityModels, getEntityModels } from '../models/registry';
import { EntityPrincipal, Principal } from './access.service';
import { Decision } from './subscriptionApproval.service';
import { notifyEntity } from './notification.service';
import { parseObjectId } from '../utils/params';
import { queryTimeout, withTransaction } from '../utils/db';
import { logger } from '../utils/logger';

export type SponsorshipInput = Pick<ISponsorship, 'title' | 'price' | 'duration' | 'discount' | 'isActive'> &
  Partial<Pick<ISponsorship, 'description' | 'startDate' | 'endDate'>>;

/** Price after the sponsorship's discount, rounded to cents. */
export const discountedPrice = (price: number, discount: number) =>
  Math.round(price * (1 - discount / 100) * 100) / 100;

const isExpired = (sponsorship: Pick<ISponsorship, 'endDate'>, now: Date) =>
  Boolean(sponsorship.endDate && sponsorship.endDate < now);

// ---------- admin catalogue ----------

export const createSponsorship = async (input: SponsorshipInput, createdBy: string) => {
  const sponsorship = await SponsorshipModel.create({ ...input, createdBy: parseObjectId(createdBy, 'user ID') });
  logger.info('Sponsorship created', { sponsorshipId: String(sponsorship._id), price: sponsorship.price });
  return sponsorship.toObject();
};

export interface SponsorshipQuery {
  page: number;
  limit: number;
  isActive?: boolean;
}

export const listSponsorships = async ({ page, limit, isActive }: SponsorshipQuery) => {
  const filter: { isActive?: boolean } = {};
  if (isActive !== undefined) filter.isActive = isActive;

  const [items, total] = await Promise.all([
    SponsorshipModel.find(filter)
      .sort({ createdAt: -1 })
      .skip((page - 1) * limit)
      .limit(limit)
      .maxTimeMS(queryTimeout())
      .lean(),
    SponsorshipModel.countDocuments(filter).maxTimeMS(queryTimeout()),
  ]);

  return { items, meta: { page, limit, total, totalPages: Math.ceil(total / limit) } };
};

export const updateSponsorship = async (id: string, patch: Partial<SponsorshipInput>) => {
  const sponsorship = await SponsorshipModel.findByIdAndUpdate(parseObjectId(id, 'sponsorship ID'), patch, {
    new: true,
    runValidators: true,
  }).lean();
  if (!sponsorship) throw createError(404, 'Sponsorship not found');
  return sponsorship;
};

export const setSponsorshipActive = async (id: string, isActive: boolean) => {
  const result = await SponsorshipModel.updateOne(
    { _id: parseObjectId(id, 'sponsorship ID') },
    { $set: { isActive } },
  );
  if (result.matchedCount === 0) throw createError(404, 'Sponsorship not found');
};

// ---------- entity self-service ----------

/** Active packages that have not passed their end date. */
export const listAvailableSponsorships = async () => {
  const now = new Date();
  return SponsorshipModel.find({
    isActive: true,
    $or: [{ endDate: null }, { endDate: { $gte: now } }],
  })
    .sort({ price: 1 })
    .maxTimeMS(queryTimeout())
    .lean();
};

/**
 * Service providers sponsor themselves; companies and wholesalers sponsor one
 * of their branches, named by `branchId`.
 */
export const requestSponsorship = async (owner: EntityPrincipal, sponsorshipId: string, branchId?: string) => {
  const now = new Date();

  const sponsorship = await SponsorshipModel.findById(parseObjectId(sponsorshipId, 'sponsorship ID'))
    .maxTimeMS(queryTimeout())
    .lean();
  if (!sponsorship || !sponsorship.isActive) throw createError(404, 'Sponsorship not found');
  if (isExpired(sponsorship, now)) throw createError(400, 'Sponsorship has expired');

  const models = getEntityModels(owner.entityKind);
  const entity = await models.entity
    .findOne({ userId: parseObjectId(owner.userId, 'user ID') })
    .select('_id branches._id')
    .maxTimeMS(queryTimeout())
    .lean();
  if (!entity) throw createError(404, `${models.label} not found`);

  let target: Types.ObjectId | null = null;
  if (owner.entityKind !== 'serviceProvider') {
    if (!branchId) throw createError(400, 'Branch ID is required');
    const wanted = parseObjectId(branchId, 'branch ID');
    const branch = entity.branches.find((b) => b._id.equals(wanted));
    if (!branch) throw createError(404, 'Branch not found');
    target = branch._id;
  }

  const targetFilter = { entityId: entity._id, branchId: target };

  const active = await SponsorshipSubscriptionModel.exists({ ...targetFilter, status: 'active', endDate: { $gt: now } });
  if (active) throw createError(409, 'This target already has an active sponsorship');

  const pending = await SponsorshipRequestModel.exists({ ...targetFilter, status: 'pending' });
  if (pending) throw createError(409, 'A sponsorship request is already pending for this target');

  const request = await SponsorshipRequestModel.create({
    sponsorshipId: sponsorship._id,
    entityType: owner.entityKind,
    ...targetFilter,
    status: 'pending',
    requestedAt: now,
  });

  logger.info('Sponsorship requested', {
    sponsorshipId: String(sponsorship._id),
    entityType: owner.entityKind,
    entityId: String(entity._id),
    branchId: target ? String(target) : null,
  });
  return request.toObject();
};

export const listMySponsorships = async (owner: EntityPrincipal) => {
  const models = getEntityModels(owner.entityKind);
  const entity = await models.entity
    .findOne({ userId: parseObjectId(owner.userId, 'user ID') })
    .select('_id')
    .maxTimeMS(queryTimeout())
    .lean();
  if (!entity) throw createError(404, `${models.label} not found`);

  return SponsorshipSubscriptionModel.find({ entityId: entity._id, status: 'active', endDate: { $gt: new Date() } })
    .sort({ endDate: 1 })
    .maxTimeMS(queryTimeout())
    .lean();
};

// ---------- approval ----------

export interface SponsorshipRequestQuery {
  page: number;
  limit: number;
  status: SponsorshipRequestStatus;
}

export const listSponsorshipRequests = async ({ page, limit, status }: SponsorshipRequestQuery) => {
  const [items, total] = await Promise.all([
    SponsorshipRequestModel.find({ status })
      .sort({ requestedAt: -1 })
      .skip((page - 1) * limit)
      .limit(limit)
      .maxTimeMS(queryTimeout())
      .lean(),
    SponsorshipRequestModel.countDocuments({ status }).maxTimeMS(queryTimeout()),
  ]);

  return { items, meta: { page, limit, total, totalPages: Math.ceil(total / limit) } };
};

const setSponsoredFlag = async (
  models: EntityModels,
  entityId: Types.ObjectId,
  branchId: Types.ObjectId | null,
  sponsored: boolean,
  session?: ClientSession,
) => {
  if (branchId) {
    await models.entity.updateOne(
      { _id: entityId, 'branches._id': branchId },
      { $set: { 'branches.$.sponsored': sponsored } },
      { session },
    );
  } else {
    await models.entity.updateOne({ _id: entityId }, { $set: { sponsored } }, { session });
  }
};

export interface ProcessSponsorshipInput {
  requestId: string;
  decision: Decision;
  note?: string;
  actor: Principal;
}

/**
 * Approves or rejects a pending sponsorship request. An approval starts a
 * sponsorship subscription of `duration` days, counts the use, flags the
 * entity or branch and books the discounted price as sponsorship income.
 */
export const processSponsorshipRequest = async (input: ProcessSponsorshipInput) => {
  const { decision, actor } = input;
  const adminNote = input.note ?? '';

  if (!actor.hasCapability('subscription_approval')) {
    throw createError(403, 'Access denied: insufficient permissions');
  }

  const requestId = parseObjectId(input.requestId, 'request ID');
  const request = await SponsorshipRequestModel.findById(requestId).maxTimeMS(queryTimeout()).lean();
  if (!request) throw createError(404, 'Sponsorship request not found');
  if (request.status !== 'pending') {
    throw createError(409, `Sponsorship request is already ${request.status}`);
  }

  const sponsorship = await SponsorshipModel.findById(request.sponsorshipId).maxTimeMS(queryTimeout()).lean();
  if (!sponsorship) throw createError(404, 'Sponsorship not found');

  const kind: EntityKind = request.entityType;
  const models = getEntityModels(kind);
  const entity = await models.entity
    .findById(request.entityId)
    .select('_id businessName email')
    .maxTimeMS(queryTimeout())
    .lean();
  if (!entity) throw createError(404, `${models.label} not found`);

  const processedAt = new Date();
  const amount = discountedPrice(sponsorship.price, sponsorship.discount);

  const subscription = await withTransaction(async (session) => {
    const claimed = await SponsorshipRequestModel.updateOne(
      { _id: requestId, status: 'pending' },
      { $set: { status: decision, processedAt, adminNote } },
      { session },
    );
    if (claimed.modifiedCount === 0) {
      throw createError(409, 'Sponsorship request was processed concurrently');
    }

    if (decision === 'rejected') {
      await setSponsoredFlag(models, entity._id, request.branchId, false, session);
      return null;
    }

    const [created] = await SponsorshipSubscriptionModel.create(
      [
        {
          sponsorshipId: sponsorship._id,
          entityId: entity._id,
          entityType: kind,
          branchId: request.branchId,
          status: 'active',
          startDate: processedAt,
          endDate: addDays(processedAt, sponsorship.duration),
          discountApplied: sponsorship.discount,
          amountPaid: amount,
        },
      ],
      { session },
    );

    await SponsorshipModel.updateOne({ _id: sponsorship._id }, { $inc: { usedCount: 1 } }, { session });
    await setSponsoredFlag(models, entity._id, request.branchId, true, session);
    await AdminWalletModel.create(
      [
        {
          type: 'sponsorship_income',
          amount,
          entityType: kind,
          entityId: entity._id,
          description: `Sponsorship "${sponsorship.title}" for ${entity.businessName}`,
        },
      ],
      { session },
    );

    return created.toObject();
  });

  logger.info('Sponsorship request processed', {
    requestId: String(requestId),
    entityId: String(entity._id),
    decision,
    processedBy: actor.userId,
  });

  await notifyEntity({
    kind,
    entityId: String(entity._id),
    email: entity.email,
    subject: subscription ? 'Sponsorship Approved' : 'Sponsorship Request Rejected',
    message: subscription
      ? `Your sponsorship "${sponsorship.title}" is active for ${sponsorship.duration} days.`
      : `Your sponsorship request for "${sponsorship.title}" was rejected.${adminNote ? ` Note: ${adminNote}` : ''}`,
  });

  return {
    requestId: String(requestId),
    entityName: entity.businessName,
    sponsorshipTitle: sponsorship.title,
    status: decision,
    processedAt,
    adminNote,
    amount: subscription ? amount : 0,
    subscription,
  };
};
