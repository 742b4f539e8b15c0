import { ClientSession, Types } from 'mongoose';
import createError from 'http-errors';
import { addMonths, differenceInDays, format } from 'date-fns';
import SubscriptionPlanModel, { isPlanDuration } from '../models/subscriptionPlan.model';
import UserModel from '../models/user';
import { BranchStatus, EntityKind, IBusinessEntity } from '../models/businessEntity';
import { EntityModels, getEntityModels } from '../models/registry';
import { IEntitySubscription } from '../models/entitySubscription.model';
import { CommissionOutcome, recordSubscriptionCommission } from './commission.service';
import { notifyEntity } from './notification.service';
import { Principal } from './access.service';
import { parseObjectId } from '../utils/params';
import { queryTimeout, withTransaction } from '../utils/db';
import { subscriptionRequestsProcessed } from '../utils/metrics';
import { logger } from '../utils/logger';

export type Decision = 'approved' | 'rejected';

export interface ProcessSubscriptionInput {
  kind: EntityKind;
  requestId: string;
  decision: Decision;
  note?: string;
  actor: Principal;
}

export interface ProcessResult {
  requestId: string;
  entityName: string;
  planName: string;
  status: Decision;
  processedAt: Date;
  adminNote: string;
  subscription: (IEntitySubscription & { _id: Types.ObjectId }) | null;
  commission: CommissionOutcome | null;
}

type EntityRecord = IBusinessEntity & { _id: Types.ObjectId };

/**
 * Sets every branch of `entity` to `status`. Each branch gets a positional
 * update; if that fails the entity is re-read and saved whole. Failures are
 * logged and never abort the caller.
 *
 * Inside a transaction a failed write has already aborted it server-side, so
 * the error is rethrown and the whole approval fails instead.
 */
export const cascadeBranchStatus = async (
  models: EntityModels,
  entity: EntityRecord,
  status: BranchStatus,
  session?: ClientSession,
) => {
  for (const branch of entity.branches) {
    try {
      await models.entity.updateOne(
        { _id: entity._id, 'branches._id': branch._id },
        { $set: { 'branches.$.status': status, 'branches.$.updatedAt': new Date() } },
        { session },
      );
    } catch (err) {
      if (session) {
        logger.error('Branch status update failed inside transaction', {
          entityId: String(entity._id),
          branchId: String(branch._id),
          status,
          error: err instanceof Error ? err.message : err,
        });
        throw err;
      }
      logger.warn('Positional branch update failed; saving whole entity', {
        entityId: String(entity._id),
        branchId: String(branch._id),
        error: err instanceof Error ? err.message : err,
      });
      try {
        const doc = await models.entity.findById(entity._id).session(session ?? null);
        const target = doc?.branches.find((b) => b._id.equals(branch._id));
        if (doc && target) {
          target.status = status;
          target.updatedAt = new Date();
          doc.markModified('branches');
          await doc.save({ session });
        }
      } catch (fallbackErr) {
        logger.error('Branch status update failed', {
          entityId: String(entity._id),
          branchId: String(branch._id),
          status,
          error: fallbackErr instanceof Error ? fallbackErr.message : fallbackErr,
        });
      }
    }
  }
};

const activateLinkedUser = async (models: EntityModels, entityId: Types.ObjectId, session?: ClientSession) => {
  try {
    await UserModel.updateOne({ [models.userLink]: entityId }, { $set: { status: 'active' } }, { session });
  } catch (err) {
    logger.warn('Failed to activate linked user', {
      entityId: String(entityId),
      error: err instanceof Error ? err.message : err,
    });
  }
};

/**
 * Approves or rejects a pending subscription request. Every precondition is
 * checked before the first write; the writes run in one transaction when
 * MONGO_USE_TRANSACTIONS is on. Notifications go out afterwards.
 */
export const processSubscriptionRequest = async (input: ProcessSubscriptionInput): Promise<ProcessResult> => {
  const { kind, decision, actor } = input;
  const adminNote = input.note ?? '';

  if (!actor.hasCapability('subscription_approval')) {
    throw createError(403, 'Access denied: insufficient permissions');
  }

  const requestId = parseObjectId(input.requestId, 'request ID');
  const models = getEntityModels(kind);

  const request = await models.request.findById(requestId).maxTimeMS(queryTimeout()).lean();
  if (!request) throw createError(404, 'Subscription request not found');
  if (request.status !== 'pending') {
    throw createError(409, `Subscription request is already ${request.status}`);
  }

  const entity = await models.entity.findById(request.entityId).maxTimeMS(queryTimeout()).lean();
  if (!entity) throw createError(404, `${models.label} not found`);

  const plan = await SubscriptionPlanModel.findById(request.planId).maxTimeMS(queryTimeout()).lean();
  if (!plan) throw createError(404, 'Subscription plan not found');

  const duration = plan.duration;
  if (decision === 'approved' && !isPlanDuration(duration)) {
    logger.error('Plan has an unsupported duration', { planId: String(plan._id), duration });
    throw createError(500, 'Invalid plan duration', { expose: true });
  }

  const processedAt = new Date();

  const outcome = await withTransaction(async (session) => {
    const removed = await models.request.deleteOne({ _id: requestId, status: 'pending' }, { session });
    if (removed.deletedCount === 0) {
      throw createError(409, 'Subscription request was processed concurrently');
    }

    if (decision === 'rejected') {
      await cascadeBranchStatus(models, entity, 'inactive', session);
      return { subscription: null, commission: null };
    }

    const [created] = await models.subscription.create(
      [
        {
          entityId: entity._id,
          planId: plan._id,
          startDate: processedAt,
          endDate: addMonths(processedAt, duration),
          status: 'active',
          autoRenew: false,
        },
      ],
      { session },
    );
    const subscription = created.toObject();

    await models.entity.updateOne({ _id: entity._id }, { $set: { status: 'active' } }, { session });
    await cascadeBranchStatus(models, entity, 'active', session);
    await activateLinkedUser(models, entity._id, session);

    const commission = await recordSubscriptionCommission({
      entityType: kind,
      entity,
      plan,
      subscriptionId: subscription._id,
      session,
    });

    return { subscription, commission };
  });

  subscriptionRequestsProcessed.inc({ kind, decision });
  logger.info('Subscription request processed', {
    kind,
    requestId: String(requestId),
    entityId: String(entity._id),
    decision,
    processedBy: actor.userId,
  });

  const message = outcome.subscription
    ? `Your subscription to "${plan.title}" is active until ${format(outcome.subscription.endDate, 'yyyy-MM-dd')}.`
    : `Your subscription request for "${plan.title}" was rejected.${adminNote ? ` Note: ${adminNote}` : ''}`;

  await notifyEntity({
    kind,
    entityId: String(entity._id),
    email: entity.email,
    subject: outcome.subscription ? 'Subscription Approved' : 'Subscription Request Rejected',
    message,
  });

  return {
    requestId: String(requestId),
    entityName: entity.businessName,
    planName: plan.title,
    status: decision,
    processedAt,
    adminNote,
    subscription: outcome.subscription,
    commission: outcome.commission,
  };
};

const findOwnedEntity = async (models: EntityModels, ownerUserId: string) => {
  const entity = await models.entity
    .findOne({ userId: parseObjectId(ownerUserId, 'user ID') })
    .maxTimeMS(queryTimeout())
    .lean();
  if (!entity) throw createError(404, `${models.label} not found`);
  return entity;
};

export const createSubscriptionRequest = async (kind: EntityKind, ownerUserId: string, planId: string) => {
  const models = getEntityModels(kind);
  const entity = await findOwnedEntity(models, ownerUserId);

  const plan = await SubscriptionPlanModel.findById(parseObjectId(planId, 'plan ID')).maxTimeMS(queryTimeout()).lean();
  if (!plan) throw createError(404, 'Subscription plan not found');
  if (!plan.isActive || plan.type !== kind) {
    throw createError(400, 'This plan is not available for your account type');
  }

  const pending = await models.request.exists({ entityId: entity._id, status: 'pending' });
  if (pending) throw createError(409, 'A subscription request is already pending');

  const request = await models.request.create({
    entityId: entity._id,
    planId: plan._id,
    status: 'pending',
    requestedAt: new Date(),
  });

  logger.info('Subscription request created', { kind, entityId: String(entity._id), planId: String(plan._id) });
  return request.toObject();
};

export const listPendingRequests = async (kind: EntityKind) => {
  const models = getEntityModels(kind);
  const requests = await models.request
    .find({ status: 'pending' })
    .sort({ requestedAt: -1 })
    .maxTimeMS(queryTimeout())
    .lean();

  const entityIds = requests.map((r) => r.entityId);
  const planIds = requests.map((r) => r.planId);

  const [entities, plans] = await Promise.all([
    models.entity
      .find({ _id: { $in: entityIds } })
      .select('businessName email phone status')
      .maxTimeMS(queryTimeout())
      .lean(),
    SubscriptionPlanModel.find({ _id: { $in: planIds } })
      .select('title price duration type')
      .maxTimeMS(queryTimeout())
      .lean(),
  ]);

  const entityById = new Map(entities.map((e) => [String(e._id), e]));
  const planById = new Map(plans.map((p) => [String(p._id), p]));

  return requests.flatMap((request) => {
    const entity = entityById.get(String(request.entityId));
    const plan = planById.get(String(request.planId));
    if (!entity || !plan) {
      logger.warn('Skipping pending request with missing entity or plan', {
        kind,
        requestId: String(request._id),
        entityFound: Boolean(entity),
        planFound: Boolean(plan),
      });
      return [];
    }
    return [
      {
        _id: request._id,
        status: request.status,
        requestedAt: request.requestedAt,
        entity: {
          _id: entity._id,
          businessName: entity.businessName,
          email: entity.email,
          phone: entity.phone,
          status: entity.status,
        },
        plan: { _id: plan._id, title: plan.title, price: plan.price, duration: plan.duration, type: plan.type },
      },
    ];
  });
};

export const getCurrentSubscription = async (kind: EntityKind, ownerUserId: string) => {
  const models = getEntityModels(kind);
  const entity = await findOwnedEntity(models, ownerUserId);
  const now = new Date();

  const subscription = await models.subscription
    .findOne({ entityId: entity._id, status: 'active', endDate: { $gt: now } })
    .sort({ endDate: -1 })
    .maxTimeMS(queryTimeout())
    .lean();
  if (!subscription) throw createError(404, 'No active subscription');

  const plan = await SubscriptionPlanModel.findById(subscription.planId).maxTimeMS(queryTimeout()).lean();

  return {
    subscription,
    plan,
    remainingDays: Math.max(0, differenceInDays(subscription.endDate, now)),
  };
};

export const cancelSubscription = async (kind: EntityKind, ownerUserId: string) => {
  const models = getEntityModels(kind);
  const entity = await findOwnedEntity(models, ownerUserId);

  const cancelled = await models.subscription
    .findOneAndUpdate(
      { entityId: entity._id, status: 'active' },
      { $set: { status: 'cancelled', cancelledAt: new Date(), autoRenew: false } },
      { new: true },
    )
    .lean();
  if (!cancelled) throw createError(404, 'No active subscription');

  logger.info('Subscription cancelled', { kind, entityId: String(entity._id), subscriptionId: String(cancelled._id) });
  return cancelled;
};
