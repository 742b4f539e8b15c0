import { Request, Response } from 'express';
import createError from 'http-errors';
import SubscriptionPlan from '../models/subscriptionPlan.model';
import { planListQuerySchema, parseQuery } from '../middleware/validate';
import { currentClaims } from '../middleware/authRole';
import { parseObjectId } from '../utils/params';
import { queryTimeout } from '../utils/db';
import { logger } from '../utils/logger';

export const createPlan = async (req: Request, res: Response) => {
  const plan = await SubscriptionPlan.create(req.body);
  logger.info('Subscription plan created', { planId: String(plan._id), type: plan.type });
  res.status(201).json({ status: 201, message: 'Plan created', data: plan });
};

export const listPlans = async (req: Request, res: Response) => {
  const { type, isActive } = parseQuery(planListQuerySchema, req.query);

  const filter: { type?: string; isActive?: boolean } = {};
  if (type) filter.type = type;
  if (isActive !== undefined) filter.isActive = isActive;

  const plans = await SubscriptionPlan.find(filter)
    .sort({ type: 1, price: 1 })
    .maxTimeMS(queryTimeout())
    .lean();

  res.json({ status: 200, message: 'Plans', data: plans });
};

/** Active plans matching the caller's entity kind. */
export const listAvailablePlans = async (req: Request, res: Response) => {
  const { userType } = currentClaims(req);
  const plans = await SubscriptionPlan.find({ type: userType, isActive: true })
    .sort({ price: 1 })
    .maxTimeMS(queryTimeout())
    .lean();

  res.json({ status: 200, message: 'Plans', data: plans });
};

export const getPlan = async (req: Request, res: Response) => {
  const plan = await SubscriptionPlan.findById(parseObjectId(req.params.id, 'plan ID'))
    .maxTimeMS(queryTimeout())
    .lean();

  if (!plan) {
    throw createError(404, 'Subscription plan not found');
  }

  res.json({ status: 200, message: 'Plan', data: plan });
};

export const updatePlan = async (req: Request, res: Response) => {
  const plan = await SubscriptionPlan.findByIdAndUpdate(parseObjectId(req.params.id, 'plan ID'), req.body, {
    new: true,
    runValidators: true,
  }).lean();

  if (!plan) {
    throw createError(404, 'Subscription plan not found');
  }

  res.json({ status: 200, message: 'Plan updated', data: plan });
};

const setPlanActive = (isActive: boolean) => async (req: Request, res: Response) => {
  const result = await SubscriptionPlan.updateOne(
    { _id: parseObjectId(req.params.id, 'plan ID') },
    { $set: { isActive } },
  );

  if (result.matchedCount === 0) {
    throw createError(404, 'Subscription plan not found');
  }

  res.json({ status: 200, message: isActive ? 'Plan activated' : 'Plan deactivated' });
};

export const activatePlan = setPlanActive(true);
export const deactivatePlan = setPlanActive(false);
