import { Request, Response } from 'express';
import { currentEntityOwner, currentPrincipal } from '../middleware/authRole';
import {
  cancelSubscription,
  createSubscriptionRequest,
  getCurrentSubscription,
  listPendingRequests,
  processSubscriptionRequest,
} from '../services/subscriptionApproval.service';
import { parseEntityKind } from '../utils/params';

// ---------- entity self-service ----------

export const requestSubscription = async (req: Request, res: Response) => {
  const owner = currentEntityOwner(req);
  const request = await createSubscriptionRequest(owner.entityKind, owner.userId, req.body.planId);
  res.status(201).json({ status: 201, message: 'Subscription request submitted', data: request });
};

export const getMySubscription = async (req: Request, res: Response) => {
  const owner = currentEntityOwner(req);
  const data = await getCurrentSubscription(owner.entityKind, owner.userId);
  res.json({ status: 200, message: 'Current subscription', data });
};

export const cancelMySubscription = async (req: Request, res: Response) => {
  const owner = currentEntityOwner(req);
  const data = await cancelSubscription(owner.entityKind, owner.userId);
  res.json({ status: 200, message: 'Subscription cancelled', data });
};

// ---------- admin ----------

export const listPending = async (req: Request, res: Response) => {
  const data = await listPendingRequests(parseEntityKind(req.params.kind));
  res.json({ status: 200, message: 'Pending subscription requests', data });
};

export const processRequest = async (req: Request, res: Response) => {
  const { status, adminNote } = req.body;
  const data = await processSubscriptionRequest({
    kind: parseEntityKind(req.params.kind),
    requestId: req.params.requestId,
    decision: status,
    note: adminNote,
    actor: currentPrincipal(req),
  });
  res.json({ status: 200, message: `Subscription request ${data.status} successfully`, data });
};
