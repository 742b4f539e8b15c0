import { Request, Response } from 'express';
import { currentClaims, currentEntityOwner, currentPrincipal } from '../middleware/authRole';
import {
  parseQuery,
  sponsorshipListQuerySchema,
  sponsorshipRequestQuerySchema,
} from '../middleware/validate';
import {
  createSponsorship,
  listAvailableSponsorships,
  listMySponsorships,
  listSponsorshipRequests,
  listSponsorships,
  processSponsorshipRequest,
  requestSponsorship,
  setSponsorshipActive,
  updateSponsorship,
} from '../services/sponsorship.service';

// ---------- entity self-service ----------

export const getAvailableSponsorships = async (_req: Request, res: Response) => {
  const data = await listAvailableSponsorships();
  res.json({ status: 200, message: 'Available sponsorships', data });
};

export const submitSponsorshipRequest = async (req: Request, res: Response) => {
  const data = await requestSponsorship(currentEntityOwner(req), req.body.sponsorshipId, req.body.branchId);
  res.status(201).json({ status: 201, message: 'Sponsorship request submitted', data });
};

export const getMySponsorships = async (req: Request, res: Response) => {
  const data = await listMySponsorships(currentEntityOwner(req));
  res.json({ status: 200, message: 'Active sponsorships', data });
};

// ---------- approval ----------

export const getSponsorshipRequests = async (req: Request, res: Response) => {
  const { items, meta } = await listSponsorshipRequests(parseQuery(sponsorshipRequestQuerySchema, req.query));
  res.json({ status: 200, message: 'Sponsorship requests', data: items, meta });
};

export const processRequest = async (req: Request, res: Response) => {
  const { status, adminNote } = req.body;
  const data = await processSponsorshipRequest({
    requestId: req.params.requestId,
    decision: status,
    note: adminNote,
    actor: currentPrincipal(req),
  });
  res.json({ status: 200, message: `Sponsorship request ${data.status} successfully`, data });
};

// ---------- admin catalogue ----------

export const addSponsorship = async (req: Request, res: Response) => {
  const data = await createSponsorship(req.body, currentClaims(req).userId);
  res.status(201).json({ status: 201, message: 'Sponsorship created', data });
};

export const getSponsorships = async (req: Request, res: Response) => {
  const { items, meta } = await listSponsorships(parseQuery(sponsorshipListQuerySchema, req.query));
  res.json({ status: 200, message: 'Sponsorships', data: items, meta });
};

export const editSponsorship = async (req: Request, res: Response) => {
  const data = await updateSponsorship(req.params.id, req.body);
  res.json({ status: 200, message: 'Sponsorship updated', data });
};

const setActive = (isActive: boolean) => async (req: Request, res: Response) => {
  await setSponsorshipActive(req.params.id, isActive);
  res.json({ status: 200, message: isActive ? 'Sponsorship activated' : 'Sponsorship deactivated' });
};

export const activateSponsorship = setActive(true);
export const deactivateSponsorship = setActive(false);
