import { Router } from 'express';
import { authenticate } from '../middleware/authMiddleware';
import { requireCapability, requireUserType } from '../middleware/authRole';
import { asyncHandler } from '../middleware/asyncHandler';
import {
  createSponsorshipSchema,
  processSubscriptionRequestSchema,
  requestSponsorshipSchema,
  updateSponsorshipSchema,
  validate,
} from '../middleware/validate';
import {
  activateSponsorship,
  addSponsorship,
  deactivateSponsorship,
  editSponsorship,
  getAvailableSponsorships,
  getMySponsorships,
  getSponsorshipRequests,
  getSponsorships,
  processRequest,
  submitSponsorshipRequest,
} from '../controller/sponsorship.controller';

export const sponsorshipRouter = Router();

sponsorshipRouter.use(authenticate);

// entity self-service
const selfService = requireCapability('entity_self_service');
sponsorshipRouter.get('/available', selfService, asyncHandler(getAvailableSponsorships));
sponsorshipRouter.get('/mine', selfService, asyncHandler(getMySponsorships));
sponsorshipRouter.post(
  '/request',
  selfService,
  validate(requestSponsorshipSchema),
  asyncHandler(submitSponsorshipRequest),
);

// approval
const approvers = requireCapability('subscription_approval');
sponsorshipRouter.get('/requests', approvers, asyncHandler(getSponsorshipRequests));
sponsorshipRouter.put(
  '/requests/:requestId',
  approvers,
  validate(processSubscriptionRequestSchema),
  asyncHandler(processRequest),
);

// catalogue
const admins = requireUserType(['admin', 'super_admin']);
sponsorshipRouter.post('/', admins, validate(createSponsorshipSchema), asyncHandler(addSponsorship));
sponsorshipRouter.get('/', admins, asyncHandler(getSponsorships));
sponsorshipRouter.put('/:id', admins, validate(updateSponsorshipSchema), asyncHandler(editSponsorship));
sponsorshipRouter.put('/:id/activate', admins, asyncHandler(activateSponsorship));
sponsorshipRouter.put('/:id/deactivate', admins, asyncHandler(deactivateSponsorship));
