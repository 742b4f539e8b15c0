import { Router } from 'express';
import { authenticate } from '../middleware/authMiddleware';
import { requireCapability } from '../middleware/authRole';
import { asyncHandler } from '../middleware/asyncHandler';
import { branchMediaUpload } from '../middleware/upload';
import { branchStatusSchema, validate } from '../middleware/validate';
import { createBranch, getMyBranches, updateBranchStatus } from '../controller/branch.controller';

export const branchRouter = Router();

branchRouter.use(authenticate);

branchRouter.post(
  '/',
  requireCapability('entity_self_service'),
  branchMediaUpload,
  asyncHandler(createBranch),
);
branchRouter.get('/', requireCapability('entity_self_service'), asyncHandler(getMyBranches));

branchRouter.put(
  '/:kind/:entityId/:branchId/status',
  requireCapability('business_management'),
  validate(branchStatusSchema),
  asyncHandler(updateBranchStatus),
);
