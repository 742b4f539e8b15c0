import { Router } from 'express';
import { authenticate } from '../middleware/authMiddleware';
import { requireCapability, requireUserType } from '../middleware/authRole';
import { asyncHandler } from '../middleware/asyncHandler';
import {
  createManagerSchema,
  createSalesManagerSchema,
  createSalespersonSchema,
  validate,
} from '../middleware/validate';
import {
  addManager,
  addSalesManager,
  addSalesperson,
  getManagers,
  getSalesManagers,
  getSalespersons,
} from '../controller/staff.controller';

export const staffRouter = Router();

staffRouter.use(authenticate, requireCapability('user_management'));

staffRouter.post(
  '/managers',
  requireUserType(['admin', 'super_admin']),
  validate(createManagerSchema),
  asyncHandler(addManager),
);
staffRouter.get('/managers', asyncHandler(getManagers));

staffRouter.post('/salesManagers', validate(createSalesManagerSchema), asyncHandler(addSalesManager));
staffRouter.get('/salesManagers', asyncHandler(getSalesManagers));

staffRouter.post('/salespersons', validate(createSalespersonSchema), asyncHandler(addSalesperson));
staffRouter.get('/salespersons', asyncHandler(getSalespersons));
