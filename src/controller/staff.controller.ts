import { Request, Response } from 'express';
import { currentPrincipal } from '../middleware/authRole';
import { paginationQuerySchema, parseQuery } from '../middleware/validate';
import {
  createManager,
  createSalesManager,
  createSalesperson,
  listManagers,
  listSalesManagers,
  listSalespersons,
} from '../services/staff.service';

export const addManager = async (req: Request, res: Response) => {
  const data = await createManager(req.body);
  res.status(201).json({ status: 201, message: 'Manager created', data });
};

export const addSalesManager = async (req: Request, res: Response) => {
  const data = await createSalesManager(req.body, currentPrincipal(req));
  res.status(201).json({ status: 201, message: 'Sales manager created', data });
};

export const addSalesperson = async (req: Request, res: Response) => {
  const data = await createSalesperson(req.body, currentPrincipal(req));
  res.status(201).json({ status: 201, message: 'Salesperson created', data });
};

export const getManagers = async (req: Request, res: Response) => {
  const { items, meta } = await listManagers(parseQuery(paginationQuerySchema, req.query));
  res.json({ status: 200, message: 'Managers', data: items, meta });
};

export const getSalesManagers = async (req: Request, res: Response) => {
  const { items, meta } = await listSalesManagers(parseQuery(paginationQuerySchema, req.query));
  res.json({ status: 200, message: 'Sales managers', data: items, meta });
};

export const getSalespersons = async (req: Request, res: Response) => {
  const { items, meta } = await listSalespersons(parseQuery(paginationQuerySchema, req.query), currentPrincipal(req));
  res.json({ status: 200, message: 'Salespersons', data: items, meta });
};
