import { Types } from 'mongoose';
import createError from 'http-errors';
import { EntityKind, isEntityKind } from '../models/businessEntity';

const OBJECT_ID = /^[a-f\d]{24}$/i;

/** Parses a 24-hex id from a request or throws a 400 naming `label`. */
export const parseObjectId = (value: unknown, label = 'id') => {
  if (typeof value !== 'string' || !OBJECT_ID.test(value)) {
    throw createError(400, `Invalid ${label}`);
  }
  return new Types.ObjectId(value);
};

export const parseEntityKind = (value: unknown): EntityKind => {
  if (!isEntityKind(value)) {
    throw createError(400, 'Invalid entity type. Must be company, wholesaler or serviceProvider');
  }
  return value;
};
