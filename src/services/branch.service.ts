import createError from 'http-errors';
import { BranchStatus, EntityKind } from '../models/businessEntity';
import { getEntityModels } from '../models/registry';
import { parseObjectId } from '../utils/params';
import { queryTimeout } from '../utils/db';
import { logger } from '../utils/logger';

export interface BranchFields {
  name: string;
  phone?: string;
  category?: string;
  description?: string;
}

export interface BranchMedia {
  images: string[];
  videos: string[];
}

/** New branches start `pending` until an approval activates them. */
export const addBranch = async (kind: EntityKind, ownerUserId: string, fields: BranchFields, media: BranchMedia) => {
  const models = getEntityModels(kind);
  const owner = parseObjectId(ownerUserId, 'user ID');

  const updated = await models.entity
    .findOneAndUpdate(
      { userId: owner },
      { $push: { branches: { ...fields, images: media.images, videos: media.videos, status: 'pending' } } },
      { new: true },
    )
    .lean();
  if (!updated) throw createError(404, `${models.label} not found`);

  const branch = updated.branches[updated.branches.length - 1];
  logger.info('Branch added', { kind, entityId: String(updated._id), branchId: String(branch._id) });
  return branch;
};

export const listBranches = async (kind: EntityKind, ownerUserId: string) => {
  const models = getEntityModels(kind);
  const entity = await models.entity
    .findOne({ userId: parseObjectId(ownerUserId, 'user ID') })
    .select('branches')
    .maxTimeMS(queryTimeout())
    .lean();
  if (!entity) throw createError(404, `${models.label} not found`);
  return entity.branches;
};

export const setBranchStatus = async (kind: EntityKind, entityId: string, branchId: string, status: BranchStatus) => {
  const models = getEntityModels(kind);
  const entity = parseObjectId(entityId, 'entity ID');
  const branch = parseObjectId(branchId, 'branch ID');

  const result = await models.entity.updateOne(
    { _id: entity, 'branches._id': branch },
    { $set: { 'branches.$.status': status, 'branches.$.updatedAt': new Date() } },
  );
  if (result.matchedCount === 0) throw createError(404, 'Branch not found');

  logger.info('Branch status updated', { kind, entityId, branchId, status });
  return { entityId, branchId, status };
};
