import { Request, Response } from 'express';
import { currentEntityOwner } from '../middleware/authRole';
import { discardUploads, toStoredPath } from '../middleware/upload';
import { createBranchSchema, parseQuery } from '../middleware/validate';
import { addBranch, listBranches, setBranchStatus } from '../services/branch.service';
import { parseEntityKind } from '../utils/params';

type UploadedFields = Record<string, Express.Multer.File[]>;

const uploadedFiles = (req: Request): UploadedFields => {
  const files = req.files;
  return files && !Array.isArray(files) ? files : {};
};

/** Multer has already written the media when this runs; any failure, validation included, removes it. */
export const createBranch = async (req: Request, res: Response) => {
  const owner = currentEntityOwner(req);
  const files = uploadedFiles(req);

  try {
    const body = parseQuery(createBranchSchema, req.body);
    const branch = await addBranch(owner.entityKind, owner.userId, body, {
      images: (files.images ?? []).map(toStoredPath),
      videos: (files.videos ?? []).map(toStoredPath),
    });
    res.status(201).json({ status: 201, message: 'Branch added', data: branch });
  } catch (err) {
    await discardUploads(Object.values(files).flat());
    throw err;
  }
};

export const getMyBranches = async (req: Request, res: Response) => {
  const owner = currentEntityOwner(req);
  const data = await listBranches(owner.entityKind, owner.userId);
  res.json({ status: 200, message: 'Branches', data });
};

export const updateBranchStatus = async (req: Request, res: Response) => {
  const { kind, entityId, branchId } = req.params;
  const data = await setBranchStatus(parseEntityKind(kind), entityId, branchId, req.body.status);
  res.json({ status: 200, message: 'Branch status updated', data });
};
