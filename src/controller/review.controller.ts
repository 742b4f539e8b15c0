import { Request, Response } from 'express';
import { currentClaims, currentEntityOwner } from '../middleware/authRole';
import { discardUploads, isVideo, toStoredPath } from '../middleware/upload';
import { createReviewSchema, paginationQuerySchema, parseQuery, reviewListQuerySchema } from '../middleware/validate';
import {
  createReview,
  deleteReview,
  listProviderReviews,
  listReviews,
  replyToReview,
  ReviewMedia,
  setReviewVerified,
} from '../services/review.service';

/** The optional `media` file is already on disk here; a failed review removes it. */
export const addReview = async (req: Request, res: Response) => {
  const { userId } = currentClaims(req);
  const file = req.file;

  try {
    const body = parseQuery(createReviewSchema, req.body);
    const media: ReviewMedia | undefined = file
      ? { type: isVideo(file) ? 'video' : 'image', url: toStoredPath(file) }
      : undefined;
    const data = await createReview(userId, body, media);
    res.status(201).json({ status: 201, message: 'Review added', data });
  } catch (err) {
    if (file) await discardUploads([file]);
    throw err;
  }
};

export const getProviderReviews = async (req: Request, res: Response) => {
  const { page, limit } = parseQuery(paginationQuerySchema, req.query);
  const { items, meta } = await listProviderReviews(req.params.serviceProviderId, page, limit);
  res.json({ status: 200, message: 'Reviews', data: items, meta });
};

export const replyReview = async (req: Request, res: Response) => {
  const data = await replyToReview(currentEntityOwner(req), req.params.id, req.body.replyText);
  res.json({ status: 200, message: 'Reply added', data });
};

// ---------- moderation ----------

export const getReviews = async (req: Request, res: Response) => {
  const { items, meta } = await listReviews(parseQuery(reviewListQuerySchema, req.query));
  res.json({ status: 200, message: 'Reviews', data: items, meta });
};

export const verifyReview = async (req: Request, res: Response) => {
  const data = await setReviewVerified(req.params.id, req.body.isVerified);
  res.json({ status: 200, message: data.isVerified ? 'Review verified' : 'Review unverified', data });
};

export const removeReview = async (req: Request, res: Response) => {
  await deleteReview(req.params.id);
  res.json({ status: 200, message: 'Review deleted' });
};
