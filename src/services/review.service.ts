import { Types } from 'mongoose';
import createError from 'http-errors';
import ReviewModel, { ReviewMediaType } from '../models/review.model';
import ServiceProviderModel from '../models/serviceProvider.model';
import UserModel from '../models/user';
import { EntityPrincipal } from './access.service';
import { parseObjectId } from '../utils/params';
import { queryTimeout } from '../utils/db';
import { logger } from '../utils/logger';

export interface ReviewInput {
  serviceProviderId: string;
  rating: number;
  comment?: string;
}

export interface ReviewMedia {
  type: ReviewMediaType;
  url: string;
}

interface RatingRow {
  average: number;
  count: number;
}

/**
 * Recomputes the provider's average rating and review count. A failure is
 * logged; the reviews themselves stay as written.
 */
export const refreshProviderRating = async (serviceProviderId: Types.ObjectId) => {
  try {
    const [row] = await ReviewModel.aggregate<RatingRow>([
      { $match: { serviceProviderId } },
      { $group: { _id: null, average: { $avg: '$rating' }, count: { $sum: 1 } } },
    ]).option({ maxTimeMS: queryTimeout() });

    const rating = row ? Math.round(row.average * 10) / 10 : 0;
    const reviewCount = row ? row.count : 0;
    await ServiceProviderModel.updateOne({ _id: serviceProviderId }, { $set: { rating, reviewCount } });
    return { rating, reviewCount };
  } catch (err) {
    logger.warn('Provider rating refresh failed', {
      serviceProviderId: String(serviceProviderId),
      error: err instanceof Error ? err.message : err,
    });
    return null;
  }
};

export const createReview = async (authorId: string, input: ReviewInput, media?: ReviewMedia) => {
  const userId = parseObjectId(authorId, 'user ID');
  const serviceProviderId = parseObjectId(input.serviceProviderId, 'service provider ID');

  const provider = await ServiceProviderModel.exists({ _id: serviceProviderId });
  if (!provider) throw createError(404, 'Service provider not found');

  const author = await UserModel.findById(userId).select('fullName email').maxTimeMS(queryTimeout()).lean();
  if (!author) throw createError(404, 'User not found');

  const review = await ReviewModel.create({
    serviceProviderId,
    userId,
    username: author.fullName || author.email,
    rating: input.rating,
    comment: input.comment,
    mediaType: media?.type,
    mediaUrl: media?.url,
    isVerified: false,
  });

  logger.info('Review created', { reviewId: String(review._id), serviceProviderId: String(serviceProviderId) });
  await refreshProviderRating(serviceProviderId);
  return review.toObject();
};

export const listProviderReviews = async (providerId: string, page: number, limit: number) => {
  const serviceProviderId = parseObjectId(providerId, 'service provider ID');

  const [items, total] = await Promise.all([
    ReviewModel.find({ serviceProviderId })
      .sort({ createdAt: -1 })
      .skip((page - 1) * limit)
      .limit(limit)
      .maxTimeMS(queryTimeout())
      .lean(),
    ReviewModel.countDocuments({ serviceProviderId }).maxTimeMS(queryTimeout()),
  ]);

  return { items, meta: { page, limit, total, totalPages: Math.ceil(total / limit) } };
};

/** One reply per review, written by the account that owns the reviewed provider. */
export const replyToReview = async (owner: EntityPrincipal, id: string, replyText: string) => {
  if (owner.entityKind !== 'serviceProvider') {
    throw createError(403, 'Only service providers can reply to reviews');
  }

  const reviewId = parseObjectId(id, 'review ID');
  const review = await ReviewModel.findById(reviewId).select('serviceProviderId reply').maxTimeMS(queryTimeout()).lean();
  if (!review) throw createError(404, 'Review not found');

  const provider = await ServiceProviderModel.findById(review.serviceProviderId)
    .select('userId')
    .maxTimeMS(queryTimeout())
    .lean();
  if (!provider) throw createError(404, 'Service provider not found');
  if (!owner.owns(provider.userId)) {
    throw createError(403, 'You can only reply to reviews of your own business');
  }

  if (review.reply) throw createError(409, 'This review already has a reply');

  const updated = await ReviewModel.findOneAndUpdate(
    { _id: reviewId, reply: { $exists: false } },
    { $set: { reply: { replyText, createdAt: new Date() } } },
    { new: true },
  ).lean();
  if (!updated) throw createError(409, 'This review already has a reply');

  return updated;
};

// ---------- moderation ----------

export interface ReviewQuery {
  page: number;
  limit: number;
  serviceProviderId?: string;
  hasReply?: boolean;
  isVerified?: boolean;
  rating?: number;
}

export const listReviews = async ({ page, limit, serviceProviderId, hasReply, isVerified, rating }: ReviewQuery) => {
  const filter: {
    serviceProviderId?: Types.ObjectId;
    reply?: { $exists: boolean };
    isVerified?: boolean;
    rating?: number;
  } = {};
  if (serviceProviderId) filter.serviceProviderId = parseObjectId(serviceProviderId, 'service provider ID');
  if (hasReply !== undefined) filter.reply = { $exists: hasReply };
  if (isVerified !== undefined) filter.isVerified = isVerified;
  if (rating !== undefined) filter.rating = rating;

  const [items, total] = await Promise.all([
    ReviewModel.find(filter)
      .sort({ createdAt: -1 })
      .skip((page - 1) * limit)
      .limit(limit)
      .maxTimeMS(queryTimeout())
      .lean(),
    ReviewModel.countDocuments(filter).maxTimeMS(queryTimeout()),
  ]);

  return { items, meta: { page, limit, total, totalPages: Math.ceil(total / limit) } };
};

export const setReviewVerified = async (id: string, isVerified: boolean) => {
  const review = await ReviewModel.findByIdAndUpdate(
    parseObjectId(id, 'review ID'),
    { $set: { isVerified } },
    { new: true },
  ).lean();
  if (!review) throw createError(404, 'Review not found');
  return review;
};

export const deleteReview = async (id: string) => {
  const reviewId = parseObjectId(id, 'review ID');
  const review = await ReviewModel.findById(reviewId).select('serviceProviderId').lean();
  if (!review) throw createError(404, 'Review not found');

  await ReviewModel.deleteOne({ _id: reviewId });
  logger.info('Review deleted', { reviewId: id, serviceProviderId: String(review.serviceProviderId) });
  await refreshProviderRating(review.serviceProviderId);
};
