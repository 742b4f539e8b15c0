import mongoose, { Schema, Types } from 'mongoose';

export type ReviewMediaType = 'image' | 'video';

export interface IReviewReply {
  replyText: string;
  createdAt: Date;
}

export interface IReview {
  serviceProviderId: Types.ObjectId;
  userId: Types.ObjectId;
  username: string;
  rating: number;
  comment?: string;
  mediaType?: ReviewMediaType;
  mediaUrl?: string;
  isVerified: boolean;
  reply?: IReviewReply;
  createdAt: Date;
  updatedAt: Date;
}

const replySchema = new Schema<IReviewReply>(
  {
    replyText: { type: String, required: true, trim: true },
    createdAt: { type: Date, default: Date.now },
  },
  { _id: false },
);

const schema = new Schema<IReview>(
  {
    serviceProviderId: { type: Schema.Types.ObjectId, ref: 'ServiceProvider', required: true, index: true },
    userId: { type: Schema.Types.ObjectId, ref: 'User', required: true },
    username: { type: String, required: true },
    rating: { type: Number, required: true, min: 1, max: 5 },
    comment: { type: String, trim: true },
    mediaType: { type: String, enum: ['image', 'video'] },
    mediaUrl: String,
    isVerified: { type: Boolean, default: false },
    reply: { type: replySchema, default: undefined },
  },
  { timestamps: true },
);

schema.index({ serviceProviderId: 1, createdAt: -1 });

export default mongoose.model<IReview>('Review', schema, 'reviews');
