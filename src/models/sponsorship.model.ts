import mongoose, { Schema, Types } from 'mongoose';

/** Sponsorship package sold to businesses; `duration` is in days. */
export interface ISponsorship {
  title: string;
  description?: string;
  price: number;
  duration: number;
  /** Percent taken off `price` when a request is approved. */
  discount: number;
  usedCount: number;
  startDate?: Date | null;
  endDate?: Date | null;
  isActive: boolean;
  createdBy?: Types.ObjectId | null;
  createdAt: Date;
  updatedAt: Date;
}

const schema = new Schema<ISponsorship>(
  {
    title: { type: String, required: true, trim: true },
    description: String,
    price: { type: Number, required: true, min: 0 },
    duration: { type: Number, required: true, min: 1, max: 365 },
    discount: { type: Number, default: 0, min: 0, max: 100 },
    usedCount: { type: Number, default: 0 },
    startDate: { type: Date, default: null },
    endDate: { type: Date, default: null },
    isActive: { type: Boolean, default: true },
    createdBy: { type: Schema.Types.ObjectId, default: null },
  },
  { timestamps: true },
);

schema.index({ isActive: 1, endDate: 1 });

export const SPONSORSHIPS_COLLECTION = 'sponsorships';

export default mongoose.model<ISponsorship>('Sponsorship', schema, SPONSORSHIPS_COLLECTION);
