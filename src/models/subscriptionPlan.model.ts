import mongoose, { Schema } from 'mongoose';
import { ENTITY_KINDS, EntityKind } from './businessEntity';

/** Plan lengths in months. Any other stored value is a configuration error. */
export const PLAN_DURATIONS = [1, 6, 12] as const;
export type PlanDuration = (typeof PLAN_DURATIONS)[number];

export interface ISubscriptionPlan {
  title: string;
  price: number;
  duration: number;
  type: EntityKind;
  benefits?: unknown;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const schema = new Schema<ISubscriptionPlan>(
  {
    title: { type: String, required: true, trim: true },
    price: { type: Number, required: true, min: 0 },
    duration: { type: Number, required: true },
    type: { type: String, enum: ENTITY_KINDS, required: true },
    benefits: { type: Schema.Types.Mixed },
    isActive: { type: Boolean, default: true },
  },
  { timestamps: true },
);

schema.index({ type: 1, isActive: 1 });

export const isPlanDuration = (value: number): value is PlanDuration =>
  (PLAN_DURATIONS as readonly number[]).includes(value);

export const SUBSCRIPTION_PLANS_COLLECTION = 'subscription_plans';

export default mongoose.model<ISubscriptionPlan>('SubscriptionPlan', schema, SUBSCRIPTION_PLANS_COLLECTION);
