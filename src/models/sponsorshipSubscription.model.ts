import mongoose, { Schema, Types } from 'mongoose';
import { SubscriptionStatus } from './entitySubscription.model';
import { ENTITY_KINDS, EntityKind } from './businessEntity';

export interface ISponsorshipSubscription {
  sponsorshipId: Types.ObjectId;
  entityId: Types.ObjectId;
  entityType: EntityKind;
  /** Sponsored branch for companies and wholesalers; null when the entity itself is sponsored. */
  branchId: Types.ObjectId | null;
  status: SubscriptionStatus;
  startDate: Date;
  endDate: Date;
  discountApplied: number;
  amountPaid: number;
  createdAt: Date;
  updatedAt: Date;
}

const schema = new Schema<ISponsorshipSubscription>(
  {
    sponsorshipId: { type: Schema.Types.ObjectId, ref: 'Sponsorship', required: true },
    entityId: { type: Schema.Types.ObjectId, required: true },
    entityType: { type: String, enum: ENTITY_KINDS, required: true },
    branchId: { type: Schema.Types.ObjectId, default: null },
    status: { type: String, enum: ['active', 'expired', 'cancelled'], default: 'active' },
    startDate: { type: Date, required: true },
    endDate: { type: Date, required: true },
    discountApplied: { type: Number, default: 0 },
    amountPaid: { type: Number, default: 0 },
  },
  { timestamps: true },
);

schema.index({ status: 1 });
schema.index({ entityId: 1, branchId: 1, status: 1 });

export default mongoose.model<ISponsorshipSubscription>(
  'SponsorshipSubscription',
  schema,
  'sponsorship_subscriptions',
);
