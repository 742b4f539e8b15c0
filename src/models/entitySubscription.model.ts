import mongoose, { Schema, Types } from 'mongoose';

export type SubscriptionStatus = 'active' | 'expired' | 'cancelled';

export interface IEntitySubscription {
  entityId: Types.ObjectId;
  planId: Types.ObjectId;
  startDate: Date;
  endDate: Date;
  status: SubscriptionStatus;
  autoRenew: boolean;
  cancelledAt?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const buildSchema = () => {
  const schema = new Schema<IEntitySubscription>(
    {
      entityId: { type: Schema.Types.ObjectId, required: true, index: true },
      planId: { type: Schema.Types.ObjectId, ref: 'SubscriptionPlan', required: true },
      startDate: { type: Date, required: true },
      endDate: { type: Date, required: true },
      status: { type: String, enum: ['active', 'expired', 'cancelled'], default: 'active' },
      autoRenew: { type: Boolean, default: false },
      cancelledAt: { type: Date, default: null },
    },
    { timestamps: true },
  );
  schema.index({ entityId: 1, status: 1 });
  return schema;
};

export const CompanySubscription = mongoose.model<IEntitySubscription>(
  'CompanySubscription',
  buildSchema(),
  'company_subscriptions',
);

export const WholesalerSubscription = mongoose.model<IEntitySubscription>(
  'WholesalerSubscription',
  buildSchema(),
  'wholesaler_subscriptions',
);

export const ServiceProviderSubscription = mongoose.model<IEntitySubscription>(
  'ServiceProviderSubscription',
  buildSchema(),
  'service_provider_subscriptions',
);
