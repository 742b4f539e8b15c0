import mongoose, { Schema, Types } from 'mongoose';

export type SubscriptionRequestStatus = 'pending' | 'approved' | 'rejected';

export interface ISubscriptionRequest {
  entityId: Types.ObjectId;
  planId: Types.ObjectId;
  status: SubscriptionRequestStatus;
  requestedAt: Date;
  adminNote?: string;
  processedAt?: Date | null;
}

const buildSchema = () => {
  const schema = new Schema<ISubscriptionRequest>({
    entityId: { type: Schema.Types.ObjectId, required: true, index: true },
    planId: { type: Schema.Types.ObjectId, ref: 'SubscriptionPlan', required: true },
    status: { type: String, enum: ['pending', 'approved', 'rejected'], default: 'pending' },
    requestedAt: { type: Date, default: Date.now },
    adminNote: String,
    processedAt: { type: Date, default: null },
  });
  schema.index({ status: 1, requestedAt: -1 });
  return schema;
};

export const CompanySubscriptionRequest = mongoose.model<ISubscriptionRequest>(
  'CompanySubscriptionRequest',
  buildSchema(),
  'company_subscription_requests',
);

export const WholesalerSubscriptionRequest = mongoose.model<ISubscriptionRequest>(
  'WholesalerSubscriptionRequest',
  buildSchema(),
  'wholesaler_subscription_requests',
);

export const ServiceProviderSubscriptionRequest = mongoose.model<ISubscriptionRequest>(
  'ServiceProviderSubscriptionRequest',
  buildSchema(),
  'service_provider_subscription_requests',
);
