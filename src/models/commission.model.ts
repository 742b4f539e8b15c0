import mongoose, { Schema, Types } from 'mongoose';
import { ENTITY_KINDS, EntityKind } from './businessEntity';

/**
 * One ledger line per approved subscription sold by a salesperson.
 * Amounts are always `planPrice * percent / 100`; only `paid`/`paidAt` change after insert.
 */
export interface ICommission {
  subscriptionId: Types.ObjectId;
  entityId: Types.ObjectId;
  entityType: EntityKind;
  planId: Types.ObjectId;
  planPrice: number;
  salespersonId: Types.ObjectId;
  salespersonCommissionPercent: number;
  salespersonCommission: number;
  salesManagerId: Types.ObjectId;
  salesManagerCommissionPercent: number;
  salesManagerCommission: number;
  paid: boolean;
  paidAt: Date | null;
  createdAt: Date;
}

const schema = new Schema<ICommission>(
  {
    subscriptionId: { type: Schema.Types.ObjectId, required: true, unique: true },
    entityId: { type: Schema.Types.ObjectId, required: true },
    entityType: { type: String, enum: ENTITY_KINDS, required: true },
    planId: { type: Schema.Types.ObjectId, ref: 'SubscriptionPlan', required: true },
    planPrice: { type: Number, required: true },
    salespersonId: { type: Schema.Types.ObjectId, ref: 'Salesperson', required: true, index: true },
    salespersonCommissionPercent: { type: Number, required: true },
    salespersonCommission: { type: Number, required: true },
    salesManagerId: { type: Schema.Types.ObjectId, ref: 'SalesManager', required: true, index: true },
    salesManagerCommissionPercent: { type: Number, required: true },
    salesManagerCommission: { type: Number, required: true },
    paid: { type: Boolean, default: false },
    paidAt: { type: Date, default: null },
  },
  { timestamps: { createdAt: true, updatedAt: false } },
);

schema.index({ paid: 1, createdAt: -1 });

export default mongoose.model<ICommission>('Commission', schema, 'commissions');
