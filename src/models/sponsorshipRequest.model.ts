import mongoose, { Schema, Types } from 'mongoose';
import { ENTITY_KINDS, EntityKind } from './businessEntity';

export type SponsorshipRequestStatus = 'pending' | 'approved' | 'rejected';

export interface ISponsorshipRequest {
  sponsorshipId: Types.ObjectId;
  entityType: EntityKind;
  entityId: Types.ObjectId;
  branchId: Types.ObjectId | null;
  status: SponsorshipRequestStatus;
  requestedAt: Date;
  processedAt?: Date | null;
  adminNote?: string;
  createdAt: Date;
  updatedAt: Date;
}

const schema = new Schema<ISponsorshipRequest>(
  {
    sponsorshipId: { type: Schema.Types.ObjectId, ref: 'Sponsorship', required: true },
    entityType: { type: String, enum: ENTITY_KINDS, required: true },
    entityId: { type: Schema.Types.ObjectId, required: true },
    branchId: { type: Schema.Types.ObjectId, default: null },
    status: { type: String, enum: ['pending', 'approved', 'rejected'], default: 'pending' },
    requestedAt: { type: Date, default: Date.now },
    processedAt: { type: Date, default: null },
    adminNote: String,
  },
  { timestamps: true },
);

schema.index({ status: 1, requestedAt: -1 });
schema.index({ entityId: 1, branchId: 1, status: 1 });

export default mongoose.model<ISponsorshipRequest>('SponsorshipRequest', schema, 'sponsorship_requests');
