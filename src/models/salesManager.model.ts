import mongoose, { Schema, Types } from 'mongoose';
import { hideSensitiveFields } from './sensitive';

export const SALES_MANAGERS_COLLECTION = 'sales_managers';
/** Older deployments wrote sales managers here; see scripts/migrateSalesManagers.ts. */
export const LEGACY_SALES_MANAGERS_COLLECTION = 'salesManagers';

export interface ISalesManager {
  fullName: string;
  email: string;
  password: string;
  phoneNumber?: string;
  image?: string;
  createdBy?: Types.ObjectId | null;
  salespersons: Types.ObjectId[];
  rolesAccess: string[];
  commissionPercent: number;
  createdAt: Date;
  updatedAt: Date;
}

const schema = new Schema<ISalesManager>(
  {
    fullName: { type: String, required: true, trim: true },
    email: { type: String, required: true, lowercase: true, trim: true, unique: true },
    password: { type: String, required: true },
    phoneNumber: { type: String, trim: true },
    image: String,
    createdBy: { type: Schema.Types.ObjectId, default: null },
    salespersons: [{ type: Schema.Types.ObjectId, ref: 'Salesperson' }],
    rolesAccess: { type: [String], default: [] },
    commissionPercent: { type: Number, default: 0, min: 0 },
  },
  { timestamps: true },
);

hideSensitiveFields(schema);

export default mongoose.model<ISalesManager>('SalesManager', schema, SALES_MANAGERS_COLLECTION);
