import mongoose, { Schema, Types } from 'mongoose';
import { hideSensitiveFields } from './sensitive';

export interface ISalesperson {
  fullName: string;
  email: string;
  password: string;
  phoneNumber?: string;
  image?: string;
  salesManagerId: Types.ObjectId;
  region?: string;
  referralCode?: string;
  referrals: Types.ObjectId[];
  referralBalance: number;
  commissionPercent: number;
  createdBy?: Types.ObjectId | null;
  createdAt: Date;
  updatedAt: Date;
}

const schema = new Schema<ISalesperson>(
  {
    fullName: { type: String, required: true, trim: true },
    email: { type: String, required: true, lowercase: true, trim: true, unique: true },
    password: { type: String, required: true },
    phoneNumber: { type: String, trim: true },
    image: String,
    salesManagerId: { type: Schema.Types.ObjectId, ref: 'SalesManager', required: true, index: true },
    region: String,
    referralCode: { type: String, unique: true, sparse: true },
    referrals: [{ type: Schema.Types.ObjectId }],
    referralBalance: { type: Number, default: 0 },
    commissionPercent: { type: Number, default: 0, min: 0 },
    createdBy: { type: Schema.Types.ObjectId, default: null },
  },
  { timestamps: true },
);

hideSensitiveFields(schema);

export default mongoose.model<ISalesperson>('Salesperson', schema, 'salespersons');
