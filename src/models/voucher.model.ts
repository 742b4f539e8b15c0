import mongoose, { Schema, Types } from 'mongoose';
import { UserType } from './user';

export const VOUCHER_HOLDER_TYPES = ['user', 'company', 'wholesaler', 'serviceProvider'] as const satisfies readonly UserType[];

export interface IVoucher {
  name: string;
  description?: string;
  image?: string;
  /** Points deducted from the buyer. */
  points: number;
  isActive: boolean;
  targetUserType: UserType;
  createdBy?: Types.ObjectId | null;
  createdAt: Date;
  updatedAt: Date;
}

const schema = new Schema<IVoucher>(
  {
    name: { type: String, required: true, trim: true },
    description: String,
    image: String,
    points: { type: Number, required: true, min: 1 },
    isActive: { type: Boolean, default: true },
    targetUserType: { type: String, enum: VOUCHER_HOLDER_TYPES, required: true },
    createdBy: { type: Schema.Types.ObjectId, default: null },
  },
  { timestamps: true },
);

schema.index({ targetUserType: 1, isActive: 1 });

export default mongoose.model<IVoucher>('Voucher', schema, 'vouchers');
