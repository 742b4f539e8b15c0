import mongoose, { Schema, Types } from 'mongoose';
import { UserType } from './user';
import { VOUCHER_HOLDER_TYPES } from './voucher.model';

export interface IVoucherPurchase {
  voucherId: Types.ObjectId;
  /** Account (`users._id`) that bought the voucher. */
  holderId: Types.ObjectId;
  holderType: UserType;
  pointsUsed: number;
  isUsed: boolean;
  usedAt: Date | null;
  createdAt: Date;
}

const schema = new Schema<IVoucherPurchase>(
  {
    voucherId: { type: Schema.Types.ObjectId, ref: 'Voucher', required: true },
    holderId: { type: Schema.Types.ObjectId, required: true },
    holderType: { type: String, enum: VOUCHER_HOLDER_TYPES, required: true },
    pointsUsed: { type: Number, required: true },
    isUsed: { type: Boolean, default: true },
    usedAt: { type: Date, default: null },
  },
  { timestamps: { createdAt: true, updatedAt: false } },
);

// one purchase per voucher and account
schema.index({ holderId: 1, voucherId: 1 }, { unique: true });

export default mongoose.model<IVoucherPurchase>('VoucherPurchase', schema, 'voucher_purchases');
