import mongoose, { Schema, Types } from 'mongoose';

export const WALLET_TRANSACTION_TYPES = [
  'subscription_income',
  'withdrawal_income',
  'sponsorship_income',
  'commission_payout',
] as const;
export type WalletTransactionType = (typeof WALLET_TRANSACTION_TYPES)[number];

export interface IWalletTransaction {
  type: WalletTransactionType;
  amount: number;
  entityType?: string;
  entityId?: Types.ObjectId | null;
  description?: string;
  createdAt: Date;
}

const schema = new Schema<IWalletTransaction>(
  {
    type: { type: String, enum: WALLET_TRANSACTION_TYPES, required: true },
    amount: { type: Number, required: true },
    entityType: String,
    entityId: { type: Schema.Types.ObjectId, default: null },
    description: String,
  },
  { timestamps: { createdAt: true, updatedAt: false } },
);

schema.index({ type: 1, createdAt: -1 });

// append-only ledger
schema.pre(['updateOne', 'updateMany', 'findOneAndUpdate', 'replaceOne'], function () {
  throw new Error('Wallet transactions are append-only');
});

export default mongoose.model<IWalletTransaction>('AdminWalletTransaction', schema, 'admin_wallet');
