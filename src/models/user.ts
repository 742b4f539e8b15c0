import mongoose, { Schema, Types } from 'mongoose';
import { hideSensitiveFields } from './sensitive';

export type UserType = 'user' | 'company' | 'wholesaler' | 'serviceProvider';
export type AccountStatus = 'pending' | 'active' | 'inactive';

export interface IUser {
  fullName?: string;
  email: string;
  phone?: string;
  password?: string;
  userType: UserType;
  status: AccountStatus;
  companyId?: Types.ObjectId | null;
  wholesalerId?: Types.ObjectId | null;
  serviceProviderId?: Types.ObjectId | null;
  referralCode?: string;
  referrals: Types.ObjectId[];
  points: number;
  createdAt: Date;
  updatedAt: Date;
}

const userSchema = new Schema<IUser>(
  {
    fullName: { type: String, trim: true },
    email: { type: String, lowercase: true, trim: true, required: true, unique: true },
    phone: { type: String, trim: true },
    password: { type: String },
    userType: {
      type: String,
      enum: ['user', 'company', 'wholesaler', 'serviceProvider'],
      default: 'user',
    },
    status: { type: String, enum: ['pending', 'active', 'inactive'], default: 'pending' },
    companyId: { type: Schema.Types.ObjectId, ref: 'Company', default: null },
    wholesalerId: { type: Schema.Types.ObjectId, ref: 'Wholesaler', default: null },
    serviceProviderId: { type: Schema.Types.ObjectId, ref: 'ServiceProvider', default: null },
    referralCode: { type: String, unique: true, sparse: true },
    referrals: [{ type: Schema.Types.ObjectId, ref: 'User' }],
    points: { type: Number, default: 0 },
  },
  { timestamps: true },
);

userSchema.index({ wholesalerId: 1 });
userSchema.index({ companyId: 1 });
userSchema.index({ serviceProviderId: 1 });

hideSensitiveFields(userSchema);

export default mongoose.model<IUser>('User', userSchema, 'users');
