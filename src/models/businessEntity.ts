import { Schema, Types } from 'mongoose';

export const ENTITY_KINDS = ['company', 'wholesaler', 'serviceProvider'] as const;
export type EntityKind = (typeof ENTITY_KINDS)[number];

export type EntityStatus = 'pending' | 'approved' | 'active' | 'inactive';
export type BranchStatus = 'pending' | 'active' | 'inactive';

export interface IBranch {
  _id: Types.ObjectId;
  name: string;
  phone?: string;
  category?: string;
  description?: string;
  images: string[];
  videos: string[];
  status: BranchStatus;
  sponsored: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/** Shared shape of companies, wholesalers and service providers. */
export interface IBusinessEntity {
  userId: Types.ObjectId;
  businessName: string;
  email?: string;
  phone?: string;
  category?: string;
  subCategory?: string;
  /** Salesperson or sales manager who onboarded the entity; equals `userId` on self sign-up. */
  createdBy?: Types.ObjectId | null;
  status: EntityStatus;
  referralCode?: string;
  referrals: Types.ObjectId[];
  points: number;
  /** Set while the entity itself (service providers) carries an approved sponsorship. */
  sponsored: boolean;
  /** Review average and count; only service providers are reviewed. */
  rating: number;
  reviewCount: number;
  branches: IBranch[];
  createdAt: Date;
  updatedAt: Date;
}

const branchSchema = new Schema<IBranch>(
  {
    name: { type: String, required: true, trim: true },
    phone: String,
    category: String,
    description: String,
    images: { type: [String], default: [] },
    videos: { type: [String], default: [] },
    status: { type: String, enum: ['pending', 'active', 'inactive'], default: 'pending' },
    sponsored: { type: Boolean, default: false },
  },
  { timestamps: true },
);

export const buildBusinessEntitySchema = () => {
  const schema = new Schema<IBusinessEntity>(
    {
      userId: { type: Schema.Types.ObjectId, ref: 'User', required: true, index: true },
      businessName: { type: String, required: true, trim: true },
      email: { type: String, lowercase: true, trim: true },
      phone: String,
      category: String,
      subCategory: String,
      createdBy: { type: Schema.Types.ObjectId, default: null, index: true },
      status: { type: String, enum: ['pending', 'approved', 'active', 'inactive'], default: 'pending' },
      referralCode: { type: String, unique: true, sparse: true },
      referrals: [{ type: Schema.Types.ObjectId }],
      points: { type: Number, default: 0 },
      sponsored: { type: Boolean, default: false },
      rating: { type: Number, default: 0, min: 0, max: 5 },
      reviewCount: { type: Number, default: 0 },
      branches: { type: [branchSchema], default: [] },
    },
    { timestamps: true },
  );

  schema.index({ 'branches._id': 1 });
  return schema;
};

export const isEntityKind = (value: unknown): value is EntityKind =>
  typeof value === 'string' && (ENTITY_KINDS as readonly string[]).includes(value);
