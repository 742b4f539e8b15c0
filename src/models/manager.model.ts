import mongoose, { Schema } from 'mongoose';
import { hideSensitiveFields } from './sensitive';

export interface IManager {
  fullName: string;
  email: string;
  password: string;
  rolesAccess: string[];
  createdAt: Date;
  updatedAt: Date;
}

const schema = new Schema<IManager>(
  {
    fullName: { type: String, required: true, trim: true },
    email: { type: String, required: true, lowercase: true, trim: true, unique: true },
    password: { type: String, required: true },
    rolesAccess: { type: [String], default: [] },
  },
  { timestamps: true },
);

hideSensitiveFields(schema);

export default mongoose.model<IManager>('Manager', schema, 'managers');
