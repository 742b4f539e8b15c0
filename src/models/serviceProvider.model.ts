import mongoose from 'mongoose';
import { buildBusinessEntitySchema, IBusinessEntity } from './businessEntity';

export default mongoose.model<IBusinessEntity>('ServiceProvider', buildBusinessEntitySchema(), 'serviceProviders');
