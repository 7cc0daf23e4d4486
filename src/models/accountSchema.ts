/**
 * accountSchema.ts - Donor and recipient accounts.
 * Recipients with isActive = true are the candidate pool for matching.
 */

import { HydratedDocument, InferSchemaType, Schema, model } from 'mongoose';
import { AccountRecord, ROLES, Role } from '../types/domain';

const accountSchema = new Schema({
  name: { type: String, required: true, trim: true },
  email: { type: String, required: true, unique: true, lowercase: true, trim: true },
  password: { type: String, required: true, minlength: 4, select: false },
  role: { type: String, enum: ROLES, required: true, index: true },
  phone: { type: String, trim: true, default: null },
  lat: { type: Number, min: -90, max: 90, default: null },
  lng: { type: Number, min: -180, max: 180, default: null },
  isActive: { type: Boolean, default: true },
  preferredType: { type: String, trim: true, lowercase: true, default: null }
}, {
  timestamps: true
});

accountSchema.index({ role: 1, isActive: 1 });

export const AccountModel = model('Account', accountSchema);

type AccountDocument = HydratedDocument<InferSchemaType<typeof accountSchema>>;

function toRole(value: string): Role {
  return value === 'donor' ? 'donor' : 'recipient';
}

export function toAccountRecord(doc: AccountDocument): AccountRecord {
  return {
    id: doc._id.toString(),
    name: doc.name,
    email: doc.email,
    // Only present when the query selected it explicitly.
    password: doc.password ?? '',
    role: toRole(doc.role),
    phone: doc.phone ?? null,
    lat: doc.lat ?? null,
    lng: doc.lng ?? null,
    isActive: doc.isActive ?? true,
    preferredType: doc.preferredType ?? null,
    createdAt: doc.createdAt,
  };
}

export default accountSchema;
