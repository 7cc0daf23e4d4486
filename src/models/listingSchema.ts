/**
 * listingSchema.ts - Surplus-food offers posted by donors.
 * Only available and claimed listings show up in nearby searches.
 */

import { HydratedDocument, InferSchemaType, Schema, model } from 'mongoose';
import { LISTING_STATUSES, ListingRecord, ListingStatus } from '../types/domain';

const listingSchema = new Schema({
  donorId: { type: String, required: true, index: true },
  title: { type: String, required: true, trim: true },
  description: { type: String, trim: true, default: null },
  type: { type: String, required: true, trim: true },
  quantity: { type: Number, required: true, min: 0 },
  unit: { type: String, default: 'servings', trim: true },
  lat: { type: Number, required: true, min: -90, max: 90 },
  lng: { type: Number, required: true, min: -180, max: 180 },
  expiresAt: { type: Date, default: null },
  status: { type: String, enum: LISTING_STATUSES, default: 'available' }
}, {
  timestamps: true
});

export const ListingModel = model('Listing', listingSchema);

type ListingDocument = HydratedDocument<InferSchemaType<typeof listingSchema>>;

function toListingStatus(value: string | null | undefined): ListingStatus {
  return LISTING_STATUSES.find((status) => status === value) ?? 'available';
}

export function toListingRecord(doc: ListingDocument): ListingRecord {
  return {
    id: doc._id.toString(),
    donorId: doc.donorId,
    title: doc.title,
    description: doc.description ?? null,
    type: doc.type,
    quantity: doc.quantity,
    unit: doc.unit ?? 'servings',
    lat: doc.lat,
    lng: doc.lng,
    expiresAt: doc.expiresAt ?? null,
    status: toListingStatus(doc.status),
    createdAt: doc.createdAt,
  };
}

export default listingSchema;
