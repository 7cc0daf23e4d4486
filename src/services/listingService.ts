/**
 * listingService.ts - Listing creation for donors.
 */

import type { RecordStore } from '../store/recordStore';

export const DEFAULT_EXPIRY_MINUTES = 180;

export interface NewListing {
  donorId: string;
  title: string;
  description?: string;
  type: string;
  quantity: number;
  unit: string;
  lat: number;
  lng: number;
  expiresInMinutes?: number;
}

export async function createListing(store: RecordStore, input: NewListing, now: Date): Promise<string> {
  const expiresInMinutes = input.expiresInMinutes ?? DEFAULT_EXPIRY_MINUTES;

  return store.create('listing', {
    donorId: input.donorId,
    title: input.title,
    description: input.description ?? null,
    type: input.type,
    quantity: input.quantity,
    unit: input.unit,
    lat: input.lat,
    lng: input.lng,
    expiresAt: new Date(now.getTime() + expiresInMinutes * 60_000),
    status: 'available',
  });
}
