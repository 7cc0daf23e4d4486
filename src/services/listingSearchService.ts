/**
 * listingSearchService.ts - Nearby listing search.
 * Filters out expired and closed listings, keeps those inside the radius and
 * orders them closest first.
 */

import type { RecordStore } from '../store/recordStore';
import type { Coordinate, ListingRecord, ListingStatus } from '../types/domain';
import { haversineKm, roundTo } from './geoService';
import { guardStoreOutage } from './storeOutage';

export const DEFAULT_RADIUS_KM = 10.0;
export const MAX_SEARCH_RESULTS = 100;

const SEARCHABLE_STATUSES: readonly ListingStatus[] = ['available', 'claimed'];

export interface NearbySearchQuery {
  origin: Coordinate;
  radiusKm?: number;
  now: Date;
}

export type NearbyListing = ListingRecord & { distanceKm: number };

export type NearbySearchResult =
  | { status: 'ok'; count: number; items: NearbyListing[] }
  | { status: 'degraded'; reason: string; count: 0; items: [] };

export function isExpired(listing: ListingRecord, now: Date): boolean {
  return listing.expiresAt !== null && listing.expiresAt.getTime() < now.getTime();
}

export async function searchNearbyListings(store: RecordStore, query: NearbySearchQuery): Promise<NearbySearchResult> {
  const radiusKm = query.radiusKm ?? DEFAULT_RADIUS_KM;

  const read = await guardStoreOutage(store, 'Search', () => store.fetchAll('listing'));
  if (read.status === 'degraded') {
    return { status: 'degraded', reason: read.reason, count: 0, items: [] };
  }

  const results: NearbyListing[] = [];
  for (const listing of read.value) {
    if (isExpired(listing, query.now)) continue;

    const distance = haversineKm(query.origin, listing);
    if (distance <= radiusKm && SEARCHABLE_STATUSES.includes(listing.status)) {
      results.push({ ...listing, distanceKm: roundTo(distance, 2) });
    }
  }

  // Array.prototype.sort is stable, equal distances keep store order.
  results.sort((a, b) => a.distanceKm - b.distanceKm);

  return {
    status: 'ok',
    count: results.length,
    items: results.slice(0, MAX_SEARCH_RESULTS),
  };
}
