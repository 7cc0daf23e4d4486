/**
 * fixtures.ts - Record builders and geometry helpers for the test suites.
 */

import { EARTH_RADIUS_KM } from '../services/geoService';
import type { NewRecord } from '../types/domain';

export const KM_PER_DEGREE = (Math.PI / 180) * EARTH_RADIUS_KM;

/** Latitude of the point `km` kilometres due north of the equator on the prime meridian. */
export function latitudeAtKm(km: number): number {
  return km / KM_PER_DEGREE;
}

export const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z');

/** Clock that advances one second per call, starting at FIXED_NOW. */
export function tickingClock(start: Date = FIXED_NOW): () => Date {
  let ticks = 0;
  return () => new Date(start.getTime() + ticks++ * 1000);
}

export function listingFields(overrides: Partial<NewRecord<'listing'>> = {}): NewRecord<'listing'> {
  return {
    donorId: 'donor-1',
    title: 'Leftover bread',
    description: null,
    type: 'bread',
    quantity: 10,
    unit: 'servings',
    lat: 0,
    lng: 0,
    expiresAt: null,
    status: 'available',
    ...overrides,
  };
}

export function recipientFields(overrides: Partial<NewRecord<'account'>> = {}): NewRecord<'account'> {
  return {
    name: 'Community Kitchen',
    email: `kitchen-${Math.random().toString(36).slice(2)}@example.org`,
    password: 'test-secret',
    role: 'recipient',
    phone: null,
    lat: 0,
    lng: 0,
    isActive: true,
    preferredType: null,
    ...overrides,
  };
}
