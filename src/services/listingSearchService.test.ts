import { describe, expect, it } from 'vitest';
import { MemoryRecordStore } from '../store/memoryRecordStore';
import type { RecordStore } from '../store/recordStore';
import { FIXED_NOW, latitudeAtKm, listingFields } from '../testing/fixtures';
import { MAX_SEARCH_RESULTS, searchNearbyListings } from './listingSearchService';

const ORIGIN = { lat: 0, lng: 0 };
const HOUR_MS = 60 * 60 * 1000;

describe('searchNearbyListings', () => {
  it('includes an available listing 5 km away with its rounded distance', async () => {
    const store = new MemoryRecordStore();
    const id = await store.create('listing', listingFields({
      lat: latitudeAtKm(5),
      expiresAt: new Date(FIXED_NOW.getTime() + HOUR_MS),
    }));

    const result = await searchNearbyListings(store, { origin: ORIGIN, radiusKm: 10, now: FIXED_NOW });

    expect(result.status).toBe('ok');
    expect(result.count).toBe(1);
    expect(result.items[0].id).toBe(id);
    expect(result.items[0].distanceKm).toBe(5);
  });

  it('drops listings that expired before now', async () => {
    const store = new MemoryRecordStore();
    await store.create('listing', listingFields({
      lat: latitudeAtKm(5),
      expiresAt: new Date(FIXED_NOW.getTime() - HOUR_MS),
    }));

    const result = await searchNearbyListings(store, { origin: ORIGIN, radiusKm: 10, now: FIXED_NOW });

    expect(result).toEqual({ status: 'ok', count: 0, items: [] });
  });

  it('keeps listings expiring exactly now and listings without expiry', async () => {
    const store = new MemoryRecordStore();
    await store.create('listing', listingFields({ title: 'edge', expiresAt: new Date(FIXED_NOW) }));
    await store.create('listing', listingFields({ title: 'open', expiresAt: null }));

    const result = await searchNearbyListings(store, { origin: ORIGIN, now: FIXED_NOW });

    expect(result.items.map((item) => item.title)).toEqual(['edge', 'open']);
  });

  it('only returns available and claimed listings', async () => {
    const store = new MemoryRecordStore();
    await store.create('listing', listingFields({ title: 'available', status: 'available' }));
    await store.create('listing', listingFields({ title: 'claimed', status: 'claimed' }));
    await store.create('listing', listingFields({ title: 'completed', status: 'completed' }));
    await store.create('listing', listingFields({ title: 'expired', status: 'expired' }));

    const result = await searchNearbyListings(store, { origin: ORIGIN, now: FIXED_NOW });

    expect(result.items.map((item) => item.title)).toEqual(['available', 'claimed']);
  });

  it('uses a 10 km radius by default', async () => {
    const store = new MemoryRecordStore();
    await store.create('listing', listingFields({ title: 'near', lat: latitudeAtKm(9) }));
    await store.create('listing', listingFields({ title: 'far', lat: latitudeAtKm(12) }));

    const byDefault = await searchNearbyListings(store, { origin: ORIGIN, now: FIXED_NOW });
    const wider = await searchNearbyListings(store, { origin: ORIGIN, radiusKm: 15, now: FIXED_NOW });

    expect(byDefault.items.map((item) => item.title)).toEqual(['near']);
    expect(wider.items.map((item) => item.title)).toEqual(['near', 'far']);
  });

  it('never returns a listing outside the radius', async () => {
    const store = new MemoryRecordStore();
    for (let km = 0; km <= 20; km += 0.5) {
      await store.create('listing', listingFields({ lat: latitudeAtKm(km) }));
    }

    const result = await searchNearbyListings(store, { origin: ORIGIN, radiusKm: 7.25, now: FIXED_NOW });

    expect(result.count).toBe(15);
    expect(result.items.every((item) => item.distanceKm <= 7.25)).toBe(true);
  });

  it('sorts closest first', async () => {
    const store = new MemoryRecordStore();
    for (const km of [8, 1, 6, 3]) {
      await store.create('listing', listingFields({ lat: latitudeAtKm(km) }));
    }

    const result = await searchNearbyListings(store, { origin: ORIGIN, now: FIXED_NOW });

    expect(result.items.map((item) => item.distanceKm)).toEqual([1, 3, 6, 8]);
  });

  it('caps the items at 100 while counting every match', async () => {
    const store = new MemoryRecordStore();
    for (let i = 0; i < 120; i++) {
      await store.create('listing', listingFields({ lat: latitudeAtKm((i % 40) * 0.2) }));
    }

    const result = await searchNearbyListings(store, { origin: ORIGIN, now: FIXED_NOW });

    expect(result.count).toBe(120);
    expect(result.items).toHaveLength(MAX_SEARCH_RESULTS);
    for (let i = 1; i < result.items.length; i++) {
      expect(result.items[i].distanceKm).toBeGreaterThanOrEqual(result.items[i - 1].distanceKm);
    }
  });

  it('reports a degraded result when the store is unavailable', async () => {
    const store = new MemoryRecordStore();
    await store.create('listing', listingFields());
    store.setAvailable(false);

    const result = await searchNearbyListings(store, { origin: ORIGIN, now: FIXED_NOW });

    expect(result).toEqual({ status: 'degraded', reason: 'Record store unavailable', count: 0, items: [] });
  });

  it('propagates other store failures', async () => {
    const broken: RecordStore = {
      fetchAll: async () => {
        throw new Error('cursor killed');
      },
      fetchById: async () => null,
      create: async () => 'unused',
      isAvailable: () => true,
      describe: async () => ({ driver: 'memory', connected: true, databaseName: null, collections: [] }),
    };

    await expect(searchNearbyListings(broken, { origin: ORIGIN, now: FIXED_NOW })).rejects.toThrow('cursor killed');
  });
});
