import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { createApp } from './app';
import { fixedRandomSource } from './services/randomSource';
import { MemoryRecordStore } from './store/memoryRecordStore';
import { FIXED_NOW, latitudeAtKm, tickingClock } from './testing/fixtures';

function buildApp(store: MemoryRecordStore) {
  return createApp(
    { store, random: fixedRandomSource(0), now: () => FIXED_NOW },
    { allowedOrigins: ['https://app.example.org'], production: false }
  );
}

const listingBody = {
  donorId: 'donor-1',
  title: 'Vegetable curry',
  type: 'curry',
  quantity: 25,
  lat: 0,
  lng: 0,
};

describe('HTTP API', () => {
  let store: MemoryRecordStore;
  let app: ReturnType<typeof buildApp>;

  beforeEach(() => {
    store = new MemoryRecordStore({ now: tickingClock() });
    app = buildApp(store);
  });

  describe('GET /', () => {
    it('announces the service', async () => {
      const res = await request(app).get('/');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ name: 'ConnectFood', message: 'Backend running' });
    });
  });

  describe('GET /test', () => {
    it('reports the store status', async () => {
      const res = await request(app).get('/test');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        backend: 'running',
        store: { driver: 'memory', connected: true, databaseName: null, collections: [] },
      });
    });
  });

  describe('accounts', () => {
    it('registers an account with a normalised email', async () => {
      const res = await request(app).post('/api/register').send({
        name: 'Harbour Shelter',
        email: 'Shelter@Example.org',
        password: 'test-secret',
        role: 'recipient',
        lat: 1.5,
        lng: 2.5,
      });

      expect(res.status).toBe(201);
      expect(res.body).toEqual({ id: expect.any(String), email: 'shelter@example.org', role: 'recipient' });

      const [account] = await store.fetchAll('account');
      expect(account).toMatchObject({ role: 'recipient', lat: 1.5, lng: 2.5, isActive: true, preferredType: null });
    });

    it('refuses a second registration with the same email', async () => {
      const body = { name: 'A', email: 'dup@example.org', password: 'test-secret', role: 'donor' };
      await request(app).post('/api/register').send(body);

      const res = await request(app).post('/api/register').send(body);

      expect(res.status).toBe(409);
      expect(res.body).toEqual({ message: 'Email already registered', code: 'CONFLICT' });
    });

    it('rejects an unknown role', async () => {
      const res = await request(app).post('/api/register').send({
        name: 'A',
        email: 'a@example.org',
        password: 'test-secret',
        role: 'courier',
      });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Invalid request');
      expect(res.body.errors).toHaveProperty('role');
    });

    it('logs in with matching credentials and never returns the password', async () => {
      await request(app).post('/api/register').send({
        name: 'Harbour Shelter',
        email: 'shelter@example.org',
        password: 'test-secret',
        role: 'recipient',
      });

      const ok = await request(app).post('/api/login').send({ email: 'shelter@example.org', password: 'test-secret' });
      const wrong = await request(app).post('/api/login').send({ email: 'shelter@example.org', password: 'nope' });

      expect(ok.status).toBe(200);
      expect(ok.body.user).toMatchObject({ name: 'Harbour Shelter', email: 'shelter@example.org', role: 'recipient' });
      expect(ok.body.user).not.toHaveProperty('password');
      expect(wrong.status).toBe(401);
      expect(wrong.body).toEqual({ message: 'Invalid credentials', code: 'UNAUTHORIZED' });
    });
  });

  describe('listings', () => {
    it('creates a listing that expires after 180 minutes by default', async () => {
      const res = await request(app).post('/api/listings').send(listingBody);

      expect(res.status).toBe(201);
      const listing = await store.fetchById('listing', res.body.id);
      expect(listing).toMatchObject({
        title: 'Vegetable curry',
        unit: 'servings',
        status: 'available',
        description: null,
        expiresAt: new Date('2024-05-01T15:00:00.000Z'),
      });
    });

    it('finds nearby listings with their distance', async () => {
      await request(app).post('/api/listings').send({ ...listingBody, title: 'far', lat: latitudeAtKm(4) });
      await request(app).post('/api/listings').send({ ...listingBody, title: 'near', lat: latitudeAtKm(2) });
      await request(app).post('/api/listings').send({ ...listingBody, title: 'outside', lat: latitudeAtKm(40) });

      const res = await request(app).get('/api/listings').query({ lat: 0, lng: 0 });

      expect(res.status).toBe(200);
      expect(res.body.count).toBe(2);
      expect(res.body.items.map((item: { title: string }) => item.title)).toEqual(['near', 'far']);
      expect(res.body.items.map((item: { distanceKm: number }) => item.distanceKm)).toEqual([2, 4]);
    });

    it('honours radius_km', async () => {
      await request(app).post('/api/listings').send({ ...listingBody, lat: latitudeAtKm(40) });

      const res = await request(app).get('/api/listings').query({ lat: 0, lng: 0, radius_km: 50 });

      expect(res.body.count).toBe(1);
      expect(res.body.items[0].distanceKm).toBe(40);
    });

    it('rejects out-of-range coordinates', async () => {
      const res = await request(app).get('/api/listings').query({ lat: 95, lng: 0 });

      expect(res.status).toBe(400);
      expect(res.body.errors).toHaveProperty('lat');
    });

    it('rejects a search without coordinates', async () => {
      const res = await request(app).get('/api/listings');

      expect(res.status).toBe(400);
    });

    it('rejects blank coordinates instead of searching at (0, 0)', async () => {
      await request(app).post('/api/listings').send(listingBody);

      const empty = await request(app).get('/api/listings?lat=&lng=&radius_km=');
      const spaces = await request(app).get('/api/listings?lat=%20&lng=0');

      expect(empty.status).toBe(400);
      expect(empty.body.errors).toEqual({ lat: ['Required'], lng: ['Required'], radius_km: ['Required'] });
      expect(spaces.status).toBe(400);
      expect(spaces.body.errors).toEqual({ lat: ['Required'] });
    });

    it('rejects coordinates that are not numbers', async () => {
      const res = await request(app).get('/api/listings').query({ lat: 'north', lng: 0 });

      expect(res.status).toBe(400);
      expect(res.body.errors).toHaveProperty('lat');
    });

    it('flags a degraded search when the store is down', async () => {
      store.setAvailable(false);

      const res = await request(app).get('/api/listings').query({ lat: 0, lng: 0 });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ count: 0, items: [], degraded: true });
    });
  });

  describe('matching', () => {
    it('proposes matches and lists them for the recipient', async () => {
      const listing = await request(app).post('/api/listings').send(listingBody);
      const near = await request(app).post('/api/register').send({
        name: 'Near',
        email: 'near@example.org',
        password: 'test-secret',
        role: 'recipient',
        lat: 0,
        lng: 0,
      });
      await request(app).post('/api/register').send({
        name: 'Far',
        email: 'far@example.org',
        password: 'test-secret',
        role: 'recipient',
        lat: latitudeAtKm(10),
        lng: 0,
      });

      const res = await request(app).post('/api/match').send({ listingId: listing.body.id });

      expect(res.status).toBe(200);
      expect(res.body.matches).toHaveLength(2);
      expect(res.body.matches[0]).toMatchObject({
        recipientId: near.body.id,
        score: 0.985,
        distanceKm: 0,
        routeEtaMin: 5,
        status: 'proposed',
      });
      expect(res.body.matches[1]).toMatchObject({ score: 0.635, distanceKm: 10, routeEtaMin: 15 });

      const history = await request(app).get('/api/matches').query({ user_id: near.body.id });
      expect(history.status).toBe(200);
      expect(history.body.items).toHaveLength(1);
      expect(history.body.items[0].listingId).toBe(listing.body.id);
    });

    it('returns 404 for an unknown listing', async () => {
      const res = await request(app).post('/api/match').send({ listingId: '665f1c2e9d3b4a0012345678' });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ message: 'Listing not found', code: 'NOT_FOUND' });
    });

    it('requires a listing id', async () => {
      const res = await request(app).post('/api/match').send({});

      expect(res.status).toBe(400);
    });

    it('returns an empty list when nobody can receive', async () => {
      const listing = await request(app).post('/api/listings').send(listingBody);

      const res = await request(app).post('/api/match').send({ listingId: listing.body.id });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ matches: [] });
    });
  });

  describe('messages', () => {
    it('stores messages and returns them oldest first', async () => {
      await request(app).post('/api/message').send({ matchId: 'm1', senderId: 'donor-1', content: 'Pickup at 6?' });
      await request(app).post('/api/message').send({ matchId: 'm2', senderId: 'donor-1', content: 'Other thread' });
      await request(app).post('/api/message').send({ matchId: 'm1', senderId: 'r1', content: '  Works for us  ' });

      const res = await request(app).get('/api/messages').query({ match_id: 'm1' });

      expect(res.status).toBe(200);
      expect(res.body.items.map((item: { content: string }) => item.content)).toEqual(['Pickup at 6?', 'Works for us']);
    });

    it('rejects an empty message', async () => {
      const res = await request(app).post('/api/message').send({ matchId: 'm1', senderId: 'donor-1', content: '   ' });

      expect(res.status).toBe(400);
    });
  });

  describe('GET /api/blog', () => {
    it('seeds the demo posts once', async () => {
      const first = await request(app).get('/api/blog');
      const second = await request(app).get('/api/blog');

      expect(first.status).toBe(200);
      expect(first.body.items.map((post: { title: string }) => post.title)).toEqual([
        'AI for Food Redistribution',
        'Food Safety 101',
      ]);
      expect(second.body.items).toHaveLength(2);
      expect(store.count('blog')).toBe(2);
    });
  });

  describe('store outage', () => {
    it.each(['/api/matches', '/api/messages?match_id=m1', '/api/blog'])('flags %s as degraded', async (path) => {
      store.setAvailable(false);

      const res = await request(app).get(path);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ items: [], degraded: true });
    });

    it('flags matching as degraded', async () => {
      store.setAvailable(false);

      const res = await request(app).post('/api/match').send({ listingId: '665f1c2e9d3b4a0012345678' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ matches: [], degraded: true });
    });
  });

  describe('fallbacks', () => {
    it('answers malformed JSON with 400', async () => {
      const res = await request(app)
        .post('/api/match')
        .set('Content-Type', 'application/json')
        .send('{"listingId":');

      expect(res.status).toBe(400);
    });

    it('answers unknown routes with 404', async () => {
      const res = await request(app).get('/api/unknown');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ message: 'Route not found', path: '/api/unknown', method: 'GET' });
    });
  });
});
