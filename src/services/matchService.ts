/**
 * matchService.ts - Recipient matching for a listing and match history queries.
 *
 * Every active recipient is scored against the listing and persisted as a
 * proposed match; only the best few are returned to the caller.
 */

import { NotFoundError } from '../errors/appErrors';
import type { RecordStore } from '../store/recordStore';
import type { AccountRecord, ListingRecord, MatchRecord, NewRecord } from '../types/domain';
import { haversineKm, roundTo } from './geoService';
import { mathRandomSource, RandomSource } from './randomSource';
import { guardStoreOutage, type ItemsResult, listOrDegrade } from './storeOutage';

export const MATCH_RESPONSE_LIMIT = 5;
export const MATCH_HISTORY_LIMIT = 100;

// Distance at which the proximity term reaches zero.
export const PROXIMITY_HORIZON_KM = 20;
export const AVERAGE_SPEED_KMH = 40;
export const MIN_ETA_MINUTES = 5;

export const SCORE_WEIGHTS = {
  proximity: 0.7,
  typeMatch: 0.2,
  freshness: 0.1,
} as const;

export const TYPE_MATCHED = 1.0;
export const TYPE_MISMATCHED = 0.8;
export const FRESHNESS_RANGE = { min: 0.85, max: 1.0 } as const;

export interface ScoreBreakdown {
  distanceKm: number;
  proximity: number;
  typeMatch: number;
  freshness: number;
  score: number;
  routeEtaMin: number;
}

// A freshly persisted match as handed back to the caller.
export type ProposedMatch = NewRecord<'match'> & { id: string };

export type MatchComputation =
  | { status: 'ok'; matches: ProposedMatch[] }
  | { status: 'degraded'; reason: string; matches: [] };

export interface MatchOptions {
  random?: RandomSource;
}

/**
 * 1.0 when the recipient has no declared preference or it names the listing's
 * category (case-insensitive), 0.8 otherwise.
 */
export function typeMatchTerm(listingType: string, preferredType: string | null): number {
  if (preferredType === null || preferredType.trim() === '') {
    return TYPE_MATCHED;
  }
  return preferredType.trim().toLowerCase() === listingType.trim().toLowerCase() ? TYPE_MATCHED : TYPE_MISMATCHED;
}

export function proximityTerm(distanceKm: number): number {
  return Math.max(0, 1 - distanceKm / PROXIMITY_HORIZON_KM) * SCORE_WEIGHTS.proximity;
}

export function estimateEtaMinutes(distanceKm: number): number {
  return Math.max(MIN_ETA_MINUTES, (distanceKm / AVERAGE_SPEED_KMH) * 60);
}

export function scoreRecipient(listing: ListingRecord, recipient: AccountRecord, random: RandomSource): ScoreBreakdown {
  // Recipients without a base location are treated as sitting at (0, 0).
  const distanceKm = haversineKm(listing, { lat: recipient.lat ?? 0, lng: recipient.lng ?? 0 });
  const proximity = proximityTerm(distanceKm);
  const typeMatch = typeMatchTerm(listing.type, recipient.preferredType);
  const freshness = random.uniform(FRESHNESS_RANGE.min, FRESHNESS_RANGE.max);

  const raw = proximity + typeMatch * SCORE_WEIGHTS.typeMatch + freshness * SCORE_WEIGHTS.freshness;
  const score = Math.min(1, Math.max(0, roundTo(raw, 3)));

  return {
    distanceKm,
    proximity,
    typeMatch,
    freshness,
    score,
    routeEtaMin: estimateEtaMinutes(distanceKm),
  };
}

type Ranked = Pick<MatchRecord, 'score' | 'distanceKm'>;

export function compareMatches(a: Ranked, b: Ranked): number {
  return b.score - a.score || a.distanceKm - b.distanceKm;
}

interface MatchCandidates {
  listing: ListingRecord;
  recipients: AccountRecord[];
}

async function loadCandidates(store: RecordStore, listingId: string): Promise<MatchCandidates> {
  const listing = await store.fetchById('listing', listingId);
  if (!listing) {
    throw new NotFoundError('Listing not found');
  }
  const recipients = await store.fetchAll('account', { role: 'recipient', isActive: true });
  return { listing, recipients };
}

// Writes are independent: a failure part way leaves earlier matches in place.
async function proposeMatches(
  store: RecordStore,
  { listing, recipients }: MatchCandidates,
  random: RandomSource
): Promise<ProposedMatch[]> {
  const created: ProposedMatch[] = [];
  for (const recipient of recipients) {
    const breakdown = scoreRecipient(listing, recipient, random);
    const fields: NewRecord<'match'> = {
      listingId: listing.id,
      donorId: listing.donorId,
      recipientId: recipient.id,
      score: breakdown.score,
      distanceKm: roundTo(breakdown.distanceKm, 2),
      routeEtaMin: roundTo(breakdown.routeEtaMin, 1),
      status: 'proposed',
    };
    const id = await store.create('match', fields);
    created.push({ id, ...fields });
  }

  console.log(`[Match] Listing ${listing.id}: ${created.length} matches proposed`);
  return created.sort(compareMatches);
}

/**
 * Scores and persists a match for every active recipient, then returns the best
 * few. A store outage at any point, including in the middle of the writes, gives
 * a degraded result.
 */
export async function computeMatches(
  store: RecordStore,
  listingId: string,
  options: MatchOptions = {}
): Promise<MatchComputation> {
  const random = options.random ?? mathRandomSource;

  const outcome = await guardStoreOutage(store, 'Match', async (): Promise<ProposedMatch[]> => {
    const candidates = await loadCandidates(store, listingId);
    return candidates.recipients.length === 0 ? [] : proposeMatches(store, candidates, random);
  });

  if (outcome.status === 'degraded') {
    return { status: 'degraded', reason: outcome.reason, matches: [] };
  }
  return { status: 'ok', matches: outcome.value.slice(0, MATCH_RESPONSE_LIMIT) };
}

/**
 * Most recent matches first. With a user id, only matches where that user is the
 * donor or the recipient.
 */
export async function listMatches(store: RecordStore, userId?: string): Promise<ItemsResult<MatchRecord>> {
  return listOrDegrade(store, 'Match', async () => {
    const matches = await store.fetchAll('match');
    const visible = userId
      ? matches.filter((match) => match.donorId === userId || match.recipientId === userId)
      : matches;

    return visible
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, MATCH_HISTORY_LIMIT);
  });
}
