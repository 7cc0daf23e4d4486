/**
 * storeOutage.ts - Turns a lost record store into an explicit degraded result.
 */

import { StoreUnavailableError } from '../errors/appErrors';
import type { RecordStore } from '../store/recordStore';

export interface DegradedOutcome {
  status: 'degraded';
  reason: string;
}

export type StoreOutcome<T> = { status: 'ok'; value: T } | DegradedOutcome;

export type ItemsResult<T> =
  | { status: 'ok'; items: T[] }
  | { status: 'degraded'; reason: string; items: [] };

/**
 * Runs `work` when the store is up. An outage, whether detected up front or raised
 * part way through, yields `{ status: 'degraded' }`; any other error propagates.
 */
export async function guardStoreOutage<T>(
  store: RecordStore,
  tag: string,
  work: () => Promise<T>
): Promise<StoreOutcome<T>> {
  try {
    if (!store.isAvailable()) {
      throw new StoreUnavailableError();
    }
    return { status: 'ok', value: await work() };
  } catch (error) {
    if (error instanceof StoreUnavailableError) {
      console.warn(`[${tag}] Store unavailable, returning degraded result:`, error.message);
      return { status: 'degraded', reason: error.message };
    }
    throw error;
  }
}

export async function listOrDegrade<T>(
  store: RecordStore,
  tag: string,
  read: () => Promise<T[]>
): Promise<ItemsResult<T>> {
  const outcome = await guardStoreOutage(store, tag, read);
  if (outcome.status === 'degraded') {
    return { status: 'degraded', reason: outcome.reason, items: [] };
  }
  return { status: 'ok', items: outcome.value };
}
