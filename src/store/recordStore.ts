/**
 * recordStore.ts - Contract between the pipelines and whatever holds the documents.
 * Implemented by MongoRecordStore (mongoose) and MemoryRecordStore (tests, local runs).
 */

import type { CollectionMap, CollectionName, NewRecord, RecordFilter } from '../types/domain';

export type StoreDriver = 'mongo' | 'memory';

export interface StoreStatus {
  driver: StoreDriver;
  connected: boolean;
  databaseName: string | null;
  collections: string[];
}

export interface RecordStore {
  /** Every record of the collection whose fields equal the ones in `filter`. */
  fetchAll<C extends CollectionName>(collection: C, filter?: RecordFilter<C>): Promise<CollectionMap[C][]>;
  /** Resolves to null when the id is unknown or not a valid id for this store. */
  fetchById<C extends CollectionName>(collection: C, id: string): Promise<CollectionMap[C] | null>;
  create<C extends CollectionName>(collection: C, record: NewRecord<C>): Promise<string>;
  isAvailable(): boolean;
  describe(): Promise<StoreStatus>;
}

export interface RecordMeta {
  id: string;
  createdAt: Date;
}

// Per-collection operations; the stores dispatch to one of these by collection name.
export interface CollectionAdapter<R extends RecordMeta> {
  find(filter?: Partial<Omit<R, keyof RecordMeta>>): Promise<R[]>;
  findById(id: string): Promise<R | null>;
  insert(fields: Omit<R, keyof RecordMeta>): Promise<string>;
}

export type CollectionAdapters = { [C in CollectionName]: CollectionAdapter<CollectionMap[C]> };

// Undefined filter values do not constrain the result.
export function matchesFilter(record: object, filter: object): boolean {
  return Object.entries(filter).every(
    ([key, value]) => value === undefined || (key in record && Reflect.get(record, key) === value)
  );
}
