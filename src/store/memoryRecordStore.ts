/**
 * memoryRecordStore.ts - In-process record store.
 * Used by the test suite and by local runs started with STORE_DRIVER=memory.
 */

import { Types } from 'mongoose';
import { StoreUnavailableError } from '../errors/appErrors';
import { COLLECTION_NAMES } from '../types/domain';
import type { AccountRecord, BlogRecord, CollectionMap, CollectionName, ListingRecord, MatchRecord, MessageRecord, NewRecord, RecordFilter } from '../types/domain';
import { CollectionAdapter, CollectionAdapters, matchesFilter, RecordMeta, RecordStore, StoreStatus } from './recordStore';

class MemoryTable<R extends RecordMeta> implements CollectionAdapter<R> {
  private readonly rows: R[] = [];

  constructor(
    private readonly build: (fields: Omit<R, keyof RecordMeta>, meta: RecordMeta) => R,
    private readonly now: () => Date
  ) {}

  async find(filter?: Partial<Omit<R, keyof RecordMeta>>): Promise<R[]> {
    return this.rows
      .filter((row) => filter === undefined || matchesFilter(row, filter))
      .map((row) => ({ ...row }));
  }

  async findById(id: string): Promise<R | null> {
    const row = this.rows.find((candidate) => candidate.id === id);
    return row ? { ...row } : null;
  }

  async insert(fields: Omit<R, keyof RecordMeta>): Promise<string> {
    const id = new Types.ObjectId().toString();
    this.rows.push(this.build(fields, { id, createdAt: this.now() }));
    return id;
  }

  get size(): number {
    return this.rows.length;
  }
}

export interface MemoryRecordStoreOptions {
  now?: () => Date;
}

export class MemoryRecordStore implements RecordStore {
  private readonly tables: CollectionAdapters;
  private readonly counters: Record<CollectionName, () => number>;
  private available = true;

  constructor(options: MemoryRecordStoreOptions = {}) {
    const now = options.now ?? (() => new Date());

    const account = new MemoryTable<AccountRecord>((fields, meta) => ({ ...fields, ...meta }), now);
    const listing = new MemoryTable<ListingRecord>((fields, meta) => ({ ...fields, ...meta }), now);
    const match = new MemoryTable<MatchRecord>((fields, meta) => ({ ...fields, ...meta }), now);
    const message = new MemoryTable<MessageRecord>((fields, meta) => ({ ...fields, ...meta }), now);
    const blog = new MemoryTable<BlogRecord>((fields, meta) => ({ ...fields, tags: [...fields.tags], ...meta }), now);

    this.tables = { account, listing, match, message, blog };
    this.counters = {
      account: () => account.size,
      listing: () => listing.size,
      match: () => match.size,
      message: () => message.size,
      blog: () => blog.size,
    };
  }

  /** Simulates the backend going away; every operation then fails with StoreUnavailableError. */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  isAvailable(): boolean {
    return this.available;
  }

  count(collection: CollectionName): number {
    return this.counters[collection]();
  }

  async fetchAll<C extends CollectionName>(collection: C, filter?: RecordFilter<C>): Promise<CollectionMap[C][]> {
    this.ensureAvailable();
    return this.tables[collection].find(filter);
  }

  async fetchById<C extends CollectionName>(collection: C, id: string): Promise<CollectionMap[C] | null> {
    this.ensureAvailable();
    return this.tables[collection].findById(id);
  }

  async create<C extends CollectionName>(collection: C, record: NewRecord<C>): Promise<string> {
    this.ensureAvailable();
    return this.tables[collection].insert(record);
  }

  async describe(): Promise<StoreStatus> {
    const names = COLLECTION_NAMES.filter((name) => this.count(name) > 0);
    return {
      driver: 'memory',
      connected: this.available,
      databaseName: null,
      collections: this.available ? names : [],
    };
  }

  private ensureAvailable(): void {
    if (!this.available) {
      throw new StoreUnavailableError();
    }
  }
}
