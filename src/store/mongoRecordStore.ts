/**
 * mongoRecordStore.ts - RecordStore backed by MongoDB through the mongoose models.
 */

import mongoose from 'mongoose';
import { ConflictError, StoreUnavailableError } from '../errors/appErrors';
import { AccountModel, toAccountRecord } from '../models/accountSchema';
import { BlogModel, toBlogRecord } from '../models/blogSchema';
import { ListingModel, toListingRecord } from '../models/listingSchema';
import { MatchModel, toMatchRecord } from '../models/matchSchema';
import { MessageModel, toMessageRecord } from '../models/messageSchema';
import type { CollectionMap, CollectionName, NewRecord, RecordFilter } from '../types/domain';
import type { CollectionAdapters, RecordStore, StoreStatus } from './recordStore';

const CONNECTED = 1;
const DUPLICATE_KEY = 11000;

export function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY;
}

/**
 * Resolves to the new document's id. A unique index violation (two writers racing
 * past the service's own existence check) becomes a ConflictError.
 */
export async function insertDocument(
  create: () => Promise<{ _id: mongoose.Types.ObjectId }>,
  conflictMessage: string
): Promise<string> {
  try {
    return (await create())._id.toString();
  } catch (error) {
    if (isDuplicateKeyError(error)) {
      throw new ConflictError(conflictMessage);
    }
    throw error;
  }
}

function isObjectId(id: string): boolean {
  return mongoose.Types.ObjectId.isValid(id);
}

const adapters: CollectionAdapters = {
  account: {
    // password is select: false, login needs it
    find: async (filter = {}) => (await AccountModel.find(filter).select('+password')).map(toAccountRecord),
    findById: async (id) => {
      if (!isObjectId(id)) return null;
      const doc = await AccountModel.findById(id);
      return doc ? toAccountRecord(doc) : null;
    },
    insert: (fields) => insertDocument(() => AccountModel.create(fields), 'Email already registered'),
  },
  listing: {
    find: async (filter = {}) => (await ListingModel.find(filter)).map(toListingRecord),
    findById: async (id) => {
      if (!isObjectId(id)) return null;
      const doc = await ListingModel.findById(id);
      return doc ? toListingRecord(doc) : null;
    },
    insert: (fields) => insertDocument(() => ListingModel.create(fields), 'Listing already exists'),
  },
  match: {
    find: async (filter = {}) => (await MatchModel.find(filter)).map(toMatchRecord),
    findById: async (id) => {
      if (!isObjectId(id)) return null;
      const doc = await MatchModel.findById(id);
      return doc ? toMatchRecord(doc) : null;
    },
    insert: (fields) => insertDocument(() => MatchModel.create(fields), 'Match already exists'),
  },
  message: {
    find: async (filter = {}) => (await MessageModel.find(filter)).map(toMessageRecord),
    findById: async (id) => {
      if (!isObjectId(id)) return null;
      const doc = await MessageModel.findById(id);
      return doc ? toMessageRecord(doc) : null;
    },
    insert: (fields) => insertDocument(() => MessageModel.create(fields), 'Message already exists'),
  },
  blog: {
    find: async (filter = {}) => (await BlogModel.find(filter)).map(toBlogRecord),
    findById: async (id) => {
      if (!isObjectId(id)) return null;
      const doc = await BlogModel.findById(id);
      return doc ? toBlogRecord(doc) : null;
    },
    insert: (fields) => insertDocument(() => BlogModel.create(fields), 'Blog post already exists'),
  },
};

export class MongoRecordStore implements RecordStore {
  constructor(private readonly connection: mongoose.Connection = mongoose.connection) {}

  isAvailable(): boolean {
    return this.connection.readyState === CONNECTED;
  }

  async fetchAll<C extends CollectionName>(collection: C, filter?: RecordFilter<C>): Promise<CollectionMap[C][]> {
    this.ensureAvailable();
    return adapters[collection].find(filter);
  }

  async fetchById<C extends CollectionName>(collection: C, id: string): Promise<CollectionMap[C] | null> {
    this.ensureAvailable();
    return adapters[collection].findById(id);
  }

  async create<C extends CollectionName>(collection: C, record: NewRecord<C>): Promise<string> {
    this.ensureAvailable();
    return adapters[collection].insert(record);
  }

  async describe(): Promise<StoreStatus> {
    const connected = this.isAvailable();
    const collections = connected && this.connection.db
      ? (await this.connection.db.listCollections().toArray()).map((info) => info.name)
      : [];

    return {
      driver: 'mongo',
      connected,
      databaseName: connected ? this.connection.name : null,
      collections,
    };
  }

  // Without this check mongoose would buffer the operation until its own timeout.
  private ensureAvailable(): void {
    if (!this.isAvailable()) {
      throw new StoreUnavailableError('MongoDB connection is not open');
    }
  }
}
