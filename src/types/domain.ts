/**
 * domain.ts - Record shapes shared by the store, the pipelines and the controllers.
 */

export interface Coordinate {
  lat: number;
  lng: number;
}

export const LISTING_STATUSES = ['available', 'claimed', 'completed', 'expired'] as const;
export type ListingStatus = (typeof LISTING_STATUSES)[number];

export const ROLES = ['donor', 'recipient'] as const;
export type Role = (typeof ROLES)[number];

export const MATCH_STATUSES = ['proposed', 'accepted', 'rejected', 'in_transit', 'delivered'] as const;
export type MatchStatus = (typeof MATCH_STATUSES)[number];

export interface AccountRecord {
  id: string;
  name: string;
  email: string;
  password: string;
  role: Role;
  phone: string | null;
  lat: number | null;
  lng: number | null;
  isActive: boolean;
  // Category the recipient would rather receive; null means no preference.
  preferredType: string | null;
  createdAt: Date;
}

export interface ListingRecord {
  id: string;
  donorId: string;
  title: string;
  description: string | null;
  type: string;
  quantity: number;
  unit: string;
  lat: number;
  lng: number;
  expiresAt: Date | null;
  status: ListingStatus;
  createdAt: Date;
}

export interface MatchRecord {
  id: string;
  listingId: string;
  donorId: string;
  recipientId: string;
  score: number;
  distanceKm: number;
  routeEtaMin: number;
  status: MatchStatus;
  createdAt: Date;
}

export interface MessageRecord {
  id: string;
  matchId: string;
  senderId: string;
  content: string;
  createdAt: Date;
}

export interface BlogRecord {
  id: string;
  title: string;
  excerpt: string | null;
  body: string;
  tags: string[];
  createdAt: Date;
}

export interface CollectionMap {
  account: AccountRecord;
  listing: ListingRecord;
  match: MatchRecord;
  message: MessageRecord;
  blog: BlogRecord;
}

export type CollectionName = keyof CollectionMap;

export const COLLECTION_NAMES: readonly CollectionName[] = ['account', 'listing', 'match', 'message', 'blog'];

// What callers hand to the store; the store assigns id and createdAt.
export type NewRecord<C extends CollectionName> = Omit<CollectionMap[C], 'id' | 'createdAt'>;

export type RecordFilter<C extends CollectionName> = Partial<NewRecord<C>>;
