/**
 * matchSchema.ts - Donor/recipient pairings proposed by the matcher.
 * score, distanceKm and routeEtaMin are written once and never recomputed.
 */

import { HydratedDocument, InferSchemaType, Schema, model } from 'mongoose';
import { MATCH_STATUSES, MatchRecord, MatchStatus } from '../types/domain';

const matchSchema = new Schema({
  listingId: { type: String, required: true, index: true },
  donorId: { type: String, required: true, index: true },
  recipientId: { type: String, required: true, index: true },
  score: { type: Number, required: true, min: 0, max: 1, immutable: true },
  distanceKm: { type: Number, required: true, min: 0, immutable: true },
  routeEtaMin: { type: Number, required: true, min: 0, immutable: true },
  status: { type: String, enum: MATCH_STATUSES, default: 'proposed' }
}, {
  timestamps: true
});

matchSchema.index({ createdAt: -1 });

export const MatchModel = model('Match', matchSchema);

type MatchDocument = HydratedDocument<InferSchemaType<typeof matchSchema>>;

function toMatchStatus(value: string | null | undefined): MatchStatus {
  return MATCH_STATUSES.find((status) => status === value) ?? 'proposed';
}

export function toMatchRecord(doc: MatchDocument): MatchRecord {
  return {
    id: doc._id.toString(),
    listingId: doc.listingId,
    donorId: doc.donorId,
    recipientId: doc.recipientId,
    score: doc.score,
    distanceKm: doc.distanceKm,
    routeEtaMin: doc.routeEtaMin,
    status: toMatchStatus(doc.status),
    createdAt: doc.createdAt,
  };
}

export default matchSchema;
