/**
 * messageSchema.ts - Messages exchanged between the parties of a match.
 */

import { HydratedDocument, InferSchemaType, Schema, model } from 'mongoose';
import { MessageRecord } from '../types/domain';

const messageSchema = new Schema({
  matchId: { type: String, required: true, index: true },
  senderId: { type: String, required: true, index: true },
  content: { type: String, required: true, maxlength: 1000, trim: true }
}, {
  timestamps: true
});

messageSchema.index({ matchId: 1, createdAt: 1 });

export const MessageModel = model('Message', messageSchema);

type MessageDocument = HydratedDocument<InferSchemaType<typeof messageSchema>>;

export function toMessageRecord(doc: MessageDocument): MessageRecord {
  return {
    id: doc._id.toString(),
    matchId: doc.matchId,
    senderId: doc.senderId,
    content: doc.content,
    createdAt: doc.createdAt,
  };
}

export default messageSchema;
