/**
 * messageService.ts - Message storage for a match conversation.
 */

import type { RecordStore } from '../store/recordStore';
import type { MessageRecord } from '../types/domain';
import { type ItemsResult, listOrDegrade } from './storeOutage';

export const MESSAGE_HISTORY_LIMIT = 200;

export interface NewMessage {
  matchId: string;
  senderId: string;
  content: string;
}

export async function sendMessage(store: RecordStore, message: NewMessage): Promise<string> {
  return store.create('message', {
    matchId: message.matchId,
    senderId: message.senderId,
    content: message.content.trim(),
  });
}

/** Oldest first, capped at MESSAGE_HISTORY_LIMIT. */
export async function listMessages(store: RecordStore, matchId: string): Promise<ItemsResult<MessageRecord>> {
  return listOrDegrade(store, 'Message', async () => {
    const messages = await store.fetchAll('message', { matchId });
    return messages
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, MESSAGE_HISTORY_LIMIT);
  });
}
