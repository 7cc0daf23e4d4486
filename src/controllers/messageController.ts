/**
 * messageController.ts - Messages between the parties of a match.
 */

import { Request, Response } from 'express';
import { listMessages, sendMessage } from '../services/messageService';
import type { AppDependencies } from '../types/dependencies';
import { messagesQuerySchema, sendMessageSchema } from '../validators/requestSchemas';
import { sendError, sendItems, sendValidationError } from './errorResponses';

// POST /api/message
export function postMessage({ store }: AppDependencies) {
  return async (req: Request, res: Response): Promise<void> => {
    const parsed = sendMessageSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const id = await sendMessage(store, parsed.data);
      res.status(201).json({ id });
    } catch (error) {
      sendError(res, error, 'postMessage');
    }
  };
}

// GET /api/messages?match_id=
export function getMessages({ store }: AppDependencies) {
  return async (req: Request, res: Response): Promise<void> => {
    const parsed = messagesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      sendItems(res, await listMessages(store, parsed.data.match_id));
    } catch (error) {
      sendError(res, error, 'getMessages');
    }
  };
}
