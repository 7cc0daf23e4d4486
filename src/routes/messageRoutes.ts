/**
 * messageRoutes.ts - Messages attached to a match.
 */

import { Router } from 'express';
import { getMessages, postMessage } from '../controllers/messageController';
import type { AppDependencies } from '../types/dependencies';

export function createMessageRoutes(deps: AppDependencies): Router {
  const router = Router();

  router.post('/message', postMessage(deps));
  router.get('/messages', getMessages(deps));

  return router;
}
