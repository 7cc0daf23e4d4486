/**
 * matchRoutes.ts - Recipient matching for a listing and match history.
 */

import { Router } from 'express';
import { getMatches, postMatch } from '../controllers/matchController';
import type { AppDependencies } from '../types/dependencies';

export function createMatchRoutes(deps: AppDependencies): Router {
  const router = Router();

  router.post('/match', postMatch(deps));
  router.get('/matches', getMatches(deps));

  return router;
}
