/**
 * matchController.ts - Matching endpoint and match history.
 */

import { Request, Response } from 'express';
import { computeMatches, listMatches } from '../services/matchService';
import type { AppDependencies } from '../types/dependencies';
import { matchesQuerySchema, matchRequestSchema } from '../validators/requestSchemas';
import { sendError, sendItems, sendValidationError } from './errorResponses';

// POST /api/match
export function postMatch({ store, random }: AppDependencies) {
  return async (req: Request, res: Response): Promise<void> => {
    const parsed = matchRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const result = await computeMatches(store, parsed.data.listingId, { random });

      if (result.status === 'degraded') {
        res.status(200).json({ matches: [], degraded: true });
        return;
      }

      res.status(200).json({ matches: result.matches });
    } catch (error) {
      sendError(res, error, 'postMatch');
    }
  };
}

// GET /api/matches?user_id=
export function getMatches({ store }: AppDependencies) {
  return async (req: Request, res: Response): Promise<void> => {
    const parsed = matchesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      sendItems(res, await listMatches(store, parsed.data.user_id));
    } catch (error) {
      sendError(res, error, 'getMatches');
    }
  };
}
