/**
 * listingController.ts - Listing creation and the nearby search endpoint.
 */

import { Request, Response } from 'express';
import { createListing } from '../services/listingService';
import { searchNearbyListings } from '../services/listingSearchService';
import type { AppDependencies } from '../types/dependencies';
import { createListingSchema, nearbyQuerySchema } from '../validators/requestSchemas';
import { sendError, sendValidationError } from './errorResponses';

// POST /api/listings
export function postListing({ store, now }: AppDependencies) {
  return async (req: Request, res: Response): Promise<void> => {
    const parsed = createListingSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const id = await createListing(store, parsed.data, now());
      res.status(201).json({ id });
    } catch (error) {
      sendError(res, error, 'postListing');
    }
  };
}

// GET /api/listings?lat=&lng=&radius_km=
export function getNearbyListings({ store, now }: AppDependencies) {
  return async (req: Request, res: Response): Promise<void> => {
    const parsed = nearbyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const result = await searchNearbyListings(store, {
        origin: { lat: parsed.data.lat, lng: parsed.data.lng },
        radiusKm: parsed.data.radius_km,
        now: now(),
      });

      if (result.status === 'degraded') {
        res.status(200).json({ count: 0, items: [], degraded: true });
        return;
      }

      res.status(200).json({ count: result.count, items: result.items });
    } catch (error) {
      sendError(res, error, 'getNearbyListings');
    }
  };
}
