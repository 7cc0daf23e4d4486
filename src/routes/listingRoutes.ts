/**
 * listingRoutes.ts - Listing creation and nearby search.
 */

import { Router } from 'express';
import { getNearbyListings, postListing } from '../controllers/listingController';
import type { AppDependencies } from '../types/dependencies';

export function createListingRoutes(deps: AppDependencies): Router {
  const router = Router();

  router.post('/listings', postListing(deps));
  router.get('/listings', getNearbyListings(deps));

  return router;
}
