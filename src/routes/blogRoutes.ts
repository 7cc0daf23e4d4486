/**
 * blogRoutes.ts - Blog feed.
 */

import { Router } from 'express';
import { getBlog } from '../controllers/systemController';
import type { AppDependencies } from '../types/dependencies';

export function createBlogRoutes(deps: AppDependencies): Router {
  const router = Router();

  router.get('/blog', getBlog(deps));

  return router;
}
