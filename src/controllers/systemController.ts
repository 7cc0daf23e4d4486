/**
 * systemController.ts - Service banner, store diagnostics and blog feed.
 */

import { Request, Response } from 'express';
import { listBlogPosts } from '../services/blogService';
import type { AppDependencies } from '../types/dependencies';
import { sendError, sendItems } from './errorResponses';

export const SERVICE_NAME = 'ConnectFood';

// GET /
export function getRoot(_req: Request, res: Response): void {
  res.status(200).json({ name: SERVICE_NAME, message: 'Backend running' });
}

// GET /test
export function getStoreStatus({ store }: AppDependencies) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const status = await store.describe();
      res.status(200).json({ backend: 'running', store: status });
    } catch (error) {
      console.error('[Store] Diagnostics failed:', error);
      res.status(200).json({
        backend: 'running',
        store: { connected: false, error: error instanceof Error ? error.message.slice(0, 120) : 'unknown' },
      });
    }
  };
}

// GET /api/blog
export function getBlog({ store }: AppDependencies) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      sendItems(res, await listBlogPosts(store));
    } catch (error) {
      sendError(res, error, 'getBlog');
    }
  };
}
