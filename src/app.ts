/**
 * app.ts - Express application: CORS, JSON body parsing and the REST routes.
 * Kept apart from index.ts so tests can mount it without opening a port.
 */

import cors from 'cors';
import express, { Express } from 'express';
import { createOriginValidator } from './config/cors';
import { getRoot, getStoreStatus } from './controllers/systemController';
import { errorHandler, notFoundHandler } from './middlewares/errorMiddleware';
import { createAccountRoutes } from './routes/accountRoutes';
import { createBlogRoutes } from './routes/blogRoutes';
import { createListingRoutes } from './routes/listingRoutes';
import { createMatchRoutes } from './routes/matchRoutes';
import { createMessageRoutes } from './routes/messageRoutes';
import type { AppDependencies } from './types/dependencies';

export interface HttpOptions {
  allowedOrigins: string[];
  production: boolean;
}

export function createApp(deps: AppDependencies, options: HttpOptions): Express {
  const app = express();

  if (options.production) {
    app.set('trust proxy', true);
  }

  app.use(cors({
    origin: createOriginValidator(options.allowedOrigins, options.production),
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));
  app.use(express.json());

  app.get('/', getRoot);
  app.get('/test', getStoreStatus(deps));

  app.use('/api', createAccountRoutes(deps));
  app.use('/api', createListingRoutes(deps));
  app.use('/api', createMatchRoutes(deps));
  app.use('/api', createMessageRoutes(deps));
  app.use('/api', createBlogRoutes(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
