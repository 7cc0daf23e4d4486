/**
 * accountRoutes.ts - Prototype registration and login.
 */

import { Router } from 'express';
import { loginHandler, register } from '../controllers/accountController';
import type { AppDependencies } from '../types/dependencies';

export function createAccountRoutes(deps: AppDependencies): Router {
  const router = Router();

  router.post('/register', register(deps));
  router.post('/login', loginHandler(deps));

  return router;
}
