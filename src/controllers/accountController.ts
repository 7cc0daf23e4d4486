/**
 * accountController.ts - Prototype registration and login endpoints.
 */

import { Request, Response } from 'express';
import { login, registerAccount } from '../services/accountService';
import type { AppDependencies } from '../types/dependencies';
import { loginSchema, registerSchema } from '../validators/requestSchemas';
import { sendError, sendValidationError } from './errorResponses';

// POST /api/register
export function register({ store }: AppDependencies) {
  return async (req: Request, res: Response): Promise<void> => {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const account = await registerAccount(store, parsed.data);
      res.status(201).json(account);
    } catch (error) {
      sendError(res, error, 'register');
    }
  };
}

// POST /api/login
export function loginHandler({ store }: AppDependencies) {
  return async (req: Request, res: Response): Promise<void> => {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const user = await login(store, parsed.data.email, parsed.data.password);
      res.status(200).json({ user });
    } catch (error) {
      sendError(res, error, 'login');
    }
  };
}
