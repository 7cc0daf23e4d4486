/**
 * errorResponses.ts - Shared error and list response helpers for the controllers.
 */

import { Response } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../errors/appErrors';
import type { ItemsResult } from '../services/storeOutage';

export function sendValidationError(res: Response, error: ZodError): void {
  res.status(400).json({
    message: 'Invalid request',
    errors: error.flatten().fieldErrors,
  });
}

export function sendError(res: Response, error: unknown, handler: string): void {
  if (error instanceof AppError) {
    res.status(error.statusCode).json({ message: error.message, code: error.code });
    return;
  }

  console.error(`Error in ${handler}:`, error);
  res.status(500).json({ message: 'Internal server error' });
}

// Degraded reads still answer 200, flagged so clients can tell them from "no data".
export function sendItems<T>(res: Response, result: ItemsResult<T>): void {
  if (result.status === 'degraded') {
    res.status(200).json({ items: [], degraded: true });
    return;
  }
  res.status(200).json({ items: result.items });
}
