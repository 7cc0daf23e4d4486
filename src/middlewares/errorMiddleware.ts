/**
 * errorMiddleware.ts - Fallbacks for unknown routes and errors no controller caught,
 * such as malformed JSON bodies rejected by express.json().
 */

import { NextFunction, Request, Response } from 'express';
import { AppError } from '../errors/appErrors';

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    message: 'Route not found',
    path: req.path,
    method: req.method,
  });
}

function hasHttpStatus(error: unknown): error is { status: number; message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof AppError) {
    res.status(error.statusCode).json({ message: error.message, code: error.code });
    return;
  }

  // body-parser errors carry their own 4xx status
  if (hasHttpStatus(error) && error.status >= 400 && error.status < 500) {
    res.status(error.status).json({ message: error.message });
    return;
  }

  console.error(`[HTTP] Unhandled error on ${req.method} ${req.path}:`, error);
  res.status(500).json({ message: 'Internal server error' });
}
