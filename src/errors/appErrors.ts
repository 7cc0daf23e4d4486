/**
 * appErrors.ts - Typed errors that controllers translate into HTTP status codes.
 */

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string) {
    super(message, 401, 'UNAUTHORIZED');
  }
}

// Raised by a store that cannot reach its backend; pipelines turn it into a degraded result.
export class StoreUnavailableError extends AppError {
  constructor(message = 'Record store unavailable') {
    super(message, 503, 'STORE_UNAVAILABLE');
  }
}
