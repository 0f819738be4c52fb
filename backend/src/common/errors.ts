/**
 * Application Errors
 *
 * Thrown from services, mapped to `{ ok: false, error, message }`
 * by the global error handler in app.ts.
 */

export class AppError extends Error {
  statusCode: number;
  code: string;

  constructor(statusCode: number, code: string, message: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

/** Bad request input: hyperparameters, split ratio, CSV columns. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, 'CONFLICT', message);
    this.name = 'ConflictError';
  }
}

/** Numeric failure: empty arrays, non-finite values, shape mismatch. */
export class ComputationError extends AppError {
  constructor(message: string) {
    super(422, 'COMPUTATION_ERROR', message);
    this.name = 'ComputationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
