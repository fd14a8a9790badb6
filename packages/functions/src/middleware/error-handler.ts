import type { Request, Response, NextFunction } from 'express';
import { error as logError, warn } from 'firebase-functions/logger';
import { ZodError } from 'zod';
import type { ApiError } from '../shared.js';
import { AppError } from '../types/errors.js';

// Re-export error classes so handler imports stay in one place
export { AppError, NotFoundError, ConflictError, UnprocessableError } from '../types/errors.js';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Handle Zod validation errors
  if (err instanceof ZodError) {
    warn('request:validation_failed', { path: req.path, issues: err.errors.length });
    const response: ApiError = {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: err.errors,
      },
    };
    res.status(400).json(response);
    return;
  }

  // Handle known application errors
  if (err instanceof AppError) {
    warn('request:app_error', { path: req.path, code: err.code, status: err.statusCode });
    const response: ApiError = {
      success: false,
      error: {
        code: err.code,
        message: err.message,
        details: err.details,
      },
    };
    res.status(err.statusCode).json(response);
    return;
  }

  logError('request:unhandled_error', { path: req.path, name: err.name, message: err.message });

  // Firestore constraint-like errors
  if (err.message.includes('already exists')) {
    const response: ApiError = {
      success: false,
      error: {
        code: 'CONFLICT',
        message: 'A record with this value already exists',
      },
    };
    res.status(409).json(response);
    return;
  }

  const response: ApiError = {
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  };
  res.status(500).json(response);
}
