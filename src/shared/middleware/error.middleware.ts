/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Internal error messages are hidden in production
 * - Unexpected errors are logged server-side with their stack
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';
import { AppError, ErrorCode } from '../types/error.types';
import { errorResponse } from '../types/api.types';
import { config } from '../../config/environment';

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (error instanceof AppError) {
    // Operational errors are expected; the request logger records the status
    if (error.statusCode >= 500) {
      logger.error('Request error', {
        code: error.code,
        error: error.message,
        path: req.path,
        method: req.method,
        userId: req.user?.userId ?? 'anonymous'
      });
    }
    res.status(error.statusCode).json(errorResponse(error.code, error.message, error.details));
    return;
  }

  // Malformed JSON bodies arrive from express.json() as SyntaxError with a status
  if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
    res.status(400).json(errorResponse(ErrorCode.VALIDATION_ERROR, 'Malformed JSON body'));
    return;
  }

  logger.error('Unhandled request error', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method,
    ip: req.ip,
    userId: req.user?.userId ?? 'anonymous'
  });

  // SECURITY: Never expose internal error details to client
  res.status(500).json(errorResponse(
    ErrorCode.INTERNAL_ERROR,
    config.isProduction
      ? 'An unexpected error occurred. Please try again later.'
      : error.message
  ));
}

/**
 * Async route wrapper to catch async errors
 * Use this to wrap async route handlers
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(errorResponse(ErrorCode.NOT_FOUND, `Cannot ${req.method} ${req.path}`));
}
