/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * Logs every finished request with its status and duration.
 *
 * SECURITY:
 * - Does not log request bodies (may contain passwords and OTP codes)
 * - Does not log authorization headers
 * - Masks sensitive query parameters and customer emails
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger, maskEmail } from '../services/logger.service';

const SENSITIVE_PARAMS = ['token', 'key', 'secret', 'password', 'code'];

/**
 * Secrets become [MASKED]; ?email= keeps its domain only
 */
export function maskQueryParams(query: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(query)) {
    const name = key.toLowerCase();
    if (SENSITIVE_PARAMS.some(param => name.includes(param))) {
      masked[key] = '[MASKED]';
    } else if (name === 'email' && typeof value === 'string') {
      masked[key] = maskEmail(value);
    } else {
      masked[key] = value;
    }
  }

  return masked;
}

/**
 * Request logger middleware
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const logData = {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration: `${duration}ms`,
      requestId: req.headers['x-request-id'],
      userId: req.user?.userId,
      ...(Object.keys(req.query).length > 0 && {
        query: maskQueryParams(req.query)
      })
    };

    if (res.statusCode >= 500) {
      logger.error('Request failed', logData);
    } else if (res.statusCode >= 400) {
      logger.warn('Request error', logData);
    } else {
      logger.info('Request completed', logData);
    }
  });

  next();
}
