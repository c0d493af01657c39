/**
 * =============================================================================
 * AUTH MIDDLEWARE
 * =============================================================================
 *
 * Bearer access-token authentication and the staff guard for catalog writes.
 *
 * SECURITY:
 * - Token signature and expiry are verified on every request
 * - Claims are schema-checked before they reach a controller
 * - No trust by default
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../../config/environment';
import { AppError, AuthenticationError, AuthorizationError, ErrorCode } from '../types/error.types';
import { logger } from '../services/logger.service';

export interface AuthUser {
  userId: number;
  email: string;
  isStaff: boolean;
}

/**
 * Extended Request type with user info
 */
declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

export const accessClaimsSchema = z.object({
  userId: z.number().int().positive(),
  email: z.string(),
  isStaff: z.boolean(),
  type: z.literal('access')
});

/**
 * Verify an access token and return its claims
 */
export function verifyAccessToken(token: string): AuthUser {
  const decoded = jwt.verify(token, config.jwt.secret);
  const claims = accessClaimsSchema.safeParse(decoded);
  if (!claims.success) {
    throw new AuthenticationError('Invalid token', ErrorCode.INVALID_TOKEN);
  }
  return {
    userId: claims.data.userId,
    email: claims.data.email,
    isStaff: claims.data.isStaff
  };
}

/**
 * Auth middleware - validates the bearer access token
 * Must be applied to all protected routes
 */
export function authenticate(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw new AuthenticationError();
    }

    req.user = verifyAccessToken(authHeader.substring(7));
    next();
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      next(new AuthenticationError('Token has expired', ErrorCode.TOKEN_EXPIRED));
    } else if (error instanceof jwt.JsonWebTokenError) {
      next(new AuthenticationError('Invalid token', ErrorCode.INVALID_TOKEN));
    } else if (error instanceof AppError) {
      next(error);
    } else {
      logger.error('Auth middleware error', { error: error instanceof Error ? error.message : String(error) });
      next(new AuthenticationError('Authentication failed'));
    }
  }
}

/**
 * Staff guard - restricts catalog writes to staff accounts
 * Must be used after authenticate
 */
export function staffGuard(req: Request, _res: Response, next: NextFunction): void {
  if (!req.user) {
    next(new AuthenticationError());
    return;
  }

  if (!req.user.isStaff) {
    logger.warn('Access denied - staff only', {
      userId: req.user.userId,
      path: req.path
    });
    next(new AuthorizationError('Staff access required'));
    return;
  }

  next();
}

/**
 * Authenticated user of a request that passed `authenticate`
 */
export function currentUser(req: Request): AuthUser {
  if (!req.user) {
    throw new AuthenticationError();
  }
  return req.user;
}
