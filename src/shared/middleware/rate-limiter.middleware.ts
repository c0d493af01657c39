/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Prevents abuse by limiting request rates.
 *
 * - Global limiter for every /api route (per IP)
 * - Login limiter (per IP)
 * - OTP limiter keyed by the email in the body, so one address cannot be
 *   flooded with codes and one code cannot be brute forced
 *
 * Counters live in express-rate-limit's built-in memory store; each
 * instance counts on its own.
 * =============================================================================
 */

import { Request } from 'express';
import rateLimit from 'express-rate-limit';
import { config } from '../../config/environment';
import { errorResponse } from '../types/api.types';
import { ErrorCode } from '../types/error.types';

const skipWhenDisabled = (): boolean => !config.security.enableRateLimiting;

/**
 * Default rate limiter for all routes
 */
export const rateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.maxRequests,
  message: errorResponse(ErrorCode.RATE_LIMIT_EXCEEDED, 'Too many requests. Please try again later.'),
  standardHeaders: true,
  legacyHeaders: false,
  skip: skipWhenDisabled
});

/**
 * Strict rate limiter for password login
 * 10 requests per 15 minutes per IP
 */
export const authRateLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  limit: 10,
  message: errorResponse('AUTH_RATE_LIMIT_EXCEEDED', 'Too many authentication attempts. Please try again in 15 minutes.'),
  standardHeaders: true,
  legacyHeaders: false,
  skip: skipWhenDisabled
});

/**
 * Key OTP buckets by email; fall back to the client IP
 */
export function otpKey(req: Request): string {
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'email' in body && typeof body.email === 'string') {
    return `otp:${body.email.trim().toLowerCase()}`;
  }
  return `otp:${req.ip ?? 'unknown'}`;
}

/**
 * OTP rate limiter
 * 5 requests per 2 minutes per email (send, verify and reset share it)
 */
export const otpRateLimiter = rateLimit({
  windowMs: 2 * 60 * 1000,
  limit: 5,
  keyGenerator: otpKey,
  message: errorResponse('OTP_RATE_LIMIT_EXCEEDED', 'Too many OTP attempts. Please try again in 2 minutes.'),
  standardHeaders: true,
  legacyHeaders: false,
  skip: skipWhenDisabled
});
