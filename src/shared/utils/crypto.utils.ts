/**
 * =============================================================================
 * CRYPTOGRAPHIC UTILITIES
 * =============================================================================
 *
 * Uses Node.js built-in crypto for all security-sensitive randomness.
 * Never Math.random() for codes.
 * =============================================================================
 */

import { randomInt, timingSafeEqual } from 'crypto';

/**
 * Generate a uniformly random numeric OTP, zero-padded to `length` digits
 *
 * @example
 * generateOtpCode();   // "0427"
 */
export function generateOtpCode(length: number = 4): string {
  if (length < 4 || length > 8) {
    throw new Error('OTP length must be between 4 and 8 digits');
  }
  return randomInt(0, 10 ** length).toString().padStart(length, '0');
}

/**
 * Constant-time string comparison
 */
export function secureCompare(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}
