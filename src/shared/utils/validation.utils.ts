/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared validation schemas and utilities.
 * Used across all modules for consistent validation.
 * =============================================================================
 */

import { z } from 'zod';
import { ValidationError } from '../types/error.types';

// ============================================================
// COMMON SCHEMAS
// ============================================================

/**
 * Email schema - trimmed and lower-cased so lookups are case-insensitive
 */
export const emailSchema = z.string()
  .trim()
  .toLowerCase()
  .pipe(z.string().email('Enter a valid email address').max(254));

/**
 * Numeric route/body id (accepts "12" from params and 12 from JSON)
 */
export const idSchema = z.coerce.number().int().positive();

export const latitudeSchema = z.coerce.number().min(-90).max(90);
export const longitudeSchema = z.coerce.number().min(-180).max(180);

/**
 * Money - a number or a decimal string with at most 2 decimals, never negative.
 * Output is the canonical "12.50" string stored in numeric(10,2) columns.
 */
export const moneySchema = z.union([z.number(), z.string().trim()])
  .transform(value => (typeof value === 'number' ? value.toString() : value))
  .refine(value => /^\d{1,8}(\.\d{1,2})?$/.test(value), {
    message: 'Must be a non-negative amount with at most 2 decimals'
  })
  .transform(value => Number(value).toFixed(2));

/**
 * Query-string boolean: true/1/yes are truthy, anything else is false
 */
export const queryBooleanSchema = z.string()
  .transform(value => ['true', '1', 'yes'].includes(value.trim().toLowerCase()));

/**
 * 4-digit OTP code
 */
export const otpCodeSchema = z.string().trim().regex(/^\d{4}$/, 'OTP must be 4 digits');

// ============================================================
// VALIDATION HELPERS
// ============================================================

/**
 * Convert a ZodError into field errors
 */
export function toFieldErrors(error: z.ZodError): { field: string; message: string }[] {
  return error.errors.map(e => ({
    field: e.path.join('.'),
    message: e.message
  }));
}

/**
 * Synchronous schema validation - validates data and returns parsed result
 * Throws ValidationError on validation failure
 */
export function validateSchema<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError('Invalid request data', toFieldErrors(result.error));
  }
  return result.data;
}
