/**
 * =============================================================================
 * AUTH MODULE - VALIDATION SCHEMAS
 * =============================================================================
 *
 * Zod schemas for validating auth requests.
 * Passwords are never trimmed.
 * =============================================================================
 */

import { z } from 'zod';
import { emailSchema, otpCodeSchema } from '../../shared/utils/validation.utils';

export const registerSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(150),
  email: emailSchema,
  password: z.string().min(1, 'Password is required').max(128)
});

export const loginSchema = z.object({
  email: emailSchema,
  password: z.string().min(1, 'Password is required')
});

export const sendOtpSchema = z.object({
  email: emailSchema
});

export const verifyOtpSchema = z.object({
  email: emailSchema,
  code: otpCodeSchema
});

export const resetPasswordSchema = z.object({
  email: emailSchema,
  code: otpCodeSchema,
  new_password: z.string().min(1, 'New password is required').max(128)
});

export const refreshTokenSchema = z.object({
  refresh: z.string().min(1, 'Refresh token is required')
});

export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type VerifyOtpInput = z.infer<typeof verifyOtpSchema>;
export type ResetPasswordInput = z.infer<typeof resetPasswordSchema>;
