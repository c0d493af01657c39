/**
 * =============================================================================
 * AUTH MODULE - ROUTES
 * =============================================================================
 *
 * Endpoints:
 * POST /auth/register                     - Create an account
 * POST /auth/login                        - Email + password login
 * POST /auth/send-otp                     - Send signup OTP
 * POST /auth/verify-otp                   - Verify signup OTP and get tokens
 * POST /auth/password/forgot/send-otp     - Send password reset OTP
 * POST /auth/password/forgot/verify       - Check reset OTP (not consumed)
 * POST /auth/password/forgot/reset        - Set new password, consume OTP
 * POST /auth/token/refresh                - New access token
 * POST /auth/logout                       - Revoke one refresh token
 * POST /auth/logout-all                   - Revoke every refresh token
 * GET  /auth/me                           - Current user
 * =============================================================================
 */

import { Router } from 'express';
import { authController } from './auth.controller';
import { otpRateLimiter, authRateLimiter } from '../../shared/middleware/rate-limiter.middleware';
import { authenticate } from '../../shared/middleware/auth.middleware';

const router = Router();

/**
 * @route   POST /api/v1/auth/register
 * @desc    Register with name, email and password
 * @access  Public
 */
router.post('/register', authRateLimiter, authController.register);

/**
 * @route   POST /api/v1/auth/login
 * @desc    Login and receive access/refresh tokens
 * @access  Public (rate limited)
 */
router.post('/login', authRateLimiter, authController.login);

/**
 * @route   POST /api/v1/auth/send-otp
 * @desc    Email a signup OTP
 * @access  Public (rate limited)
 */
router.post('/send-otp', otpRateLimiter, authController.sendOtp);

/**
 * @route   POST /api/v1/auth/verify-otp
 * @desc    Verify signup OTP and return tokens
 * @access  Public (rate limited)
 */
router.post('/verify-otp', otpRateLimiter, authController.verifyOtp);

/**
 * @route   POST /api/v1/auth/password/forgot/send-otp
 * @desc    Email a password reset OTP
 * @access  Public (rate limited)
 */
router.post('/password/forgot/send-otp', otpRateLimiter, authController.sendPasswordResetOtp);

/**
 * @route   POST /api/v1/auth/password/forgot/verify
 * @desc    Check a reset OTP without consuming it
 * @access  Public (rate limited)
 */
router.post('/password/forgot/verify', otpRateLimiter, authController.checkPasswordResetOtp);

/**
 * @route   POST /api/v1/auth/password/forgot/reset
 * @desc    Set a new password with a reset OTP
 * @access  Public (rate limited)
 */
router.post('/password/forgot/reset', otpRateLimiter, authController.resetPassword);

/**
 * @route   POST /api/v1/auth/token/refresh
 * @desc    Refresh access token using refresh token
 * @access  Public
 */
router.post('/token/refresh', authController.refreshToken);

/**
 * @route   POST /api/v1/auth/logout
 * @desc    Blacklist the given refresh token
 * @access  Private
 */
router.post('/logout', authenticate, authController.logout);

/**
 * @route   POST /api/v1/auth/logout-all
 * @desc    Invalidate every refresh token of the user
 * @access  Private
 */
router.post('/logout-all', authenticate, authController.logoutAll);

/**
 * @route   GET /api/v1/auth/me
 * @desc    Get current user info
 * @access  Private
 */
router.get('/me', authenticate, authController.me);

export { router as authRouter };
