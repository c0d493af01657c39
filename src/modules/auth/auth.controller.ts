/**
 * =============================================================================
 * AUTH MODULE - CONTROLLER
 * =============================================================================
 *
 * Handles HTTP requests for authentication.
 * Controller only handles request/response - business logic is in service.
 * =============================================================================
 */

import { Request, Response } from 'express';
import { authService } from './auth.service';
import {
  loginSchema,
  refreshTokenSchema,
  registerSchema,
  resetPasswordSchema,
  sendOtpSchema,
  verifyOtpSchema
} from './auth.schema';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { currentUser } from '../../shared/middleware/auth.middleware';

class AuthController {
  register = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(registerSchema, req.body);
    const user = await authService.register(data.name, data.email, data.password);
    res.status(201).json(successResponse(user));
  });

  login = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(loginSchema, req.body);
    res.status(200).json(successResponse(await authService.login(data.email, data.password)));
  });

  /**
   * Send signup OTP
   */
  sendOtp = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(sendOtpSchema, req.body);
    res.status(200).json(successResponse(await authService.sendSignupOtp(data.email)));
  });

  /**
   * Verify signup OTP and return tokens
   */
  verifyOtp = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(verifyOtpSchema, req.body);
    res.status(200).json(successResponse(await authService.verifySignupOtp(data.email, data.code)));
  });

  sendPasswordResetOtp = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(sendOtpSchema, req.body);
    res.status(200).json(successResponse(await authService.sendPasswordResetOtp(data.email)));
  });

  checkPasswordResetOtp = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(verifyOtpSchema, req.body);
    res.status(200).json(successResponse(await authService.checkPasswordResetOtp(data.email, data.code)));
  });

  resetPassword = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(resetPasswordSchema, req.body);
    const result = await authService.resetPassword(data.email, data.code, data.new_password);
    res.status(200).json(successResponse(result));
  });

  /**
   * Refresh access token
   */
  refreshToken = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(refreshTokenSchema, req.body);
    res.status(200).json(successResponse(await authService.refresh(data.refresh)));
  });

  logout = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(refreshTokenSchema, req.body);
    const user = currentUser(req);
    res.status(200).json(successResponse(await authService.logout(user.userId, data.refresh)));
  });

  logoutAll = asyncHandler(async (req: Request, res: Response) => {
    const user = currentUser(req);
    res.status(200).json(successResponse(await authService.logoutAll(user.userId)));
  });

  /**
   * Get current user info
   */
  me = asyncHandler(async (req: Request, res: Response) => {
    const user = currentUser(req);
    res.status(200).json(successResponse(await authService.me(user.userId)));
  });
}

export const authController = new AuthController();
