/**
 * =============================================================================
 * AUTH MODULE - SERVICE
 * =============================================================================
 *
 * Email + password accounts, signup OTP verification, password reset by
 * OTP, and JWT sessions.
 *
 * SECURITY FEATURES:
 * - Passwords hashed with bcryptjs; strength checked on register and reset
 * - Login failures share one message so emails cannot be probed
 * - OTP checks bump the attempt counter outside any transaction, so a
 *   failed guess is never rolled back
 * =============================================================================
 */

import { getStore } from '../../shared/database/db';
import type { User } from '../../shared/database/entities';
import { logger, maskEmail } from '../../shared/services/logger.service';
import { AuthenticationError, ConflictError, ErrorCode } from '../../shared/types/error.types';
import { assertStrongPassword, hashPassword, verifyPassword } from '../../shared/utils/password.utils';
import { userService } from '../user/user.service';
import { toUserPayload, UserPayload } from './auth.mapper';
import { otpService } from './otp.service';
import { TokenPair, tokenService } from './token.service';

export interface Session extends TokenPair {
  user: UserPayload;
}

export interface OtpSent {
  message: string;
  delivered: boolean;
}

class AuthService {
  /**
   * Create an account
   */
  async register(name: string, email: string, password: string): Promise<UserPayload> {
    const users = getStore().repos.users;

    if (await users.findByEmail(email)) {
      throw new ConflictError('Email is already registered.', ErrorCode.EMAIL_TAKEN);
    }

    assertStrongPassword(password, { email, name });

    const user = await users.create({
      email,
      fullName: name,
      passwordHash: await hashPassword(password)
    });
    if (!user) {
      throw new ConflictError('Email is already registered.', ErrorCode.EMAIL_TAKEN);
    }

    logger.info('User registered', { userId: user.id, email: maskEmail(email) });
    return toUserPayload(user);
  }

  async login(email: string, password: string): Promise<Session> {
    const user = await getStore().repos.users.findByEmail(email);

    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      logger.warn('Login rejected', { email: maskEmail(email) });
      throw new AuthenticationError('Invalid email or password.', ErrorCode.INVALID_CREDENTIALS);
    }

    if (!user.isActive) {
      throw new AuthenticationError('Account disabled.', ErrorCode.ACCOUNT_DISABLED);
    }

    logger.info('User logged in', { userId: user.id });
    return this.session(user);
  }

  // ==========================================================================
  // SIGNUP OTP
  // ==========================================================================

  async sendSignupOtp(email: string): Promise<OtpSent> {
    const user = await userService.requireForForm(email);
    const { delivered } = await otpService.issue(user, 'signup');
    return { message: 'OTP sent.', delivered };
  }

  async verifySignupOtp(email: string, code: string): Promise<Session & { message: string; email: string }> {
    const user = await userService.requireForForm(email);
    await otpService.verify(user, 'signup', code);
    return { message: 'OTP verified', email: user.email, ...this.session(user) };
  }

  // ==========================================================================
  // PASSWORD RESET
  // ==========================================================================

  async sendPasswordResetOtp(email: string): Promise<OtpSent> {
    const user = await userService.requireForForm(email);
    const { delivered } = await otpService.issue(user, 'password_reset');
    return { message: 'OTP sent.', delivered };
  }

  /**
   * Confirms the code is currently valid without consuming it
   */
  async checkPasswordResetOtp(email: string, code: string): Promise<{ message: string; email: string }> {
    const user = await userService.requireForForm(email);
    await otpService.check(user, 'password_reset', code);
    return { message: 'OTP verified', email: user.email };
  }

  async resetPassword(email: string, code: string, newPassword: string): Promise<{ message: string }> {
    const user = await userService.requireForForm(email);
    assertStrongPassword(newPassword, { email: user.email, name: user.fullName }, 'new_password');

    const otp = await otpService.check(user, 'password_reset', code);
    const passwordHash = await hashPassword(newPassword);

    await getStore().transaction(async repos => {
      await otpService.consume(repos, otp);
      await repos.users.update(user.id, { passwordHash });
    });

    logger.info('Password reset', { userId: user.id });
    return { message: 'Password updated successfully' };
  }

  // ==========================================================================
  // SESSIONS
  // ==========================================================================

  async refresh(refreshToken: string): Promise<{ access: string }> {
    return tokenService.refresh(refreshToken);
  }

  async logout(userId: number, refreshToken: string): Promise<{ message: string }> {
    await tokenService.revoke(refreshToken, userId);
    return { message: 'Logged out' };
  }

  async logoutAll(userId: number): Promise<{ message: string }> {
    await tokenService.revokeAll(userId);
    return { message: 'Logged out from all devices' };
  }

  async me(userId: number): Promise<UserPayload> {
    return toUserPayload(await userService.getById(userId));
  }

  private session(user: User): Session {
    return { ...tokenService.issuePair(user), user: toUserPayload(user) };
  }
}

export const authService = new AuthService();
