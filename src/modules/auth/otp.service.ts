/**
 * =============================================================================
 * AUTH MODULE - OTP SERVICE
 * =============================================================================
 *
 * Issues and validates 4-digit email OTPs bound to (user, purpose).
 *
 * RULES:
 * - Every send creates a new row; older rows are superseded by the
 *   "latest unused" lookup and kept for audit
 * - A code is valid while unused, unexpired and below the attempt limit
 * - Each failed check bumps `attempts`, including checks on an expired code
 * - A code is consumed at most once
 *
 * SECURITY:
 * - Codes come from crypto.randomInt and are compared in constant time
 * - Codes are never logged
 * =============================================================================
 */

import { config } from '../../config/environment';
import { getStore } from '../../shared/database/db';
import type { OtpCode, OtpPurpose, User } from '../../shared/database/entities';
import type { Repositories } from '../../shared/database/repository.interface';
import { logger, maskEmail } from '../../shared/services/logger.service';
import { mailService, MailMessage } from '../../shared/services/mail.service';
import { ErrorCode, ValidationError } from '../../shared/types/error.types';
import { generateOtpCode, secureCompare } from '../../shared/utils/crypto.utils';

export interface Mailer {
  send(message: MailMessage): Promise<void>;
}

export interface IssuedOtp {
  otp: OtpCode;
  /** False when the email could not be handed to any channel */
  delivered: boolean;
}

const OTP_EMAILS: Record<OtpPurpose, { subject: string; body: (code: string, minutes: number) => string }> = {
  signup: {
    subject: 'Your verification code',
    body: (code, minutes) => `Your OTP is ${code}. It expires in ${minutes} minutes.`
  },
  password_reset: {
    subject: 'Reset password code',
    body: (code, minutes) => `Your password reset OTP is ${code}. It expires in ${minutes} minutes.`
  }
};

export function isOtpValid(otp: OtpCode, now: Date = new Date()): boolean {
  return !otp.isUsed && now.getTime() <= otp.expiresAt.getTime() && otp.attempts < config.otp.maxAttempts;
}

export class OtpService {
  constructor(private readonly mailer: Mailer = mailService) {}

  /**
   * Create a fresh code and email it.
   * A delivery failure keeps the row and reports delivered=false.
   */
  async issue(
    user: User,
    purpose: OtpPurpose,
    validityMinutes: number = config.otp.expiryMinutes
  ): Promise<IssuedOtp> {
    const otp = await getStore().repos.otps.create({
      userId: user.id,
      code: generateOtpCode(4),
      purpose,
      expiresAt: new Date(Date.now() + validityMinutes * 60 * 1000)
    });

    logger.info('OTP issued', { userId: user.id, purpose, email: maskEmail(user.email) });

    const template = OTP_EMAILS[purpose];
    try {
      await this.mailer.send({
        to: user.email,
        subject: template.subject,
        text: template.body(otp.code, validityMinutes)
      });
      return { otp, delivered: true };
    } catch (error) {
      logger.error('OTP email not delivered', {
        userId: user.id,
        purpose,
        error: error instanceof Error ? error.message : String(error)
      });
      return { otp, delivered: false };
    }
  }

  /**
   * Validate and consume the latest code
   */
  async verify(user: User, purpose: OtpPurpose, code: string): Promise<OtpCode> {
    const otp = await this.check(user, purpose, code);
    await this.consume(getStore().repos, otp);
    logger.info('OTP verified', { userId: user.id, purpose });
    return otp;
  }

  /**
   * Validate the latest code without consuming it
   */
  async check(user: User, purpose: OtpPurpose, code: string): Promise<OtpCode> {
    const otps = getStore().repos.otps;
    const otp = await otps.findLatestUnused(user.id, purpose);

    if (!otp) {
      throw ValidationError.forField('code', 'No active OTP. Please request a new one.', ErrorCode.OTP_NOT_FOUND);
    }

    if (!isOtpValid(otp)) {
      await otps.incrementAttempts(otp.id);
      logger.warn('OTP rejected: expired or locked', { userId: user.id, purpose, attempts: otp.attempts + 1 });
      throw ValidationError.forField('code', 'OTP expired or too many attempts.', ErrorCode.OTP_EXPIRED);
    }

    if (!secureCompare(otp.code, code)) {
      await otps.incrementAttempts(otp.id);
      logger.warn('OTP rejected: mismatch', { userId: user.id, purpose, attempts: otp.attempts + 1 });
      throw ValidationError.forField('code', 'Incorrect OTP.', ErrorCode.OTP_MISMATCH);
    }

    return otp;
  }

  /**
   * Mark a checked code used. Losing a race to another consumer reads as
   * "no active OTP".
   */
  async consume(repos: Repositories, otp: OtpCode): Promise<void> {
    const marked = await repos.otps.markUsed(otp.id);
    if (!marked) {
      throw ValidationError.forField('code', 'No active OTP. Please request a new one.', ErrorCode.OTP_NOT_FOUND);
    }
  }
}

export const otpService = new OtpService();
