/**
 * =============================================================================
 * OTP SERVICE TESTS
 * =============================================================================
 */

import { OtpService, isOtpValid, Mailer } from '../modules/auth/otp.service';
import type { MailMessage } from '../shared/services/mail.service';
import { MemoryStore } from '../shared/database/memory.store';
import type { OtpCode, User } from '../shared/database/entities';
import { createUser, installMemoryStore } from './support/fixtures';

jest.mock('../shared/services/logger.service', () => ({
  ...jest.requireActual('../shared/services/logger.service'),
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

class RecordingMailer implements Mailer {
  sent: MailMessage[] = [];
  failWith: Error | null = null;

  async send(message: MailMessage): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push(message);
  }
}

function otpRow(overrides: Partial<OtpCode> = {}): OtpCode {
  return {
    id: 1,
    userId: 1,
    code: '1234',
    purpose: 'signup',
    createdAt: new Date('2024-05-01T10:00:00Z'),
    expiresAt: new Date('2024-05-01T10:10:00Z'),
    attempts: 0,
    isUsed: false,
    ...overrides,
  };
}

describe('isOtpValid', () => {
  const now = new Date('2024-05-01T10:05:00Z');

  it('accepts an unused, unexpired code under the attempt limit', () => {
    expect(isOtpValid(otpRow(), now)).toBe(true);
  });

  it('rejects used, expired and exhausted codes', () => {
    expect(isOtpValid(otpRow({ isUsed: true }), now)).toBe(false);
    expect(isOtpValid(otpRow({ expiresAt: new Date('2024-05-01T10:04:59Z') }), now)).toBe(false);
    expect(isOtpValid(otpRow({ attempts: 5 }), now)).toBe(false);
  });

  it('still accepts a code at its exact expiry instant', () => {
    expect(isOtpValid(otpRow({ expiresAt: now }), now)).toBe(true);
  });
});

describe('OtpService', () => {
  let store: MemoryStore;
  let user: User;
  let mailer: RecordingMailer;
  let otpService: OtpService;

  beforeEach(async () => {
    store = installMemoryStore();
    user = await createUser(store);
    mailer = new RecordingMailer();
    otpService = new OtpService(mailer);
  });

  it('stores a 4-digit code and emails it', async () => {
    const { otp, delivered } = await otpService.issue(user, 'signup', 10);

    expect(delivered).toBe(true);
    expect(otp.code).toMatch(/^\d{4}$/);
    expect(mailer.sent).toEqual([
      {
        to: 'ana@example.com',
        subject: 'Your verification code',
        text: `Your OTP is ${otp.code}. It expires in 10 minutes.`,
      },
    ]);
  });

  it('keeps the code when the email cannot be delivered', async () => {
    mailer.failWith = new Error('smtp down');

    const { otp, delivered } = await otpService.issue(user, 'password_reset');

    expect(delivered).toBe(false);
    expect(store.tables.otps.map(row => row.id)).toEqual([otp.id]);
  });

  it('only honours the most recent code', async () => {
    const first = await otpService.issue(user, 'signup');
    const second = await otpService.issue(user, 'signup');
    // Codes are random; force them apart so the older one cannot match by chance
    store.tables.otps[0].code = second.otp.code === '0000' ? '1111' : '0000';

    await expect(otpService.verify(user, 'signup', store.tables.otps[0].code)).rejects.toMatchObject({
      code: 'OTP_MISMATCH',
    });
    await expect(otpService.verify(user, 'signup', second.otp.code)).resolves.toMatchObject({ id: second.otp.id });
    expect(store.tables.otps.find(row => row.id === first.otp.id)?.isUsed).toBe(false);
  });

  it('keeps signup and password reset codes apart', async () => {
    const { otp } = await otpService.issue(user, 'signup');

    await expect(otpService.check(user, 'password_reset', otp.code)).rejects.toMatchObject({
      code: 'OTP_NOT_FOUND',
      message: 'No active OTP. Please request a new one.',
    });
  });

  it('locks a code after the maximum number of attempts', async () => {
    const { otp } = await otpService.issue(user, 'signup');
    const wrong = otp.code === '0000' ? '1111' : '0000';

    for (let i = 0; i < 5; i++) {
      await expect(otpService.check(user, 'signup', wrong)).rejects.toMatchObject({ code: 'OTP_MISMATCH' });
    }

    await expect(otpService.check(user, 'signup', otp.code)).rejects.toMatchObject({
      code: 'OTP_EXPIRED',
      message: 'OTP expired or too many attempts.',
    });
    expect(store.tables.otps[0].attempts).toBe(6);
  });

  it('rejects an expired code', async () => {
    const { otp } = await otpService.issue(user, 'signup');
    store.tables.otps[0].expiresAt = new Date(Date.now() - 1000);

    await expect(otpService.verify(user, 'signup', otp.code)).rejects.toMatchObject({ code: 'OTP_EXPIRED' });
    expect(store.tables.otps[0].isUsed).toBe(false);
  });

  it('consumes a code only once', async () => {
    const { otp } = await otpService.issue(user, 'signup');
    const checked = await otpService.check(user, 'signup', otp.code);

    await otpService.consume(store.repos, checked);

    await expect(otpService.consume(store.repos, checked)).rejects.toMatchObject({ code: 'OTP_NOT_FOUND' });
  });
});
