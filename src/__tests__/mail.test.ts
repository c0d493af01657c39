/**
 * =============================================================================
 * MAIL SERVICE TESTS
 * =============================================================================
 *
 * Primary channel first, then at most one fallback attempt.
 * =============================================================================
 */

import { MailChannel, MailMessage, MailService, parseFromAddress } from '../shared/services/mail.service';

jest.mock('../shared/services/logger.service', () => ({
  ...jest.requireActual('../shared/services/logger.service'),
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

class StubChannel implements MailChannel {
  readonly sent: MailMessage[] = [];

  constructor(readonly name: string, private readonly failure: Error | null = null) {}

  async send(message: MailMessage): Promise<void> {
    if (this.failure) throw this.failure;
    this.sent.push(message);
  }
}

const message: MailMessage = { to: 'ana@example.com', subject: 'Hello', text: 'Body' };

describe('MailService', () => {
  it('prefixes the subject and sends through the primary channel', async () => {
    const primary = new StubChannel('primary');
    const fallback = new StubChannel('fallback');

    await new MailService(primary, fallback).send(message);

    expect(primary.sent).toEqual([{ to: 'ana@example.com', subject: '[Test] Hello', text: 'Body' }]);
    expect(fallback.sent).toEqual([]);
  });

  it('falls back once when the primary channel fails', async () => {
    const primary = new StubChannel('primary', new Error('connection refused'));
    const fallback = new StubChannel('fallback');

    await new MailService(primary, fallback).send(message);

    expect(fallback.sent).toHaveLength(1);
  });

  it('surfaces a failure after the fallback also fails', async () => {
    const primary = new StubChannel('primary', new Error('connection refused'));
    const fallback = new StubChannel('fallback', new Error('HTTP 500'));
    const sendFallback = jest.spyOn(fallback, 'send');

    await expect(new MailService(primary, fallback).send(message)).rejects.toMatchObject({
      statusCode: 503,
      code: 'MAIL_DELIVERY_FAILED',
    });
    expect(sendFallback).toHaveBeenCalledTimes(1);
  });

  it('fails straight away without a fallback', async () => {
    const primary = new StubChannel('primary', new Error('connection refused'));

    await expect(new MailService(primary).send(message)).rejects.toMatchObject({ code: 'MAIL_DELIVERY_FAILED' });
  });

  it('names its channels in order', () => {
    expect(new MailService(new StubChannel('smtp'), new StubChannel('brevo_api')).channels).toEqual(['smtp', 'brevo_api']);
  });
});

describe('parseFromAddress', () => {
  it('splits a display name from the address', () => {
    expect(parseFromAddress('FoodGo <no-reply@example.com>')).toEqual({ name: 'FoodGo', email: 'no-reply@example.com' });
  });

  it('accepts a bare address', () => {
    expect(parseFromAddress('no-reply@example.com')).toEqual({ name: '', email: 'no-reply@example.com' });
  });
});
