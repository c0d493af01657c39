/**
 * =============================================================================
 * MAIL SERVICE
 * =============================================================================
 *
 * Outbound email through a configured channel.
 * Channels: Console (development), SMTP (nodemailer), Brevo transactional API
 *
 * EMAIL_MODE:
 *   console   - log only
 *   smtp      - SMTP first, one fallback attempt through the Brevo API
 *   brevo_api - Brevo API only
 *
 * SECURITY:
 * - Message bodies (which carry OTP codes) are never written to the logger
 * - Recipients are masked in logs
 * =============================================================================
 */

import nodemailer, { Transporter } from 'nodemailer';
import { config } from '../../config/environment';
import { logger, maskEmail } from './logger.service';
import { AppError, ErrorCode } from '../types/error.types';

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
}

export interface MailChannel {
  readonly name: string;
  send(message: MailMessage): Promise<void>;
}

/**
 * "FoodGo <no-reply@example.com>" -> { name: "FoodGo", email: "no-reply@example.com" }
 */
export function parseFromAddress(from: string): { name: string; email: string } {
  const match = from.match(/^\s*(.*?)\s*<([^>]+)>\s*$/);
  if (!match) return { name: '', email: from.trim() };
  return { name: match[1], email: match[2].trim() };
}

/**
 * Console channel (DEVELOPMENT ONLY)
 */
export class ConsoleChannel implements MailChannel {
  readonly name = 'console';

  async send(message: MailMessage): Promise<void> {
    if (!config.isTest) {
      console.log('\n===========================================');
      console.log('EMAIL (CONSOLE MODE)');
      console.log(`To:      ${message.to}`);
      console.log(`Subject: ${message.subject}`);
      console.log(message.text);
      console.log('===========================================\n');
    }
    logger.info('Email written to console', { to: maskEmail(message.to), subject: message.subject });
  }
}

/**
 * SMTP channel
 */
export class SmtpChannel implements MailChannel {
  readonly name = 'smtp';
  private transporter: Transporter | null = null;

  private getTransporter(): Transporter {
    if (!this.transporter) {
      const { host, port, user, pass } = config.email.smtp;
      if (!host) {
        throw new Error('SMTP_HOST is not configured');
      }
      this.transporter = nodemailer.createTransport({
        host,
        port,
        secure: port === 465,
        auth: user ? { user, pass } : undefined
      });
    }
    return this.transporter;
  }

  async send(message: MailMessage): Promise<void> {
    await this.getTransporter().sendMail({
      from: config.email.from,
      to: message.to,
      subject: message.subject,
      text: message.text
    });
  }
}

/**
 * Brevo transactional email API
 */
export class BrevoApiChannel implements MailChannel {
  readonly name = 'brevo_api';

  async send(message: MailMessage): Promise<void> {
    const { apiKey, apiUrl, timeoutMs } = config.email.brevo;
    if (!apiKey) {
      throw new Error('BREVO_API_KEY missing; cannot send via API');
    }

    const sender = parseFromAddress(config.email.from);
    const response = await fetch(apiUrl, {
      method: 'POST',
      headers: {
        'accept': 'application/json',
        'api-key': apiKey,
        'content-type': 'application/json'
      },
      body: JSON.stringify({
        sender: { email: sender.email, name: sender.name || 'FoodGo' },
        to: [{ email: message.to }],
        subject: message.subject,
        textContent: message.text
      }),
      signal: AbortSignal.timeout(timeoutMs)
    });

    if (!response.ok) {
      throw new Error(`Brevo API error: ${response.status}`);
    }
  }
}

/**
 * Mail service - primary channel with at most one fallback attempt
 */
export class MailService {
  constructor(
    private readonly primary: MailChannel,
    private readonly fallback: MailChannel | null = null
  ) {}

  get channels(): string[] {
    return this.fallback ? [this.primary.name, this.fallback.name] : [this.primary.name];
  }

  async send(message: MailMessage): Promise<void> {
    const subject = `${config.email.subjectPrefix}${message.subject}`;
    const outgoing: MailMessage = { ...message, subject };

    try {
      await this.primary.send(outgoing);
      logger.info('Email sent', { channel: this.primary.name, to: maskEmail(message.to) });
      return;
    } catch (error) {
      logger.warn('Email delivery failed', {
        channel: this.primary.name,
        to: maskEmail(message.to),
        error: error instanceof Error ? error.message : String(error)
      });
    }

    const fallback = this.fallback;
    if (!fallback) {
      throw new AppError(503, ErrorCode.MAIL_DELIVERY_FAILED, 'Email delivery failed');
    }

    try {
      await fallback.send(outgoing);
      logger.info('Email sent via fallback', { channel: fallback.name, to: maskEmail(message.to) });
    } catch (error) {
      logger.error('Email fallback failed', {
        channel: fallback.name,
        to: maskEmail(message.to),
        error: error instanceof Error ? error.message : String(error)
      });
      throw new AppError(503, ErrorCode.MAIL_DELIVERY_FAILED, 'Email delivery failed');
    }
  }
}

export function createMailService(): MailService {
  switch (config.email.mode) {
    case 'smtp':
      return new MailService(new SmtpChannel(), new BrevoApiChannel());
    case 'brevo_api':
      return new MailService(new BrevoApiChannel());
    default:
      return new MailService(new ConsoleChannel());
  }
}

export const mailService = createMailService();
