/**
 * =============================================================================
 * LOGGER SERVICE
 * =============================================================================
 *
 * Winston logger shared by the API, the scripts and the mail channels.
 *
 * SECURITY:
 * - Tokens, passwords, secrets and OTP values are redacted wherever they
 *   appear in metadata, nested objects and arrays included
 * - Customer emails are masked ("ja****@example.com") under any `email` key
 * - Silent under NODE_ENV=test; file transports in production only
 * =============================================================================
 */

import winston from 'winston';
import { config } from '../../config/environment';

// Keys matched case-insensitively as substrings: "refreshToken", "new_password"...
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'access',
  'refresh',
  'secret',
  'apikey',
  'api_key',
  'authorization',
  'otp',
];

// Keys holding a customer address
const EMAIL_FIELDS = ['email', 'to', 'recipient'];

/**
 * Mask an email for logs: "jane.doe@example.com" -> "ja****@example.com".
 * Masking an already masked value returns it unchanged.
 */
export function maskEmail(email: string): string {
  const at = email.indexOf('@');
  if (at <= 0) return '****';
  return `${email.slice(0, Math.min(2, at))}****${email.slice(at)}`;
}

function isSensitiveKey(key: string): boolean {
  const name = key.toLowerCase();
  return SENSITIVE_FIELDS.some(field => name.includes(field));
}

function sanitizeValue(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) return value.message;
  if (Array.isArray(value)) return value.map(sanitizeValue);
  if (typeof value === 'object' && value !== null) {
    return sanitizeLogData({ ...value });
  }
  return value;
}

/**
 * Copy of `data` that is safe to write to a log line
 */
export function sanitizeLogData(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (isSensitiveKey(key)) {
      sanitized[key] = '[REDACTED]';
    } else if (EMAIL_FIELDS.includes(key.toLowerCase()) && typeof value === 'string') {
      sanitized[key] = maskEmail(value);
    } else {
      sanitized[key] = sanitizeValue(value);
    }
  }

  return sanitized;
}

// "2026-10-18 09:30:00 [INFO]: Order created {"orderId":7}"
const lineFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
    let line = `${timestamp} [${level.toUpperCase()}]: ${message}`;

    const safeMeta = sanitizeLogData(meta);
    if (Object.keys(safeMeta).length > 0) {
      line += ` ${JSON.stringify(safeMeta)}`;
    }

    if (stack) {
      line += `\n${stack}`;
    }
    return line;
  })
);

const FILE_ROTATION = { maxsize: 5 * 1024 * 1024, maxFiles: 5 };

export const logger = winston.createLogger({
  level: config.logLevel,
  format: lineFormat,
  transports: [
    new winston.transports.Console({
      silent: config.isTest,
      format: winston.format.combine(winston.format.colorize(), lineFormat)
    }),

    ...(config.isProduction ? [
      new winston.transports.File({ filename: 'logs/error.log', level: 'error', ...FILE_ROTATION }),
      new winston.transports.File({ filename: 'logs/combined.log', ...FILE_ROTATION })
    ] : [])
  ]
});

/**
 * Error-level line for a caught value of unknown type (script and process handlers)
 */
export const logError = (message: string, error?: unknown) => {
  if (error instanceof Error) {
    logger.error(message, { error: error.message, stack: error.stack });
  } else {
    logger.error(message, { error: String(error) });
  }
};
