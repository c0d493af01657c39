/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - No secrets are logged or exposed in error messages
 * - Production requires proper JWT secrets (validated at startup)
 * - Development uses auto-generated secrets if not provided
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getRequired() for mandatory production values
 * - Use getOptional() for values with sensible defaults
 * =============================================================================
 */

import dotenv from 'dotenv';
import { randomBytes } from 'crypto';

dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get required environment variable (throws if missing in production)
 */
function getRequired(key: string, devDefault?: string): string {
  const value = process.env[key];

  if (value && value.trim() !== '') {
    return value;
  }

  if (process.env.NODE_ENV !== 'production') {
    if (devDefault) {
      console.warn(`⚠️  [CONFIG] ${key} not set, using development default`);
      return devDefault;
    }
    const generated = randomBytes(32).toString('hex');
    console.warn(`⚠️  [CONFIG] ${key} not set, auto-generated for development`);
    return generated;
  }

  throw new Error(
    `❌ FATAL: ${key} is required in production!\n` +
    `   Set it in your environment variables or .env file.`
  );
}

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

export type DbDriver = 'postgres' | 'memory';
export type EmailMode = 'console' | 'smtp' | 'brevo_api';

function parseDbDriver(value: string): DbDriver {
  return value === 'memory' ? 'memory' : 'postgres';
}

function parseEmailMode(value: string): EmailMode {
  const mode = value.toLowerCase();
  if (mode === 'smtp' || mode === 'brevo_api') return mode;
  return 'console';
}

const nodeEnv = getOptional('NODE_ENV', 'development');

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', '0.0.0.0'),

  // Database
  database: {
    driver: parseDbDriver(getOptional('DB_DRIVER', 'postgres')),
    url: getOptional('DATABASE_URL', 'postgresql://localhost:5432/foodgo'),
    poolMax: getNumber('DB_POOL_MAX', 10),
  },

  // JWT - SECURITY CRITICAL
  jwt: {
    secret: getRequired('JWT_SECRET'),
    expiresIn: getOptional('JWT_EXPIRES_IN', '15m'),
    refreshSecret: getRequired('JWT_REFRESH_SECRET'),
    refreshExpiresIn: getOptional('JWT_REFRESH_EXPIRES_IN', '7d'),
  },

  // OTP
  otp: {
    expiryMinutes: getNumber('OTP_EXPIRY_MINUTES', 10),
    maxAttempts: getNumber('OTP_MAX_ATTEMPTS', 5),
  },

  // Email delivery
  // Options: console (dev), smtp (falls back to brevo_api), brevo_api
  email: {
    mode: parseEmailMode(getOptional('EMAIL_MODE', 'console')),
    from: getOptional('DEFAULT_FROM_EMAIL', 'FoodGo <no-reply@example.com>'),
    subjectPrefix: getOptional('EMAIL_SUBJECT_PREFIX', '[FoodGo] '),
    smtp: {
      host: getOptional('SMTP_HOST', ''),
      port: getNumber('SMTP_PORT', 587),
      user: getOptional('SMTP_USER', ''),
      pass: getOptional('SMTP_PASS', ''),
    },
    brevo: {
      apiKey: getOptional('BREVO_API_KEY', ''),
      apiUrl: getOptional('BREVO_API_URL', 'https://api.brevo.com/v3/smtp/email'),
      timeoutMs: getNumber('BREVO_TIMEOUT_MS', 12000),
    },
  },

  // Image references are stored as URLs or paths relative to this base
  media: {
    baseUrl: getOptional('MEDIA_BASE_URL', ''),
  },

  // Rate Limiting
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000),
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 300),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'debug'),

  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Staff account created by the seed script
  admin: {
    email: getOptional('ADMIN_EMAIL', ''),
    password: getOptional('ADMIN_PASSWORD', ''),
  },

  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',

  security: {
    enableHeaders: getBoolean('ENABLE_SECURITY_HEADERS', true),
    enableRateLimiting: getBoolean('ENABLE_RATE_LIMITING', true),
    enableRequestLogging: getBoolean('ENABLE_REQUEST_LOGGING', true),
    bcryptRounds: getNumber('BCRYPT_ROUNDS', 10),
  },
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if critical config is missing
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.isProduction) {
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }

    if (config.database.driver === 'memory') {
      errors.push('DB_DRIVER=memory is not allowed in production');
    }

    if (config.email.mode === 'console') {
      warnings.push('EMAIL_MODE is "console" - OTP emails will only be logged');
    }
  }

  if (config.email.mode === 'smtp' && !config.email.smtp.host) {
    errors.push('EMAIL_MODE=smtp requires SMTP_HOST');
  }

  if (config.email.mode === 'brevo_api' && !config.email.brevo.apiKey) {
    errors.push('EMAIL_MODE=brevo_api requires BREVO_API_KEY');
  }

  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

validateConfig();
