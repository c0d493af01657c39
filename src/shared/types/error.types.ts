/**
 * =============================================================================
 * ERROR TYPES
 * =============================================================================
 *
 * Custom error classes for consistent error handling.
 * All operational errors should use AppError.
 * =============================================================================
 */

/**
 * Application Error class
 * Use this for all known/expected errors
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;
  public readonly isOperational: boolean = true;

  constructor(
    statusCode: number,
    code: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface FieldError {
  field: string;
  message: string;
}

/**
 * Validation Error - 400
 */
export class ValidationError extends AppError {
  constructor(message: string, fields: FieldError[] = [], code: string = ErrorCode.VALIDATION_ERROR) {
    super(400, code, message, fields.length > 0 ? { fields } : undefined);
  }

  static forField(field: string, message: string, code?: string): ValidationError {
    return new ValidationError(message, [{ field, message }], code);
  }
}

/**
 * Authentication Error - 401
 */
export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required', code: string = ErrorCode.UNAUTHORIZED) {
    super(401, code, message);
  }
}

/**
 * Authorization Error - 403
 */
export class AuthorizationError extends AppError {
  constructor(message: string = 'Permission denied') {
    super(403, 'FORBIDDEN', message);
  }
}

/**
 * Not Found Error - 404
 */
export class NotFoundError extends AppError {
  constructor(resource: string, code: string = ErrorCode.NOT_FOUND, details?: Record<string, unknown>) {
    super(404, code, `${resource} not found`, details);
  }
}

/**
 * Conflict Error - 409
 */
export class ConflictError extends AppError {
  constructor(message: string, code: string = ErrorCode.CONFLICT, details?: Record<string, unknown>) {
    super(409, code, message, details);
  }
}

/**
 * Error codes enum for consistent error identification
 */
export enum ErrorCode {
  // Auth errors
  UNAUTHORIZED = 'UNAUTHORIZED',
  EMAIL_TAKEN = 'EMAIL_TAKEN',
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',
  ACCOUNT_DISABLED = 'ACCOUNT_DISABLED',
  WEAK_PASSWORD = 'WEAK_PASSWORD',
  INVALID_TOKEN = 'INVALID_TOKEN',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  TOKEN_REVOKED = 'TOKEN_REVOKED',

  // OTP errors
  OTP_NOT_FOUND = 'OTP_NOT_FOUND',
  OTP_EXPIRED = 'OTP_EXPIRED',
  OTP_MISMATCH = 'OTP_MISMATCH',

  // Lookup errors
  USER_NOT_FOUND = 'USER_NOT_FOUND',
  ADDRESS_NOT_FOUND = 'ADDRESS_NOT_FOUND',
  NO_LOCATION = 'NO_LOCATION',
  CATEGORY_NOT_FOUND = 'CATEGORY_NOT_FOUND',
  RESTAURANT_NOT_FOUND = 'RESTAURANT_NOT_FOUND',
  PRODUCT_NOT_FOUND = 'PRODUCT_NOT_FOUND',

  // Cart / checkout / payment errors
  CART_ITEM_NOT_FOUND = 'CART_ITEM_NOT_FOUND',
  CART_EMPTY = 'CART_EMPTY',
  ORDER_NOT_FOUND = 'ORDER_NOT_FOUND',
  ORDER_NOT_PENDING = 'ORDER_NOT_PENDING',
  PAYMENT_NOT_FOUND = 'PAYMENT_NOT_FOUND',

  // Delivery
  MAIL_DELIVERY_FAILED = 'MAIL_DELIVERY_FAILED',

  // General errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFLICT = 'CONFLICT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED'
}
