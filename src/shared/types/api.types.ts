/**
 * =============================================================================
 * API TYPES - SHARED CONTRACTS
 * =============================================================================
 *
 * Response envelope shared by every route.
 * Payload field names are part of the mobile app contract; change them
 * only together with a new API version.
 * =============================================================================
 */

/**
 * Standard API response wrapper
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

/**
 * API error structure
 */
export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Helper to create success response
 */
export function successResponse<T>(data: T): ApiResponse<T> {
  return {
    success: true,
    data
  };
}

/**
 * Helper to create error response
 */
export function errorResponse(code: string, message: string, details?: Record<string, unknown>): ApiResponse {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details && { details })
    }
  };
}
