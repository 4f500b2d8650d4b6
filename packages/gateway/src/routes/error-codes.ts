/**
 * Standardized Error Codes
 *
 * Codes for failures raised by the HTTP layer itself. Data-access and
 * authentication failures carry the code of their AppError class.
 */

export const ERROR_CODES = {
  // 400
  BAD_REQUEST: 'BAD_REQUEST',
  INVALID_INPUT: 'INVALID_INPUT',
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // 401 / 403
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',

  // 404
  NOT_FOUND: 'NOT_FOUND',

  // 413
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',

  // 503
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',

  // 500
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
