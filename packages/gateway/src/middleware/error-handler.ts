/**
 * Global error handler middleware
 *
 * Route handlers throw; this turns the error into the standard error body.
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ValidationError, isAppError } from '@gatehouse/core';
import type { ApiError, ApiErrorResponse } from '../types/index.js';
import { ERROR_CODES } from '../routes/error-codes.js';
import { getLog } from '../services/log.js';

const log = getLog('ErrorHandler');

/**
 * Map HTTP status to error code
 */
function statusToErrorCode(status: number): string {
  switch (status) {
    case 400:
      return ERROR_CODES.BAD_REQUEST;
    case 401:
      return ERROR_CODES.UNAUTHORIZED;
    case 403:
      return ERROR_CODES.FORBIDDEN;
    case 404:
      return ERROR_CODES.NOT_FOUND;
    case 413:
      return ERROR_CODES.PAYLOAD_TOO_LARGE;
    case 503:
      return ERROR_CODES.SERVICE_UNAVAILABLE;
    default:
      return ERROR_CODES.INTERNAL_ERROR;
  }
}

/** Status codes an AppError can carry */
function toResponseStatus(status: number): ContentfulStatusCode {
  switch (status) {
    case 400:
    case 401:
    case 403:
    case 404:
    case 409:
    case 413:
    case 503:
      return status;
    default:
      return 500;
  }
}

function errorBody(c: Context, error: ApiError): ApiErrorResponse {
  return {
    success: false,
    error,
    meta: {
      requestId: c.get('requestId') ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };
}

/**
 * Global error handler
 */
export function errorHandler(err: Error, c: Context): Response {
  const requestId = c.get('requestId') ?? 'unknown';

  if (isAppError(err)) {
    const status = toResponseStatus(err.statusCode);
    if (status >= 500) {
      log.error(`[${requestId}] ${err.code}`, err);
    }
    const details = err instanceof ValidationError && err.errors ? { errors: err.errors } : undefined;
    return c.json(errorBody(c, { code: err.code, message: err.message, details }), status);
  }

  // Handle HTTP exceptions (from Hono)
  if (err instanceof HTTPException) {
    return c.json(errorBody(c, { code: statusToErrorCode(err.status), message: err.message }), err.status);
  }

  // Handle JSON parse errors (malformed request body)
  if (err instanceof SyntaxError && err.message.includes('JSON')) {
    return c.json(errorBody(c, { code: ERROR_CODES.BAD_REQUEST, message: 'Invalid JSON in request body' }), 400);
  }

  log.error(`[${requestId}] Unexpected error:`, err);

  return c.json(
    errorBody(c, {
      code: ERROR_CODES.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
      // Only expose the message in development, never stack traces
      details: process.env.NODE_ENV === 'development' ? { message: err.message } : undefined,
    }),
    500
  );
}

/**
 * Not found handler
 */
export function notFoundHandler(c: Context): Response {
  return c.json(
    errorBody(c, {
      code: ERROR_CODES.NOT_FOUND,
      message: `Route not found: ${c.req.method} ${c.req.path.replace(/[^\w/.\-~%]/g, '')}`,
    }),
    404
  );
}
