/**
 * Route Helpers
 *
 * Shared utilities for Hono route handlers. Handlers throw AppErrors
 * and let the global error handler build the failure body; these helpers
 * cover the success side and request parsing.
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import {
  NotFoundError,
  ValidationError,
  createEnvelope,
  mapEnvelope,
  type Pagination,
  type ResponseEnvelope,
} from '@gatehouse/core';
import { uuidSchema } from '../middleware/validation.js';
import { ERROR_CODES, type ErrorCode } from './error-codes.js';
import type { ApiErrorResponse } from '../types/index.js';

// Re-export error codes for convenience
export { ERROR_CODES, type ErrorCode };

/**
 * Respond with a response envelope. Single entities and bulk results go
 * out with `pagination: null`.
 */
export function envelopeResponse<T>(
  c: Context,
  data: T,
  pagination: Pagination | null = null,
  status?: ContentfulStatusCode
) {
  const envelope: ResponseEnvelope<T> = createEnvelope(data, pagination);
  return status ? c.json(envelope, status) : c.json(envelope);
}

/**
 * Respond with one list page, projecting each row to its wire shape.
 */
export function pageResponse<R, T>(c: Context, page: ResponseEnvelope<R[]>, project: (row: R) => T) {
  return c.json(mapEnvelope(page, (rows) => rows.map(project)));
}

/** Error body for handlers that answer without throwing */
export function apiError(
  c: Context,
  error: { code: ErrorCode | string; message: string; details?: Record<string, unknown> },
  status: ContentfulStatusCode = 400
) {
  const response: ApiErrorResponse = {
    success: false,
    error,
    meta: {
      requestId: c.get('requestId') ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };
  return c.json(response, status);
}

/**
 * Path parameter that must be a UUID.
 */
export function uuidParam(c: Context, name: string): string {
  const value = c.req.param(name);
  const parsed = uuidSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`${name} must be a UUID`, { field: name });
  }
  return parsed.data;
}

/**
 * Optional query parameter that must be a UUID when present.
 */
export function optionalUuidQuery(c: Context, name: string): string | undefined {
  const value = c.req.query(name);
  if (value === undefined || value === '') return undefined;
  const parsed = uuidSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`${name} must be a UUID`, { field: name });
  }
  return parsed.data;
}

/**
 * Unwrap a lookup that returned null when nothing matched.
 */
export function found<T>(value: T | null, resource: string, id: string): T {
  if (value === null) {
    throw new NotFoundError(resource, id);
  }
  return value;
}
