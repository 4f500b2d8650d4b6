/**
 * Request context middleware
 *
 * Tags each request with an id (echoed in X-Request-ID and in every error
 * body) and reports how long the handler chain took.
 */

import { createMiddleware } from 'hono/factory';
import { randomUUID } from 'node:crypto';
import { SLOW_REQUEST_MS } from '../config/defaults.js';
import { getLog } from '../services/log.js';

const log = getLog('Http');

// Caller-supplied ids: alphanumeric plus . _ : = - (up to 128 chars)
const VALID_REQUEST_ID = /^[a-zA-Z0-9._:=-]{1,128}$/;

export function resolveRequestId(header: string | undefined): string {
  return header && VALID_REQUEST_ID.test(header) ? header : randomUUID();
}

export const requestContext = createMiddleware(async (c, next) => {
  const id = resolveRequestId(c.req.header('X-Request-ID'));
  const start = performance.now();
  c.set('requestId', id);
  c.set('startTime', start);
  c.header('X-Request-ID', id);

  await next();

  const duration = performance.now() - start;
  c.header('X-Response-Time', `${duration.toFixed(2)}ms`);
  if (duration >= SLOW_REQUEST_MS) {
    log.warn(`[${id}] Slow request`, { method: c.req.method, path: c.req.path, ms: Math.round(duration) });
  }
});
