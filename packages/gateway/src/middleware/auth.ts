/**
 * Session authentication middleware
 *
 * Resolves the X-Session-Token header against the session store and puts
 * the session on `c.var.session`.
 */

import { createMiddleware } from 'hono/factory';
import { AuthenticationError } from '@gatehouse/core';
import { SESSION_HEADER } from '../config/defaults.js';
import type { SessionStore } from '../services/session-store.js';

export interface SessionMiddlewareOptions {
  /** Paths that pass through without a session */
  isPublic?: (path: string) => boolean;
}

/**
 * Create session middleware
 */
export function createSessionMiddleware(sessions: SessionStore, options: SessionMiddlewareOptions = {}) {
  return createMiddleware(async (c, next) => {
    if (options.isPublic?.(c.req.path)) {
      return next();
    }

    const token = c.req.header(SESSION_HEADER);
    if (!token) {
      throw new AuthenticationError('Session token required');
    }

    const session = await sessions.get(token);
    if (!session) {
      throw new AuthenticationError('Invalid or expired session');
    }

    c.set('session', session);
    return next();
  });
}
