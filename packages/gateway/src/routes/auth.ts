/**
 * Session authentication routes
 *
 * POST /login is public; /logout and /me run behind the session middleware.
 */

import { Hono } from 'hono';
import { AuthenticationError, unwrap } from '@gatehouse/core';
import type { GatewayDeps } from '../types/index.js';
import { SESSION_HEADER } from '../config/defaults.js';
import { loginSchema, validateBody } from '../middleware/validation.js';
import { login, logout } from '../services/auth-service.js';
import type { Session } from '../services/session-store.js';
import { envelopeResponse } from './helpers.js';

function sessionView(session: Session) {
  return {
    user_id: session.userId,
    username: session.username,
    expires_at: session.expiresAt.toISOString(),
  };
}

export function createAuthRoutes({ db, sessions }: Pick<GatewayDeps, 'db' | 'sessions'>) {
  const routes = new Hono();

  routes.post('/login', async (c) => {
    const credentials = validateBody(loginSchema, await c.req.json());
    const session = unwrap(await login(db, sessions, credentials));
    return envelopeResponse(c, { token: session.token, ...sessionView(session) });
  });

  routes.post('/logout', async (c) => {
    const token = c.req.header(SESSION_HEADER);
    const removed = token ? await logout(sessions, token) : false;
    return envelopeResponse(c, { logged_out: removed });
  });

  routes.get('/me', (c) => {
    const session = c.get('session');
    if (!session) {
      throw new AuthenticationError();
    }
    return envelopeResponse(c, sessionView(session));
  });

  return routes;
}
