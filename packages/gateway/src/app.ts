/**
 * Hono application setup
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';

import type { GatewayDeps } from './types/index.js';
import type { Session } from './services/session-store.js';
import type { PaginationParams } from './middleware/pagination.js';
import {
  requestContext,
  createSessionMiddleware,
  errorHandler,
  notFoundHandler,
} from './middleware/index.js';
import {
  createHealthRoutes,
  createAuthRoutes,
  createUserGroupRoutes,
  createUserRoutes,
  createPermissionRoutes,
  createGroupPermissionRoutes,
  createUserPermissionRoutes,
  createContentRoutes,
} from './routes/index.js';
import { apiError, ERROR_CODES } from './routes/helpers.js';
import { API_PREFIX, BODY_SIZE_LIMIT_BYTES } from './config/defaults.js';
import { getLog } from './services/log.js';

const log = getLog('Http');

/**
 * Create the Hono application
 */
export function createApp(deps: GatewayDeps): Hono {
  const { routes } = deps.settings;
  const app = new Hono();

  // Security headers
  app.use(
    '*',
    secureHeaders({
      strictTransportSecurity: 'max-age=63072000; includeSubDomains; preload',
    })
  );

  app.use(
    `${API_PREFIX}/*`,
    bodyLimit({
      maxSize: BODY_SIZE_LIMIT_BYTES,
      onError: (c) =>
        apiError(
          c,
          {
            code: ERROR_CODES.PAYLOAD_TOO_LARGE,
            message: `Request body exceeds ${Math.round(BODY_SIZE_LIMIT_BYTES / 1024 / 1024)} MB limit`,
          },
          413
        ),
    })
  );

  app.use('*', requestContext);

  // Logger (skip in test environment)
  if (process.env.NODE_ENV !== 'test') {
    app.use('*', logger((message) => log.info(message)));
  }

  // Every API route needs a session except login and health
  const publicPaths = new Set([`${API_PREFIX}/${routes.auth}/login`, `${API_PREFIX}/${routes.health}`]);
  app.use(
    `${API_PREFIX}/*`,
    createSessionMiddleware(deps.sessions, {
      isPublic: (path) => publicPaths.has(path.replace(/\/+$/, '')) || path.startsWith(`${API_PREFIX}/${routes.health}/`),
    })
  );

  app.route(`${API_PREFIX}/${routes.health}`, createHealthRoutes(deps));
  app.route(`${API_PREFIX}/${routes.auth}`, createAuthRoutes(deps));
  app.route(`${API_PREFIX}/${routes.userGroups}`, createUserGroupRoutes(deps));
  app.route(`${API_PREFIX}/${routes.users}`, createUserRoutes(deps));
  app.route(`${API_PREFIX}/${routes.permissions}`, createPermissionRoutes(deps));
  app.route(`${API_PREFIX}/${routes.groupPermissions}`, createGroupPermissionRoutes(deps));
  app.route(`${API_PREFIX}/${routes.userPermissions}`, createUserPermissionRoutes(deps));
  app.route(`${API_PREFIX}/${routes.contents}`, createContentRoutes(deps));

  // Error handling
  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  return app;
}

/**
 * Export types for Hono context
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    startTime: number;
    session?: Session;
    pagination?: PaginationParams;
  }
}
