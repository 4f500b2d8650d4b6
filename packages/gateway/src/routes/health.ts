/**
 * Health check routes
 */

import { Hono } from 'hono';
import { VERSION } from '@gatehouse/core';
import type { GatewayDeps, HealthCheck, HealthStatus } from '../types/index.js';
import { apiError, envelopeResponse, ERROR_CODES } from './helpers.js';

export function createHealthRoutes({ db }: Pick<GatewayDeps, 'db'>) {
  const routes = new Hono();
  const startTime = Date.now();

  /**
   * Basic health check with a database round trip. Answers 503 when the
   * database does not respond.
   */
  routes.get('/', async (c) => {
    const reachable = db.isConnected() && (await db.ping());
    const checks: HealthCheck[] = [
      {
        name: 'database',
        status: reachable ? 'pass' : 'fail',
        message: reachable ? `${db.type.toUpperCase()} connected` : `${db.type.toUpperCase()} not reachable`,
      },
    ];

    if (!reachable) {
      return apiError(c, { code: ERROR_CODES.SERVICE_UNAVAILABLE, message: 'Database not reachable', details: { checks } }, 503);
    }

    const status: HealthStatus = {
      status: 'healthy',
      version: VERSION,
      uptime: (Date.now() - startTime) / 1000,
      checks,
    };
    return envelopeResponse(c, status);
  });

  /**
   * Liveness probe, no dependencies checked
   */
  routes.get('/live', (c) => envelopeResponse(c, { status: 'ok' }));

  return routes;
}
