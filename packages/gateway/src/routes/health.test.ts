/**
 * Health Routes Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { Hono } from 'hono';

vi.mock('@gatehouse/core', async (importOriginal) => {
  const actual = await importOriginal<Record<string, unknown>>();
  return { ...actual, VERSION: '1.0.0-test' };
});

import { createHealthRoutes } from './health.js';
import { requestContext } from '../middleware/request-context.js';
import { createFakeAdapter, type FakeAdapter } from '../test-helpers.js';

function createApp(db: FakeAdapter) {
  const app = new Hono();
  app.use('*', requestContext);
  app.route('/health', createHealthRoutes({ db }));
  return app;
}

describe('Health Routes', () => {
  describe('GET /health', () => {
    it('reports healthy with a passing database check', async () => {
      const db = createFakeAdapter();

      const res = await createApp(db).request('/health');

      expect(res.status).toBe(200);
      const json = await res.json();
      expect(json.pagination).toBeNull();
      expect(json.data.status).toBe('healthy');
      expect(json.data.version).toBe('1.0.0-test');
      expect(typeof json.data.uptime).toBe('number');
      expect(json.data.checks).toEqual([{ name: 'database', status: 'pass', message: 'POSTGRES connected' }]);
      expect(db.ping).toHaveBeenCalledTimes(1);
    });

    it('answers 503 with the failing check when ping fails', async () => {
      const db = createFakeAdapter();
      db.ping.mockResolvedValue(false);

      const res = await createApp(db).request('/health');

      expect(res.status).toBe(503);
      const json = await res.json();
      expect(json.success).toBe(false);
      expect(json.error).toEqual({
        code: 'SERVICE_UNAVAILABLE',
        message: 'Database not reachable',
        details: { checks: [{ name: 'database', status: 'fail', message: 'POSTGRES not reachable' }] },
      });
    });

    it('skips the ping when the adapter is not connected', async () => {
      const db = { ...createFakeAdapter(), isConnected: () => false };

      const res = await createApp(db).request('/health');

      expect(res.status).toBe(503);
      expect(db.ping).not.toHaveBeenCalled();
    });
  });

  describe('GET /health/live', () => {
    it('answers ok without touching the database', async () => {
      const db = createFakeAdapter();

      const res = await createApp(db).request('/health/live');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ data: { status: 'ok' }, pagination: null });
      expect(db.ping).not.toHaveBeenCalled();
    });
  });
});
