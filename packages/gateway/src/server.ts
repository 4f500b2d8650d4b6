/**
 * HTTP Server entry point
 *
 * Loads settings from the environment, opens the PostgreSQL pool (creating
 * missing tables) and serves the API until SIGINT/SIGTERM.
 */

// .env is looked up in the monorepo root, the package, then the working directory
import { config } from 'dotenv';
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

const envPaths = [
  resolve(__dirname, '..', '..', '..', '.env'),
  resolve(__dirname, '..', '..', '.env'),
  resolve(process.cwd(), '.env'),
];

for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    config({ path: envPath });
    break;
  }
}

import { serve } from '@hono/node-server';
import { setLogService } from '@gatehouse/core';
import { createApp } from './app.js';
import { loadSettings } from './config/settings.js';
import { API_PREFIX, SESSION_CLEANUP_INTERVAL_MS } from './config/defaults.js';
import { closeAdapter, getDatabaseConfig, initializeAdapter } from './db/adapters/index.js';
import { createLogService } from './services/log-service-impl.js';
import { MemorySessionStore } from './services/session-store.js';
import { getLog } from './services/log.js';

const log = getLog('Server');

async function main(): Promise<void> {
  const settings = loadSettings();
  setLogService(
    createLogService({ level: settings.logLevel, json: process.env.NODE_ENV === 'production' })
  );

  const db = await initializeAdapter(getDatabaseConfig(settings));
  const sessions = new MemorySessionStore({
    ttlHours: settings.sessionTtlHours,
    cleanupIntervalMs: SESSION_CLEANUP_INTERVAL_MS,
  });

  const app = createApp({ db, settings, sessions });

  log.info('Starting gateway...', {
    port: settings.port,
    host: settings.host,
    baseUrl: settings.baseUrl,
    poolSize: settings.poolSize,
    sessionTtlHours: settings.sessionTtlHours,
  });

  const server = serve(
    {
      fetch: app.fetch,
      port: settings.port,
      hostname: settings.host,
    },
    (info) => {
      log.info(`Server running at http://${info.address}:${info.port}`);
      log.info(`Health: ${settings.baseUrl}${API_PREFIX}/${settings.routes.health}`);
    }
  );

  // ── Graceful Shutdown ─────────────────────────────────────────────────────
  let isShuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) return;
    isShuttingDown = true;

    log.info(`Received ${signal}, shutting down gracefully...`);

    // 1. Stop accepting new HTTP connections
    server.close();

    // 2. Stop the session cleanup timer
    sessions.dispose();

    // 3. Close DB connection pool
    try {
      await closeAdapter();
    } catch (e) {
      log.warn('DB close error', { error: String(e) });
    }

    log.info('Cleanup complete, exiting.');

    // Force exit after 5s if something hangs
    setTimeout(() => process.exit(0), 5000).unref();
  }

  const onSignal = (signal: string) => {
    gracefulShutdown(signal).catch((error: unknown) => {
      log.error('Shutdown failed', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  // ── Global Error Handlers ─────────────────────────────────────────────────
  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled Promise Rejection', { reason: String(reason) });
  });

  process.on('uncaughtException', (error) => {
    log.error('Uncaught Exception, shutting down', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException')
      .catch((shutdownError: unknown) => log.error('Shutdown failed', shutdownError))
      .finally(() => process.exit(1));
  });
}

// Run server
main().catch((err: unknown) => {
  log.error('Fatal: server startup failed', err);
  process.exit(1);
});
