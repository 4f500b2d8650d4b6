/**
 * Gateway types
 */

import type { DatabaseAdapter } from '../db/adapters/types.js';
import type { Settings } from '../config/settings.js';
import type { SessionStore } from '../services/session-store.js';

/**
 * API error structure
 */
export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Response metadata
 */
export interface ResponseMeta {
  requestId: string;
  timestamp: string;
}

/**
 * Body of every failed request. Successful requests return the bare
 * response envelope instead.
 */
export interface ApiErrorResponse {
  success: false;
  error: ApiError;
  meta: ResponseMeta;
}

/**
 * Health check result
 */
export interface HealthCheck {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message?: string;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime: number;
  checks: HealthCheck[];
}

/**
 * What the route factories need. Built once by the server and passed in,
 * so tests can hand in fakes.
 */
export interface GatewayDeps {
  db: DatabaseAdapter;
  settings: Settings;
  sessions: SessionStore;
}
