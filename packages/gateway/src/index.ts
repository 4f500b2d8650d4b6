/**
 * @gatehouse/gateway
 *
 * HTTP API and PostgreSQL data access for users, groups, permissions and
 * contents.
 */

export { createApp } from './app.js';
export * from './types/index.js';

// Configuration
export { loadSettings, linkConfigFor, type Settings, type RoutePaths, type CollectionName } from './config/settings.js';

// Database
export * from './db/adapters/index.js';
export { Transaction, type TransactionClient, type TransactionState } from './db/transaction.js';
export { SCHEMA_SQL, INDEXES_SQL, initializeSchema } from './db/schema.js';
export * from './db/repositories/index.js';

// Models
export * from './models/index.js';

// Services
export { login, logout, type Credentials, type LoginError } from './services/auth-service.js';
export {
  MemorySessionStore,
  type MemorySessionStoreOptions,
  type Session,
  type SessionData,
  type SessionStore,
} from './services/session-store.js';
export { hashPassword, verifyPassword } from './services/password.js';
export { LogService, createLogService, type LogServiceOptions } from './services/log-service-impl.js';
