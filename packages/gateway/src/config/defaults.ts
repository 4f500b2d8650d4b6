/**
 * Gateway Default Configuration
 *
 * Named constants for all tunable infrastructure values.
 * Import these instead of using inline magic numbers.
 *
 * Override via environment variables where noted.
 */

// ============================================================================
// Server
// ============================================================================

/** HTTP port (override: PORT) */
export const DEFAULT_PORT = 8000;

/** Bind address (override: HOST) */
export const DEFAULT_HOST = '127.0.0.1';

/** Prefix every API collection is mounted under */
export const API_PREFIX = '/api';

/** Maximum accepted request body (bytes) */
export const BODY_SIZE_LIMIT_BYTES = 1024 * 1024; // 1 MB

/** Requests slower than this are logged as a warning (ms) */
export const SLOW_REQUEST_MS = 1_000;

// ============================================================================
// Database
// ============================================================================

/** Maximum number of connections in the Postgres pool (override: POSTGRES_POOL_SIZE) */
export const DB_POOL_MAX = 10;

/** Idle connection timeout before closing (ms) */
export const DB_IDLE_TIMEOUT_MS = 30_000;

/** Connection acquisition timeout (ms) */
export const DB_CONNECT_TIMEOUT_MS = 2_000;

/** Largest id list accepted by a bulk delete */
export const MAX_BULK_DELETE_IDS = 1_000;

// ============================================================================
// Sessions
// ============================================================================

/** Session lifetime (override: SESSION_TTL_HOURS) */
export const SESSION_TTL_HOURS = 24;

/** How often expired sessions are purged (ms) */
export const SESSION_CLEANUP_INTERVAL_MS = 60 * 60 * 1000; // 1 hour

/** Random bytes in a session token (hex-encoded, so twice as many characters) */
export const SESSION_TOKEN_BYTES = 32;

/** Header carrying the session token */
export const SESSION_HEADER = 'X-Session-Token';

// ============================================================================
// Password hashing
// ============================================================================

/** scrypt derived key length (bytes) */
export const SCRYPT_KEY_LENGTH = 64;

/** Random salt length (bytes) */
export const PASSWORD_SALT_BYTES = 32;

// ============================================================================
// Time Constants
// ============================================================================

export const MS_PER_HOUR = 3_600_000; // 1000 * 60 * 60
