/**
 * @gatehouse/core
 *
 * Dependency-free foundation shared by the gateway: results, typed errors,
 * scoped logging and the query/pagination contract.
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Logging
export * from './services/index.js';

// Query, pagination, response envelope
export * from './pagination/index.js';

/** Package version, reported by the health endpoint */
export const VERSION = '0.1.0';
