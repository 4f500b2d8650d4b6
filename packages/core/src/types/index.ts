/**
 * Core types
 * @packageDocumentation
 */

// Result pattern
export {
  type Result,
  ok,
  err,
  unwrap,
} from './result.js';

// Error classes
export {
  AppError,
  ValidationError,
  NotFoundError,
  AuthenticationError,
  StoreError,
  TransactionClosedError,
  InternalError,
  type DataAccessError,
  isAppError,
} from './errors.js';
