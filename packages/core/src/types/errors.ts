/**
 * Structured error classes
 * Every error carries a stable code and the HTTP status it maps to.
 */

/**
 * Base application error with structured metadata
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: Date = new Date();
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Client input rejected before any store call (bad page size, unknown sort
 * column, malformed body).
 */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly statusCode = 400;
  readonly field?: string;
  readonly errors?: ReadonlyArray<{ path: string[]; message: string }>;

  constructor(
    message: string,
    options?: {
      field?: string;
      errors?: ReadonlyArray<{ path: string[]; message: string }>;
      cause?: unknown;
    }
  ) {
    super(message, options);
    this.field = options?.field;
    this.errors = options?.errors;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      errors: this.errors,
    };
  }
}

/**
 * A mutation targeted a row that does not exist
 */
export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND' as const;
  readonly statusCode = 404;
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string, options?: { cause?: unknown }) {
    super(`${resource} not found: ${id}`, options);
    this.resource = resource;
    this.id = id;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      resource: this.resource,
      id: this.id,
    };
  }
}

/**
 * Authentication error - bad credentials or no valid session
 */
export class AuthenticationError extends AppError {
  readonly code = 'AUTHENTICATION_ERROR' as const;
  readonly statusCode = 401;

  constructor(message: string = 'Authentication required', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Failure reported by the relational store.
 *
 * SQLSTATE class 23 (integrity constraint violation) maps to 409, everything
 * else (connection loss, pool timeout, syntax) to 500.
 */
export class StoreError extends AppError {
  readonly code = 'STORE_ERROR' as const;
  readonly statusCode: number;
  readonly operation: string;
  readonly driverCode?: string;

  constructor(
    operation: string,
    message: string,
    options?: { driverCode?: string; cause?: unknown }
  ) {
    super(message, options);
    this.operation = operation;
    this.driverCode = options?.driverCode;
    this.statusCode = isConstraintViolation(options?.driverCode) ? 409 : 500;
  }

  get isConstraintViolation(): boolean {
    return isConstraintViolation(this.driverCode);
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
      driverCode: this.driverCode,
    };
  }
}

/**
 * A transaction handle was used after it was committed or rolled back
 */
export class TransactionClosedError extends AppError {
  readonly code = 'TRANSACTION_CLOSED' as const;
  readonly statusCode = 500;
  readonly state: 'committed' | 'rolled_back';

  constructor(state: 'committed' | 'rolled_back') {
    super(`Transaction already ${state === 'committed' ? 'committed' : 'rolled back'}`);
    this.state = state;
  }
}

/**
 * Internal error - unexpected server error
 */
export class InternalError extends AppError {
  readonly code = 'INTERNAL_ERROR' as const;
  readonly statusCode = 500;

  constructor(message: string = 'An internal error occurred', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Errors a data-access operation can return */
export type DataAccessError = StoreError | NotFoundError;

function isConstraintViolation(driverCode: string | undefined): boolean {
  return driverCode !== undefined && driverCode.startsWith('23');
}

/**
 * Check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
