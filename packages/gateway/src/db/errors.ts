/**
 * Driver error mapping
 */

import { StoreError } from '@gatehouse/core';

/**
 * Wrap a failure raised by pg (or the pool) as a StoreError,
 * keeping the SQLSTATE code when the driver reports one.
 */
export function toStoreError(operation: string, error: unknown): StoreError {
  if (error instanceof StoreError) return error;

  const driverCode =
    typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
      ? error.code
      : undefined;
  const message = error instanceof Error ? error.message : String(error);

  return new StoreError(operation, message, { driverCode, cause: error });
}
