/**
 * Data-access building blocks
 *
 * Every operation receives the Transaction it runs on. Read operations only
 * issue SELECTs and leave the handle open for the caller; mutations go
 * through mutate(), which owns the handle from then on and closes it on
 * every path.
 */

import type { QueryResultRow } from 'pg';
import {
  type DataAccessError,
  type LinkConfig,
  type ListFilter,
  type Query,
  type ResponseEnvelope,
  type Result,
  type SortOrder,
  NotFoundError,
  StoreError,
  TransactionClosedError,
  ValidationError,
  createEnvelope,
  createPagination,
  err,
  ok,
} from '@gatehouse/core';
import type { Transaction } from '../transaction.js';
import { toStoreError } from '../errors.js';
import { getLog } from '../../services/log.js';

const log = getLog('Repository');

export type DataAccessResult<T> = Promise<Result<T, DataAccessError>>;

/** List operations can also reject the request itself (unknown sort column) */
export type ListError = DataAccessError | ValidationError;

export type ListResult<R> = Promise<Result<ResponseEnvelope<R[]>, ListError>>;

// ============================================================================
// Parameters and predicates
// ============================================================================

/**
 * Positional parameter collector. add() returns the placeholder to splice
 * into the statement.
 */
export class SqlParams {
  private readonly list: unknown[] = [];

  add(value: unknown): string {
    this.list.push(value);
    return `$${this.list.length}`;
  }

  get values(): unknown[] {
    return [...this.list];
  }
}

/**
 * Equality on a uuid column that matches every row (NULL columns included)
 * when the value is absent.
 */
export function uuidEquals(params: SqlParams, column: string, value: string | undefined): string {
  const p = params.add(value ?? null);
  return `(${p}::uuid IS NULL OR ${column} = ${p})`;
}

/**
 * Case-insensitive substring match that is unrestricted when the value is absent.
 */
export function textContains(params: SqlParams, column: string, value: string | undefined): string {
  const p = params.add(value === undefined ? null : escapeLike(value));
  return `(${p}::text IS NULL OR ${column} ILIKE '%' || ${p} || '%')`;
}

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

// ============================================================================
// Statement execution
// ============================================================================

/**
 * Run one statement, mapping driver failures to StoreError.
 * Use of a closed transaction is a programming error and still throws.
 */
export async function runQuery<R extends QueryResultRow>(
  tx: Transaction,
  operation: string,
  sql: string,
  params: unknown[] = []
): Promise<Result<R[], StoreError>> {
  try {
    const result = await tx.query<R>(sql, params);
    return ok(result.rows);
  } catch (error) {
    if (error instanceof TransactionClosedError) throw error;
    const storeError = toStoreError(operation, error);
    log.warn(`${operation} failed`, { driverCode: storeError.driverCode, message: storeError.message });
    return err(storeError);
  }
}

/**
 * Run a statement expected to return at most one row.
 */
export async function runQueryOne<R extends QueryResultRow>(
  tx: Transaction,
  operation: string,
  sql: string,
  params: unknown[] = []
): Promise<Result<R | null, StoreError>> {
  const result = await runQuery<R>(tx, operation, sql, params);
  if (!result.ok) return result;
  return ok(result.value[0] ?? null);
}

/**
 * First row of a single-row UPDATE/DELETE ... RETURNING, or NotFoundError.
 */
export function requireRow<R>(rows: R[], resource: string, id: string): Result<R, NotFoundError> {
  const row = rows[0];
  return row === undefined ? err(new NotFoundError(resource, id)) : ok(row);
}

// ============================================================================
// Transaction ownership
// ============================================================================

/**
 * Run mutating work and close the transaction: commit exactly once when the
 * work succeeds, roll back when it fails or throws.
 */
export async function mutate<T>(
  tx: Transaction,
  operation: string,
  work: (tx: Transaction) => DataAccessResult<T>
): DataAccessResult<T> {
  let result: Result<T, DataAccessError>;
  try {
    result = await work(tx);
  } catch (error) {
    await tx.rollback();
    throw error;
  }

  if (!result.ok) {
    await tx.rollback();
    return result;
  }

  try {
    await tx.commit();
  } catch (error) {
    if (error instanceof TransactionClosedError) throw error;
    const storeError = toStoreError(operation, error);
    log.warn(`${operation} commit failed`, { driverCode: storeError.driverCode, message: storeError.message });
    return err(storeError);
  }
  return result;
}

// ============================================================================
// Paginated listing
// ============================================================================

export interface ListSpec<F extends ListFilter> {
  /** Operation name used in errors and logs */
  operation: string;
  table: string;
  columns: string;
  /** Ordering tie-break, in key order */
  primaryKey: readonly string[];
  /** Columns a client may sort by */
  sortable: readonly string[];
  /** Predicate for the filter; must be valid SQL for an absent filter too */
  where: (params: SqlParams, filter: F | undefined) => string;
}

/**
 * ORDER BY for a listing: the requested column first (when allowed), then
 * the primary key ascending so pages are stable.
 */
export function buildOrderBy(
  spec: Pick<ListSpec<ListFilter>, 'primaryKey' | 'sortable'>,
  sort: string | undefined,
  order: SortOrder
): Result<string, ValidationError> {
  const tieBreak = (columns: readonly string[]) => columns.map((column) => `${column} ASC`);

  if (sort === undefined) {
    return ok(tieBreak(spec.primaryKey).join(', '));
  }
  if (!spec.sortable.includes(sort)) {
    return err(
      new ValidationError(`Unknown sort column: ${sort}. Allowed: ${spec.sortable.join(', ')}`, {
        field: 'sort',
      })
    );
  }

  const direction = order === 'desc' ? 'DESC' : 'ASC';
  const rest = tieBreak(spec.primaryKey.filter((column) => column !== sort));
  return ok([`${sort} ${direction}`, ...rest].join(', '));
}

/**
 * Count matching rows, fetch one page and attach pagination.
 * The count and the page share the same predicate and parameters.
 */
export async function paginatedQuery<R extends QueryResultRow, F extends ListFilter>(
  tx: Transaction,
  spec: ListSpec<F>,
  query: Query<F>,
  links: LinkConfig
): ListResult<R> {
  const orderBy = buildOrderBy(spec, query.sort, query.order);
  if (!orderBy.ok) return orderBy;

  const params = new SqlParams();
  const where = spec.where(params, query.filter);

  const counted = await runQueryOne<{ total: string | number }>(
    tx,
    spec.operation,
    `SELECT COUNT(*) AS total FROM ${spec.table} WHERE ${where}`,
    params.values
  );
  if (!counted.ok) return counted;
  const total = Number(counted.value?.total ?? 0);

  const limit = params.add(query.limit());
  const offset = params.add(query.offset());
  const rows = await runQuery<R>(
    tx,
    spec.operation,
    `SELECT ${spec.columns} FROM ${spec.table} WHERE ${where} ORDER BY ${orderBy.value} LIMIT ${limit} OFFSET ${offset}`,
    params.values
  );
  if (!rows.ok) return rows;

  return ok(createEnvelope(rows.value, createPagination(query.page(), query.size(), total, links)));
}

// ============================================================================
// Shared statement shapes
// ============================================================================

/**
 * DELETE ... WHERE key = ANY($1) RETURNING ..., inside an owned transaction.
 * Returns only the rows that existed; an empty id list issues no DELETE.
 */
export async function deleteByIds<R extends QueryResultRow>(
  tx: Transaction,
  operation: string,
  table: string,
  columns: string,
  ids: readonly string[]
): DataAccessResult<R[]> {
  return mutate<R[]>(tx, operation, async (owned) => {
    if (ids.length === 0) return ok([]);
    return runQuery<R>(
      owned,
      operation,
      `DELETE FROM ${table} WHERE id = ANY($1::uuid[]) RETURNING ${columns}`,
      [[...ids]]
    );
  });
}

/**
 * DELETE ... WHERE id = $1 RETURNING ..., NotFoundError when nothing matched.
 */
export async function deleteById<R extends QueryResultRow>(
  tx: Transaction,
  operation: string,
  resource: string,
  table: string,
  columns: string,
  id: string
): DataAccessResult<R> {
  return mutate<R>(tx, operation, async (owned) => {
    const rows = await runQuery<R>(owned, operation, `DELETE FROM ${table} WHERE id = $1 RETURNING ${columns}`, [id]);
    if (!rows.ok) return rows;
    return requireRow(rows.value, resource, id);
  });
}
