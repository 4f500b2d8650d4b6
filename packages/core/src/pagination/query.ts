/**
 * Query
 *
 * Typed listing request: page, size, sort column, sort order and an
 * entity-specific filter. Construction validates the paging invariants
 * (page >= 1, 1 <= size <= MAX_PAGE_SIZE, offset <= MAX_OFFSET) so that a
 * Query in hand is always safe to turn into OFFSET/LIMIT.
 */

import { type Result, ok, err } from '../types/result.js';
import { ValidationError } from '../types/errors.js';
import type { ListFilter } from './filters.js';
import { DEFAULT_PAGE, DEFAULT_PAGE_SIZE, MAX_OFFSET, MAX_PAGE_SIZE } from './constants.js';

export type SortOrder = 'asc' | 'desc';

export interface QueryInput<F extends ListFilter> {
  page?: number;
  size?: number;
  sort?: string;
  order?: SortOrder;
  filter?: F;
}

export class Query<F extends ListFilter> {
  readonly sort?: string;
  readonly order: SortOrder;
  readonly filter?: F;
  private readonly requestedPage?: number;
  private readonly requestedSize?: number;

  private constructor(input: QueryInput<F>) {
    this.requestedPage = input.page;
    this.requestedSize = input.size;
    this.sort = input.sort;
    this.order = input.order ?? 'asc';
    this.filter = input.filter;
    Object.freeze(this);
  }

  /**
   * Validate raw listing parameters.
   * Non-integer or non-positive page/size are rejected, never coerced.
   */
  static from<F extends ListFilter>(input: QueryInput<F> = {}): Result<Query<F>, ValidationError> {
    const { page, size } = input;

    if (page !== undefined && (!Number.isInteger(page) || page < 1)) {
      return err(new ValidationError(`page must be a positive integer, got ${page}`, { field: 'page' }));
    }
    if (size !== undefined && (!Number.isInteger(size) || size < 1)) {
      return err(new ValidationError(`size must be a positive integer, got ${size}`, { field: 'size' }));
    }
    if (size !== undefined && size > MAX_PAGE_SIZE) {
      return err(
        new ValidationError(`size must not exceed ${MAX_PAGE_SIZE}, got ${size}`, { field: 'size' })
      );
    }
    if (page !== undefined && (page - 1) * (size ?? DEFAULT_PAGE_SIZE) > MAX_OFFSET) {
      return err(new ValidationError(`page ${page} is out of range`, { field: 'page' }));
    }
    if (input.sort !== undefined && input.sort.trim() === '') {
      return err(new ValidationError('sort must not be empty', { field: 'sort' }));
    }

    return ok(new Query(input));
  }

  /** Same paging and ordering, different filter */
  withFilter<G extends ListFilter>(filter: G): Query<G> {
    return new Query<G>({
      page: this.requestedPage,
      size: this.requestedSize,
      sort: this.sort,
      order: this.order,
      filter,
    });
  }

  page(): number {
    return this.requestedPage ?? DEFAULT_PAGE;
  }

  size(): number {
    return this.requestedSize ?? DEFAULT_PAGE_SIZE;
  }

  /** Zero-based number of rows to skip */
  offset(): number {
    return (this.page() - 1) * this.size();
  }

  limit(): number {
    return this.size();
  }
}

/** Validate listing parameters into a Query */
export function createQuery<F extends ListFilter>(
  input: QueryInput<F> = {}
): Result<Query<F>, ValidationError> {
  return Query.from(input);
}
