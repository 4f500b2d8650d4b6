/**
 * Pagination
 *
 * Built once per list operation, right after the total row count is known.
 * Links always point at the adjacent page and are derived from an explicit
 * LinkConfig rather than from global settings.
 */

import { ValidationError } from '../types/errors.js';

export interface LinkConfig {
  /** Public origin plus API prefix, e.g. `http://127.0.0.1:8000/api` */
  readonly baseUrl: string;
  /** Collection segment for the entity, e.g. `user_groups` */
  readonly collectionPath: string;
}

/** Wire shape, field names are part of the public contract */
export interface Pagination {
  readonly page: number;
  readonly size: number;
  readonly total: number;
  readonly prev_page: string | null;
  readonly next_page: string | null;
}

/**
 * URL of a given page in a collection.
 */
export function buildPageLink(links: LinkConfig, page: number, size: number): string {
  const base = links.baseUrl.replace(/\/+$/, '');
  const path = links.collectionPath.replace(/^\/+/, '');
  return `${base}/${path}?page=${page}&size=${size}`;
}

/**
 * Create pagination metadata.
 *
 * prev_page is set iff page > 1; next_page is set iff page * size < total.
 */
export function createPagination(
  page: number,
  size: number,
  total: number,
  links: LinkConfig
): Pagination {
  if (!Number.isInteger(page) || page < 1) {
    throw new ValidationError(`page must be a positive integer, got ${page}`, { field: 'page' });
  }
  if (!Number.isInteger(size) || size < 1) {
    throw new ValidationError(`size must be a positive integer, got ${size}`, { field: 'size' });
  }
  if (!Number.isInteger(total) || total < 0) {
    throw new ValidationError(`total must be a non-negative integer, got ${total}`, { field: 'total' });
  }

  return Object.freeze({
    page,
    size,
    total,
    prev_page: page > 1 ? buildPageLink(links, page - 1, size) : null,
    next_page: page * size < total ? buildPageLink(links, page + 1, size) : null,
  });
}
