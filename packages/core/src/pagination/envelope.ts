/**
 * Response envelope
 *
 * `{ data, pagination }`. List results always carry pagination; single
 * entities and bulk deletes carry `null`.
 */

import type { Pagination } from './pagination.js';

export interface ResponseEnvelope<T> {
  readonly data: T;
  readonly pagination: Pagination | null;
}

export function createEnvelope<T>(data: T, pagination: Pagination | null = null): ResponseEnvelope<T> {
  return { data, pagination };
}

/**
 * Transform the payload, keeping the pagination block.
 * Used to turn stored rows into their wire projections.
 */
export function mapEnvelope<T, U>(
  envelope: ResponseEnvelope<T>,
  fn: (data: T) => U
): ResponseEnvelope<U> {
  return { data: fn(envelope.data), pagination: envelope.pagination };
}
