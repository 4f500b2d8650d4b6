/**
 * Pagination Middleware
 *
 * Parses `page`, `size`, `sort` and `order` query parameters and stores
 * them on `c.var.pagination`. Only the syntax is checked here; ranges
 * (page >= 1, size cap) are enforced when the handler builds its Query.
 *
 * Usage:
 *   routes.get('/', pagination, (c) => {
 *     const query = unwrap(createQuery({ ...c.get('pagination'), filter }));
 *   });
 */

import { createMiddleware } from 'hono/factory';
import { z } from 'zod';
import type { SortOrder } from '@gatehouse/core';
import { validateBody } from './validation.js';

export interface PaginationParams {
  page?: number;
  size?: number;
  sort?: string;
  order?: SortOrder;
}

const integer = z
  .string()
  .regex(/^-?\d+$/, 'must be an integer')
  .transform(Number);

const paginationSchema = z.object({
  page: integer.optional(),
  size: integer.optional(),
  sort: z.string().optional(),
  order: z.enum(['asc', 'desc']).optional(),
});

export const pagination = createMiddleware(async (c, next) => {
  const { page, size, sort, order } = validateBody(paginationSchema, c.req.query());
  const params: PaginationParams = {};
  if (page !== undefined) params.page = page;
  if (size !== undefined) params.size = size;
  if (sort !== undefined) params.sort = sort;
  if (order !== undefined) params.order = order;
  c.set('pagination', params);
  await next();
});
