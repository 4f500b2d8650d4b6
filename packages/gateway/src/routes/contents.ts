/**
 * Content routes
 */

import { Hono } from 'hono';
import { createQuery, unwrap, type ContentFilter } from '@gatehouse/core';
import type { GatewayDeps } from '../types/index.js';
import { linkConfigFor } from '../config/settings.js';
import { pagination } from '../middleware/pagination.js';
import {
  bulkDeleteSchema,
  createContentSchema,
  updateContentSchema,
  validateBody,
} from '../middleware/validation.js';
import {
  deleteContentById,
  deleteContentsByIds,
  getContentById,
  insertContent,
  listContents,
  updateContent,
} from '../db/repositories/contents.js';
import { toContentResponse } from '../models/content.js';
import { envelopeResponse, pageResponse, found, optionalUuidQuery, uuidParam } from './helpers.js';

export function createContentRoutes({ db, settings }: Pick<GatewayDeps, 'db' | 'settings'>) {
  const routes = new Hono();
  const links = linkConfigFor(settings, 'contents');

  routes.get('/', pagination, async (c) => {
    const query = unwrap(
      createQuery<ContentFilter>({
        ...c.get('pagination'),
        filter: { kind: 'content', authorId: optionalUuidQuery(c, 'author_id') },
      })
    );
    const page = unwrap(await db.read((tx) => listContents(tx, query, links)));
    return pageResponse(c, page, toContentResponse);
  });

  routes.get('/:id', async (c) => {
    const id = uuidParam(c, 'id');
    const row = unwrap(await db.read((tx) => getContentById(tx, id)));
    return envelopeResponse(c, toContentResponse(found(row, 'Content', id)));
  });

  routes.post('/', async (c) => {
    const body = validateBody(createContentSchema, await c.req.json());
    const row = unwrap(await insertContent(await db.begin(), body));
    return envelopeResponse(c, toContentResponse(row), null, 201);
  });

  routes.put('/:id', async (c) => {
    const id = uuidParam(c, 'id');
    const body = validateBody(updateContentSchema, await c.req.json());
    const row = unwrap(await updateContent(await db.begin(), id, body));
    return envelopeResponse(c, toContentResponse(row));
  });

  routes.delete('/:id', async (c) => {
    const id = uuidParam(c, 'id');
    const row = unwrap(await deleteContentById(await db.begin(), id));
    return envelopeResponse(c, toContentResponse(row));
  });

  routes.delete('/', async (c) => {
    const ids = validateBody(bulkDeleteSchema, await c.req.json());
    const rows = unwrap(await deleteContentsByIds(await db.begin(), ids));
    return envelopeResponse(c, rows.map(toContentResponse));
  });

  return routes;
}
