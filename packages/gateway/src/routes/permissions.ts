/**
 * Permission routes
 */

import { Hono } from 'hono';
import { createQuery, unwrap, type PermissionFilter } from '@gatehouse/core';
import type { GatewayDeps } from '../types/index.js';
import { linkConfigFor } from '../config/settings.js';
import { pagination } from '../middleware/pagination.js';
import { bulkDeleteSchema, permissionSchema, savePermissionSchema, validateBody } from '../middleware/validation.js';
import {
  deletePermissionById,
  deletePermissionsByIds,
  getPermissionById,
  insertPermission,
  listPermissions,
  savePermission,
} from '../db/repositories/permissions.js';
import { toPermissionResponse } from '../models/permission.js';
import { envelopeResponse, pageResponse, found, uuidParam } from './helpers.js';

export function createPermissionRoutes({ db, settings }: Pick<GatewayDeps, 'db' | 'settings'>) {
  const routes = new Hono();
  const links = linkConfigFor(settings, 'permissions');

  routes.get('/', pagination, async (c) => {
    const query = unwrap(
      createQuery<PermissionFilter>({
        ...c.get('pagination'),
        filter: { kind: 'permission', name: c.req.query('name') || undefined },
      })
    );
    const page = unwrap(await db.read((tx) => listPermissions(tx, query, links)));
    return pageResponse(c, page, toPermissionResponse);
  });

  routes.get('/:id', async (c) => {
    const id = uuidParam(c, 'id');
    const row = unwrap(await db.read((tx) => getPermissionById(tx, id)));
    return envelopeResponse(c, toPermissionResponse(found(row, 'Permission', id)));
  });

  routes.post('/', async (c) => {
    const body = validateBody(permissionSchema, await c.req.json());
    const row = unwrap(await insertPermission(await db.begin(), body));
    return envelopeResponse(c, toPermissionResponse(row), null, 201);
  });

  routes.put('/', async (c) => {
    const body = validateBody(savePermissionSchema, await c.req.json());
    const row = unwrap(await savePermission(await db.begin(), body));
    return envelopeResponse(c, toPermissionResponse(row));
  });

  routes.delete('/:id', async (c) => {
    const id = uuidParam(c, 'id');
    const row = unwrap(await deletePermissionById(await db.begin(), id));
    return envelopeResponse(c, toPermissionResponse(row));
  });

  routes.delete('/', async (c) => {
    const ids = validateBody(bulkDeleteSchema, await c.req.json());
    const rows = unwrap(await deletePermissionsByIds(await db.begin(), ids));
    return envelopeResponse(c, rows.map(toPermissionResponse));
  });

  return routes;
}
