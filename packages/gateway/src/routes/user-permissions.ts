/**
 * User-permission routes
 */

import { Hono } from 'hono';
import { createQuery, unwrap, type UserPermissionFilter } from '@gatehouse/core';
import type { GatewayDeps } from '../types/index.js';
import { linkConfigFor } from '../config/settings.js';
import { pagination } from '../middleware/pagination.js';
import { userPermissionSchema, validateBody } from '../middleware/validation.js';
import {
  deleteUserPermission,
  deleteUserPermissionsByUserId,
  deleteUserPermissionsByPermissionId,
  insertUserPermission,
  listUserPermissions,
  listUserPermissionsByUserId,
  listUserPermissionsByPermissionId,
} from '../db/repositories/user-permissions.js';
import { toUserPermissionResponse } from '../models/permission-link.js';
import { envelopeResponse, pageResponse, optionalUuidQuery, uuidParam } from './helpers.js';

export function createUserPermissionRoutes({ db, settings }: Pick<GatewayDeps, 'db' | 'settings'>) {
  const routes = new Hono();
  const links = linkConfigFor(settings, 'userPermissions');

  routes.get('/', pagination, async (c) => {
    const query = unwrap(
      createQuery<UserPermissionFilter>({
        ...c.get('pagination'),
        filter: {
          kind: 'userPermission',
          userId: optionalUuidQuery(c, 'user_id'),
          permissionId: optionalUuidQuery(c, 'permission_id'),
        },
      })
    );
    const page = unwrap(await db.read((tx) => listUserPermissions(tx, query, links)));
    return pageResponse(c, page, toUserPermissionResponse);
  });

  routes.get('/user/:userId', pagination, async (c) => {
    const userId = uuidParam(c, 'userId');
    const query = unwrap(createQuery<UserPermissionFilter>(c.get('pagination')));
    const page = unwrap(await db.read((tx) => listUserPermissionsByUserId(tx, userId, query, links)));
    return pageResponse(c, page, toUserPermissionResponse);
  });

  routes.get('/permission/:permissionId', pagination, async (c) => {
    const permissionId = uuidParam(c, 'permissionId');
    const query = unwrap(createQuery<UserPermissionFilter>(c.get('pagination')));
    const page = unwrap(await db.read((tx) => listUserPermissionsByPermissionId(tx, permissionId, query, links)));
    return pageResponse(c, page, toUserPermissionResponse);
  });

  routes.post('/', async (c) => {
    const key = validateBody(userPermissionSchema, await c.req.json());
    const row = unwrap(await insertUserPermission(await db.begin(), key));
    return envelopeResponse(c, toUserPermissionResponse(row), null, 201);
  });

  routes.delete('/', async (c) => {
    const key = validateBody(userPermissionSchema, await c.req.json());
    const row = unwrap(await deleteUserPermission(await db.begin(), key));
    return envelopeResponse(c, toUserPermissionResponse(row));
  });

  routes.delete('/user/:userId', async (c) => {
    const userId = uuidParam(c, 'userId');
    const rows = unwrap(await deleteUserPermissionsByUserId(await db.begin(), userId));
    return envelopeResponse(c, rows.map(toUserPermissionResponse));
  });

  routes.delete('/permission/:permissionId', async (c) => {
    const permissionId = uuidParam(c, 'permissionId');
    const rows = unwrap(await deleteUserPermissionsByPermissionId(await db.begin(), permissionId));
    return envelopeResponse(c, rows.map(toUserPermissionResponse));
  });

  return routes;
}
