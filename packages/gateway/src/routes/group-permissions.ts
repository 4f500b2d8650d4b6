/**
 * Group-permission routes
 */

import { Hono } from 'hono';
import { createQuery, unwrap, type GroupPermissionFilter } from '@gatehouse/core';
import type { GatewayDeps } from '../types/index.js';
import { linkConfigFor } from '../config/settings.js';
import { pagination } from '../middleware/pagination.js';
import { groupPermissionSchema, validateBody } from '../middleware/validation.js';
import {
  deleteGroupPermission,
  deleteGroupPermissionsByGroupId,
  deleteGroupPermissionsByPermissionId,
  insertGroupPermission,
  listGroupPermissions,
  listGroupPermissionsByGroupId,
  listGroupPermissionsByPermissionId,
} from '../db/repositories/group-permissions.js';
import { toGroupPermissionResponse } from '../models/permission-link.js';
import { envelopeResponse, pageResponse, optionalUuidQuery, uuidParam } from './helpers.js';

export function createGroupPermissionRoutes({ db, settings }: Pick<GatewayDeps, 'db' | 'settings'>) {
  const routes = new Hono();
  const links = linkConfigFor(settings, 'groupPermissions');

  routes.get('/', pagination, async (c) => {
    const query = unwrap(
      createQuery<GroupPermissionFilter>({
        ...c.get('pagination'),
        filter: {
          kind: 'groupPermission',
          groupId: optionalUuidQuery(c, 'group_id'),
          permissionId: optionalUuidQuery(c, 'permission_id'),
        },
      })
    );
    const page = unwrap(await db.read((tx) => listGroupPermissions(tx, query, links)));
    return pageResponse(c, page, toGroupPermissionResponse);
  });

  routes.get('/group/:groupId', pagination, async (c) => {
    const groupId = uuidParam(c, 'groupId');
    const query = unwrap(createQuery<GroupPermissionFilter>(c.get('pagination')));
    const page = unwrap(await db.read((tx) => listGroupPermissionsByGroupId(tx, groupId, query, links)));
    return pageResponse(c, page, toGroupPermissionResponse);
  });

  routes.get('/permission/:permissionId', pagination, async (c) => {
    const permissionId = uuidParam(c, 'permissionId');
    const query = unwrap(createQuery<GroupPermissionFilter>(c.get('pagination')));
    const page = unwrap(await db.read((tx) => listGroupPermissionsByPermissionId(tx, permissionId, query, links)));
    return pageResponse(c, page, toGroupPermissionResponse);
  });

  routes.post('/', async (c) => {
    const key = validateBody(groupPermissionSchema, await c.req.json());
    const row = unwrap(await insertGroupPermission(await db.begin(), key));
    return envelopeResponse(c, toGroupPermissionResponse(row), null, 201);
  });

  routes.delete('/', async (c) => {
    const key = validateBody(groupPermissionSchema, await c.req.json());
    const row = unwrap(await deleteGroupPermission(await db.begin(), key));
    return envelopeResponse(c, toGroupPermissionResponse(row));
  });

  routes.delete('/group/:groupId', async (c) => {
    const groupId = uuidParam(c, 'groupId');
    const rows = unwrap(await deleteGroupPermissionsByGroupId(await db.begin(), groupId));
    return envelopeResponse(c, rows.map(toGroupPermissionResponse));
  });

  routes.delete('/permission/:permissionId', async (c) => {
    const permissionId = uuidParam(c, 'permissionId');
    const rows = unwrap(await deleteGroupPermissionsByPermissionId(await db.begin(), permissionId));
    return envelopeResponse(c, rows.map(toGroupPermissionResponse));
  });

  return routes;
}
