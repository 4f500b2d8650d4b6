/**
 * User group routes
 */

import { Hono } from 'hono';
import { createQuery, unwrap, type UserGroupFilter } from '@gatehouse/core';
import type { GatewayDeps } from '../types/index.js';
import { linkConfigFor } from '../config/settings.js';
import { pagination } from '../middleware/pagination.js';
import { bulkDeleteSchema, saveUserGroupSchema, userGroupSchema, validateBody } from '../middleware/validation.js';
import {
  deleteUserGroupById,
  deleteUserGroupsByIds,
  getUserGroupById,
  insertUserGroup,
  listUserGroups,
  saveUserGroup,
} from '../db/repositories/user-groups.js';
import { toUserGroupResponse } from '../models/user-group.js';
import { envelopeResponse, pageResponse, found, uuidParam } from './helpers.js';

export function createUserGroupRoutes({ db, settings }: Pick<GatewayDeps, 'db' | 'settings'>) {
  const routes = new Hono();
  const links = linkConfigFor(settings, 'userGroups');

  routes.get('/', pagination, async (c) => {
    const query = unwrap(
      createQuery<UserGroupFilter>({
        ...c.get('pagination'),
        filter: { kind: 'userGroup', groupName: c.req.query('group_name') || undefined },
      })
    );
    const page = unwrap(await db.read((tx) => listUserGroups(tx, query, links)));
    return pageResponse(c, page, toUserGroupResponse);
  });

  routes.get('/:id', async (c) => {
    const id = uuidParam(c, 'id');
    const row = unwrap(await db.read((tx) => getUserGroupById(tx, id)));
    return envelopeResponse(c, toUserGroupResponse(found(row, 'UserGroup', id)));
  });

  routes.post('/', async (c) => {
    const body = validateBody(userGroupSchema, await c.req.json());
    const row = unwrap(await insertUserGroup(await db.begin(), body));
    return envelopeResponse(c, toUserGroupResponse(row), null, 201);
  });

  routes.put('/', async (c) => {
    const body = validateBody(saveUserGroupSchema, await c.req.json());
    const row = unwrap(await saveUserGroup(await db.begin(), body));
    return envelopeResponse(c, toUserGroupResponse(row));
  });

  routes.delete('/:id', async (c) => {
    const id = uuidParam(c, 'id');
    const row = unwrap(await deleteUserGroupById(await db.begin(), id));
    return envelopeResponse(c, toUserGroupResponse(row));
  });

  routes.delete('/', async (c) => {
    const ids = validateBody(bulkDeleteSchema, await c.req.json());
    const rows = unwrap(await deleteUserGroupsByIds(await db.begin(), ids));
    return envelopeResponse(c, rows.map(toUserGroupResponse));
  });

  return routes;
}
