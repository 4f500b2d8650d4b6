/**
 * User routes
 *
 * Plaintext passwords are hashed here and never reach data access.
 */

import { Hono } from 'hono';
import { createQuery, unwrap, type UserFilter } from '@gatehouse/core';
import type { GatewayDeps } from '../types/index.js';
import { linkConfigFor } from '../config/settings.js';
import { pagination } from '../middleware/pagination.js';
import {
  bulkDeleteSchema,
  createUserSchema,
  saveUserSchema,
  updateUserSchema,
  validateBody,
} from '../middleware/validation.js';
import {
  deleteUserById,
  deleteUsersByIds,
  getUserById,
  insertUser,
  listUsers,
  saveUser,
  updateUser,
} from '../db/repositories/users.js';
import { toUserResponse } from '../models/user.js';
import { hashPassword } from '../services/password.js';
import { envelopeResponse, pageResponse, found, optionalUuidQuery, uuidParam } from './helpers.js';

export function createUserRoutes({ db, settings }: Pick<GatewayDeps, 'db' | 'settings'>) {
  const routes = new Hono();
  const links = linkConfigFor(settings, 'users');

  routes.get('/', pagination, async (c) => {
    const query = unwrap(
      createQuery<UserFilter>({
        ...c.get('pagination'),
        filter: { kind: 'user', userGroupId: optionalUuidQuery(c, 'user_group_id') },
      })
    );
    const page = unwrap(await db.read((tx) => listUsers(tx, query, links)));
    return pageResponse(c, page, toUserResponse);
  });

  routes.get('/:id', async (c) => {
    const id = uuidParam(c, 'id');
    const row = unwrap(await db.read((tx) => getUserById(tx, id)));
    return envelopeResponse(c, toUserResponse(found(row, 'User', id)));
  });

  routes.post('/', async (c) => {
    const { username, password, user_group_id } = validateBody(createUserSchema, await c.req.json());
    const row = unwrap(
      await insertUser(await db.begin(), { username, user_group_id, password_hash: hashPassword(password) })
    );
    return envelopeResponse(c, toUserResponse(row), null, 201);
  });

  routes.put('/:id', async (c) => {
    const id = uuidParam(c, 'id');
    const { username, password, user_group_id } = validateBody(updateUserSchema, await c.req.json());
    const row = unwrap(
      await updateUser(await db.begin(), id, {
        username,
        user_group_id: user_group_id ?? null,
        password_hash: password === undefined ? undefined : hashPassword(password),
      })
    );
    return envelopeResponse(c, toUserResponse(row));
  });

  routes.put('/', async (c) => {
    const { id, username, password, user_group_id } = validateBody(saveUserSchema, await c.req.json());
    const row = unwrap(
      await saveUser(await db.begin(), { id, username, user_group_id, password_hash: hashPassword(password) })
    );
    return envelopeResponse(c, toUserResponse(row));
  });

  routes.delete('/:id', async (c) => {
    const id = uuidParam(c, 'id');
    const row = unwrap(await deleteUserById(await db.begin(), id));
    return envelopeResponse(c, toUserResponse(row));
  });

  routes.delete('/', async (c) => {
    const ids = validateBody(bulkDeleteSchema, await c.req.json());
    const rows = unwrap(await deleteUsersByIds(await db.begin(), ids));
    return envelopeResponse(c, rows.map(toUserResponse));
  });

  return routes;
}
