/**
 * Users data access
 *
 * Passwords arrive here already hashed; checkUserPassword is the only
 * place a plaintext password is compared.
 */

import { randomUUID } from 'node:crypto';
import { NotFoundError, err, ok, type LinkConfig, type Query, type UserFilter } from '@gatehouse/core';
import type { Transaction } from '../transaction.js';
import type { NewUser, UserRow, UserUpdate } from '../../models/user.js';
import { verifyPassword } from '../../services/password.js';
import {
  type DataAccessResult,
  type ListResult,
  type ListSpec,
  deleteById,
  deleteByIds,
  mutate,
  paginatedQuery,
  requireRow,
  runQuery,
  runQueryOne,
  uuidEquals,
} from './base.js';

const RESOURCE = 'User';
const COLUMNS = 'id, username, password_hash, created_at, user_group_id';

export const USER_SORT_COLUMNS = ['id', 'username', 'created_at', 'user_group_id'] as const;

const listSpec: ListSpec<UserFilter> = {
  operation: 'listUsers',
  table: 'users',
  columns: COLUMNS,
  primaryKey: ['id'],
  sortable: USER_SORT_COLUMNS,
  where: (params, filter) => uuidEquals(params, 'user_group_id', filter?.userGroupId),
};

export async function listUsers(tx: Transaction, query: Query<UserFilter>, links: LinkConfig): ListResult<UserRow> {
  return paginatedQuery<UserRow, UserFilter>(tx, listSpec, query, links);
}

export async function getUserById(tx: Transaction, id: string): DataAccessResult<UserRow | null> {
  return runQueryOne<UserRow>(tx, 'getUserById', `SELECT ${COLUMNS} FROM users WHERE id = $1`, [id]);
}

export async function getUserByUsername(tx: Transaction, username: string): DataAccessResult<UserRow | null> {
  return runQueryOne<UserRow>(tx, 'getUserByUsername', `SELECT ${COLUMNS} FROM users WHERE username = $1`, [username]);
}

/**
 * Compare a plaintext password with the stored hash of a user.
 * Read-only; fails with NotFoundError when the user does not exist.
 */
export async function checkUserPassword(tx: Transaction, userId: string, password: string): DataAccessResult<boolean> {
  const row = await runQueryOne<{ password_hash: string }>(
    tx,
    'checkUserPassword',
    'SELECT password_hash FROM users WHERE id = $1',
    [userId]
  );
  if (!row.ok) return row;
  if (!row.value) return err(new NotFoundError(RESOURCE, userId));
  return ok(verifyPassword(password, row.value.password_hash));
}

async function insertRow(tx: Transaction, operation: string, id: string, user: NewUser): DataAccessResult<UserRow> {
  const rows = await runQuery<UserRow>(
    tx,
    operation,
    `INSERT INTO users (id, username, password_hash, user_group_id) VALUES ($1, $2, $3, $4) RETURNING ${COLUMNS}`,
    [id, user.username, user.password_hash, user.user_group_id ?? null]
  );
  if (!rows.ok) return rows;
  return requireRow(rows.value, RESOURCE, id);
}

async function updateRow(tx: Transaction, operation: string, id: string, update: UserUpdate): DataAccessResult<UserRow> {
  const rows = await runQuery<UserRow>(
    tx,
    operation,
    `UPDATE users SET username = $2, user_group_id = $3, password_hash = COALESCE($4, password_hash) WHERE id = $1 RETURNING ${COLUMNS}`,
    [id, update.username, update.user_group_id, update.password_hash ?? null]
  );
  if (!rows.ok) return rows;
  return requireRow(rows.value, RESOURCE, id);
}

/** Insert with a fresh id */
export async function insertUser(tx: Transaction, user: NewUser): DataAccessResult<UserRow> {
  return mutate(tx, 'insertUser', (owned) => insertRow(owned, 'insertUser', randomUUID(), user));
}

/**
 * Replace username and group; the password hash changes only when a new one is given.
 */
export async function updateUser(tx: Transaction, id: string, update: UserUpdate): DataAccessResult<UserRow> {
  return mutate(tx, 'updateUser', (owned) => updateRow(owned, 'updateUser', id, update));
}

/**
 * Update the user with the given id, or insert it under that id
 * (a fresh one when none is given).
 */
export async function saveUser(tx: Transaction, user: NewUser): DataAccessResult<UserRow> {
  return mutate(tx, 'saveUser', async (owned) => {
    const id = user.id ?? randomUUID();
    const existing = await getUserById(owned, id);
    if (!existing.ok) return existing;
    return existing.value
      ? updateRow(owned, 'saveUser', id, {
          username: user.username,
          user_group_id: user.user_group_id ?? null,
          password_hash: user.password_hash,
        })
      : insertRow(owned, 'saveUser', id, user);
  });
}

export async function deleteUserById(tx: Transaction, id: string): DataAccessResult<UserRow> {
  return deleteById<UserRow>(tx, 'deleteUserById', RESOURCE, 'users', COLUMNS, id);
}

export async function deleteUsersByIds(tx: Transaction, ids: readonly string[]): DataAccessResult<UserRow[]> {
  return deleteByIds<UserRow>(tx, 'deleteUsersByIds', 'users', COLUMNS, ids);
}
