/**
 * User-permission links data access
 *
 * Rows are keyed by (user_id, permission_id); there is no update.
 */

import { ok, type UserPermissionFilter, type LinkConfig, type Query } from '@gatehouse/core';
import type { Transaction } from '../transaction.js';
import type { UserPermissionKey, UserPermissionRow } from '../../models/permission-link.js';
import {
  type DataAccessResult,
  type ListResult,
  type ListSpec,
  mutate,
  paginatedQuery,
  requireRow,
  runQuery,
  runQueryOne,
  uuidEquals,
} from './base.js';

const RESOURCE = 'UserPermission';
const COLUMNS = 'user_id, permission_id, created_at';

export const USER_PERMISSION_SORT_COLUMNS = ['user_id', 'permission_id', 'created_at'] as const;

const listSpec: ListSpec<UserPermissionFilter> = {
  operation: 'listUserPermissions',
  table: 'user_permissions',
  columns: COLUMNS,
  primaryKey: ['user_id', 'permission_id'],
  sortable: USER_PERMISSION_SORT_COLUMNS,
  where: (params, filter) =>
    `${uuidEquals(params, 'user_id', filter?.userId)} AND ${uuidEquals(params, 'permission_id', filter?.permissionId)}`,
};

function keyOf(key: UserPermissionKey): string {
  return `${key.user_id}/${key.permission_id}`;
}

export async function listUserPermissions(
  tx: Transaction,
  query: Query<UserPermissionFilter>,
  links: LinkConfig
): ListResult<UserPermissionRow> {
  return paginatedQuery<UserPermissionRow, UserPermissionFilter>(tx, listSpec, query, links);
}

/** Paging and ordering come from `query`; its filter is replaced */
export async function listUserPermissionsByUserId(
  tx: Transaction,
  userId: string,
  query: Query<UserPermissionFilter>,
  links: LinkConfig
): ListResult<UserPermissionRow> {
  return listUserPermissions(tx, query.withFilter<UserPermissionFilter>({ kind: 'userPermission', userId }), links);
}

export async function listUserPermissionsByPermissionId(
  tx: Transaction,
  permissionId: string,
  query: Query<UserPermissionFilter>,
  links: LinkConfig
): ListResult<UserPermissionRow> {
  return listUserPermissions(tx, query.withFilter<UserPermissionFilter>({ kind: 'userPermission', permissionId }), links);
}

export async function userPermissionExists(tx: Transaction, key: UserPermissionKey): DataAccessResult<boolean> {
  const row = await runQueryOne<{ found: boolean }>(
    tx,
    'userPermissionExists',
    'SELECT EXISTS (SELECT 1 FROM user_permissions WHERE user_id = $1 AND permission_id = $2) AS found',
    [key.user_id, key.permission_id]
  );
  if (!row.ok) return row;
  return ok(row.value?.found === true);
}

export async function insertUserPermission(
  tx: Transaction,
  key: UserPermissionKey
): DataAccessResult<UserPermissionRow> {
  return mutate(tx, 'insertUserPermission', async (owned) => {
    const rows = await runQuery<UserPermissionRow>(
      owned,
      'insertUserPermission',
      `INSERT INTO user_permissions (user_id, permission_id) VALUES ($1, $2) RETURNING ${COLUMNS}`,
      [key.user_id, key.permission_id]
    );
    if (!rows.ok) return rows;
    return requireRow(rows.value, RESOURCE, keyOf(key));
  });
}

export async function deleteUserPermission(
  tx: Transaction,
  key: UserPermissionKey
): DataAccessResult<UserPermissionRow> {
  return mutate(tx, 'deleteUserPermission', async (owned) => {
    const rows = await runQuery<UserPermissionRow>(
      owned,
      'deleteUserPermission',
      `DELETE FROM user_permissions WHERE user_id = $1 AND permission_id = $2 RETURNING ${COLUMNS}`,
      [key.user_id, key.permission_id]
    );
    if (!rows.ok) return rows;
    return requireRow(rows.value, RESOURCE, keyOf(key));
  });
}

/** Remove every permission of a user; returns the removed links */
export async function deleteUserPermissionsByUserId(
  tx: Transaction,
  userId: string
): DataAccessResult<UserPermissionRow[]> {
  return mutate(tx, 'deleteUserPermissionsByUserId', (owned) =>
    runQuery<UserPermissionRow>(
      owned,
      'deleteUserPermissionsByUserId',
      `DELETE FROM user_permissions WHERE user_id = $1 RETURNING ${COLUMNS}`,
      [userId]
    )
  );
}

/** Remove a permission from every user; returns the removed links */
export async function deleteUserPermissionsByPermissionId(
  tx: Transaction,
  permissionId: string
): DataAccessResult<UserPermissionRow[]> {
  return mutate(tx, 'deleteUserPermissionsByPermissionId', (owned) =>
    runQuery<UserPermissionRow>(
      owned,
      'deleteUserPermissionsByPermissionId',
      `DELETE FROM user_permissions WHERE permission_id = $1 RETURNING ${COLUMNS}`,
      [permissionId]
    )
  );
}
