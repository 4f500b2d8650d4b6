/**
 * Group-permission links data access
 *
 * Rows are keyed by (group_id, permission_id); there is no update.
 */

import { ok, type GroupPermissionFilter, type LinkConfig, type Query } from '@gatehouse/core';
import type { Transaction } from '../transaction.js';
import type { GroupPermissionKey, GroupPermissionRow } from '../../models/permission-link.js';
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

const RESOURCE = 'GroupPermission';
const COLUMNS = 'group_id, permission_id, created_at';

export const GROUP_PERMISSION_SORT_COLUMNS = ['group_id', 'permission_id', 'created_at'] as const;

const listSpec: ListSpec<GroupPermissionFilter> = {
  operation: 'listGroupPermissions',
  table: 'group_permissions',
  columns: COLUMNS,
  primaryKey: ['group_id', 'permission_id'],
  sortable: GROUP_PERMISSION_SORT_COLUMNS,
  where: (params, filter) =>
    `${uuidEquals(params, 'group_id', filter?.groupId)} AND ${uuidEquals(params, 'permission_id', filter?.permissionId)}`,
};

function keyOf(key: GroupPermissionKey): string {
  return `${key.group_id}/${key.permission_id}`;
}

export async function listGroupPermissions(
  tx: Transaction,
  query: Query<GroupPermissionFilter>,
  links: LinkConfig
): ListResult<GroupPermissionRow> {
  return paginatedQuery<GroupPermissionRow, GroupPermissionFilter>(tx, listSpec, query, links);
}

/** Paging and ordering come from `query`; its filter is replaced */
export async function listGroupPermissionsByGroupId(
  tx: Transaction,
  groupId: string,
  query: Query<GroupPermissionFilter>,
  links: LinkConfig
): ListResult<GroupPermissionRow> {
  return listGroupPermissions(tx, query.withFilter<GroupPermissionFilter>({ kind: 'groupPermission', groupId }), links);
}

export async function listGroupPermissionsByPermissionId(
  tx: Transaction,
  permissionId: string,
  query: Query<GroupPermissionFilter>,
  links: LinkConfig
): ListResult<GroupPermissionRow> {
  return listGroupPermissions(tx, query.withFilter<GroupPermissionFilter>({ kind: 'groupPermission', permissionId }), links);
}

export async function groupPermissionExists(tx: Transaction, key: GroupPermissionKey): DataAccessResult<boolean> {
  const row = await runQueryOne<{ found: boolean }>(
    tx,
    'groupPermissionExists',
    'SELECT EXISTS (SELECT 1 FROM group_permissions WHERE group_id = $1 AND permission_id = $2) AS found',
    [key.group_id, key.permission_id]
  );
  if (!row.ok) return row;
  return ok(row.value?.found === true);
}

export async function insertGroupPermission(
  tx: Transaction,
  key: GroupPermissionKey
): DataAccessResult<GroupPermissionRow> {
  return mutate(tx, 'insertGroupPermission', async (owned) => {
    const rows = await runQuery<GroupPermissionRow>(
      owned,
      'insertGroupPermission',
      `INSERT INTO group_permissions (group_id, permission_id) VALUES ($1, $2) RETURNING ${COLUMNS}`,
      [key.group_id, key.permission_id]
    );
    if (!rows.ok) return rows;
    return requireRow(rows.value, RESOURCE, keyOf(key));
  });
}

export async function deleteGroupPermission(
  tx: Transaction,
  key: GroupPermissionKey
): DataAccessResult<GroupPermissionRow> {
  return mutate(tx, 'deleteGroupPermission', async (owned) => {
    const rows = await runQuery<GroupPermissionRow>(
      owned,
      'deleteGroupPermission',
      `DELETE FROM group_permissions WHERE group_id = $1 AND permission_id = $2 RETURNING ${COLUMNS}`,
      [key.group_id, key.permission_id]
    );
    if (!rows.ok) return rows;
    return requireRow(rows.value, RESOURCE, keyOf(key));
  });
}

/** Remove every permission of a group; returns the removed links */
export async function deleteGroupPermissionsByGroupId(
  tx: Transaction,
  groupId: string
): DataAccessResult<GroupPermissionRow[]> {
  return mutate(tx, 'deleteGroupPermissionsByGroupId', (owned) =>
    runQuery<GroupPermissionRow>(
      owned,
      'deleteGroupPermissionsByGroupId',
      `DELETE FROM group_permissions WHERE group_id = $1 RETURNING ${COLUMNS}`,
      [groupId]
    )
  );
}

/** Remove a permission from every group; returns the removed links */
export async function deleteGroupPermissionsByPermissionId(
  tx: Transaction,
  permissionId: string
): DataAccessResult<GroupPermissionRow[]> {
  return mutate(tx, 'deleteGroupPermissionsByPermissionId', (owned) =>
    runQuery<GroupPermissionRow>(
      owned,
      'deleteGroupPermissionsByPermissionId',
      `DELETE FROM group_permissions WHERE permission_id = $1 RETURNING ${COLUMNS}`,
      [permissionId]
    )
  );
}
