/**
 * Permissions data access
 */

import { randomUUID } from 'node:crypto';
import type { LinkConfig, PermissionFilter, Query } from '@gatehouse/core';
import type { Transaction } from '../transaction.js';
import type { NewPermission, PermissionRow, PermissionUpdate } from '../../models/permission.js';
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
  textContains,
} from './base.js';

const RESOURCE = 'Permission';
const COLUMNS = 'id, name, description, created_at';

export const PERMISSION_SORT_COLUMNS = ['id', 'name', 'created_at'] as const;

const listSpec: ListSpec<PermissionFilter> = {
  operation: 'listPermissions',
  table: 'permissions',
  columns: COLUMNS,
  primaryKey: ['id'],
  sortable: PERMISSION_SORT_COLUMNS,
  where: (params, filter) => textContains(params, 'name', filter?.name),
};

export async function listPermissions(
  tx: Transaction,
  query: Query<PermissionFilter>,
  links: LinkConfig
): ListResult<PermissionRow> {
  return paginatedQuery<PermissionRow, PermissionFilter>(tx, listSpec, query, links);
}

export async function getPermissionById(tx: Transaction, id: string): DataAccessResult<PermissionRow | null> {
  return runQueryOne<PermissionRow>(tx, 'getPermissionById', `SELECT ${COLUMNS} FROM permissions WHERE id = $1`, [id]);
}

export async function getPermissionByName(tx: Transaction, name: string): DataAccessResult<PermissionRow | null> {
  return runQueryOne<PermissionRow>(
    tx,
    'getPermissionByName',
    `SELECT ${COLUMNS} FROM permissions WHERE name = $1`,
    [name]
  );
}

async function insertRow(
  tx: Transaction,
  operation: string,
  id: string,
  permission: NewPermission
): DataAccessResult<PermissionRow> {
  const rows = await runQuery<PermissionRow>(
    tx,
    operation,
    `INSERT INTO permissions (id, name, description) VALUES ($1, $2, $3) RETURNING ${COLUMNS}`,
    [id, permission.name, permission.description ?? null]
  );
  if (!rows.ok) return rows;
  return requireRow(rows.value, RESOURCE, id);
}

async function updateRow(
  tx: Transaction,
  operation: string,
  id: string,
  update: PermissionUpdate
): DataAccessResult<PermissionRow> {
  const rows = await runQuery<PermissionRow>(
    tx,
    operation,
    `UPDATE permissions SET name = $2, description = $3 WHERE id = $1 RETURNING ${COLUMNS}`,
    [id, update.name, update.description]
  );
  if (!rows.ok) return rows;
  return requireRow(rows.value, RESOURCE, id);
}

/** Insert with a fresh id */
export async function insertPermission(tx: Transaction, permission: NewPermission): DataAccessResult<PermissionRow> {
  return mutate(tx, 'insertPermission', (owned) => insertRow(owned, 'insertPermission', randomUUID(), permission));
}

export async function updatePermission(
  tx: Transaction,
  id: string,
  update: PermissionUpdate
): DataAccessResult<PermissionRow> {
  return mutate(tx, 'updatePermission', (owned) => updateRow(owned, 'updatePermission', id, update));
}

/**
 * Update the permission with the given id, or insert it under that id
 * (a fresh one when none is given).
 */
export async function savePermission(tx: Transaction, permission: NewPermission): DataAccessResult<PermissionRow> {
  return mutate(tx, 'savePermission', async (owned) => {
    const id = permission.id ?? randomUUID();
    const existing = await getPermissionById(owned, id);
    if (!existing.ok) return existing;
    return existing.value
      ? updateRow(owned, 'savePermission', id, {
          name: permission.name,
          description: permission.description ?? null,
        })
      : insertRow(owned, 'savePermission', id, permission);
  });
}

export async function deletePermissionById(tx: Transaction, id: string): DataAccessResult<PermissionRow> {
  return deleteById<PermissionRow>(tx, 'deletePermissionById', RESOURCE, 'permissions', COLUMNS, id);
}

export async function deletePermissionsByIds(
  tx: Transaction,
  ids: readonly string[]
): DataAccessResult<PermissionRow[]> {
  return deleteByIds<PermissionRow>(tx, 'deletePermissionsByIds', 'permissions', COLUMNS, ids);
}
