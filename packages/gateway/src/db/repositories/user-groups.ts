/**
 * User groups data access
 */

import { randomUUID } from 'node:crypto';
import { ok, type LinkConfig, type Query, type UserGroupFilter } from '@gatehouse/core';
import type { Transaction } from '../transaction.js';
import type { NewUserGroup, UserGroupRow, UserGroupUpdate } from '../../models/user-group.js';
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

const RESOURCE = 'UserGroup';
const COLUMNS = 'id, group_name, created_at';

export const USER_GROUP_SORT_COLUMNS = ['id', 'group_name', 'created_at'] as const;

const listSpec: ListSpec<UserGroupFilter> = {
  operation: 'listUserGroups',
  table: 'user_groups',
  columns: COLUMNS,
  primaryKey: ['id'],
  sortable: USER_GROUP_SORT_COLUMNS,
  where: (params, filter) => textContains(params, 'group_name', filter?.groupName),
};

export async function listUserGroups(
  tx: Transaction,
  query: Query<UserGroupFilter>,
  links: LinkConfig
): ListResult<UserGroupRow> {
  return paginatedQuery<UserGroupRow, UserGroupFilter>(tx, listSpec, query, links);
}

export async function getUserGroupById(tx: Transaction, id: string): DataAccessResult<UserGroupRow | null> {
  return runQueryOne<UserGroupRow>(tx, 'getUserGroupById', `SELECT ${COLUMNS} FROM user_groups WHERE id = $1`, [id]);
}

export async function getUserGroupByName(tx: Transaction, groupName: string): DataAccessResult<UserGroupRow | null> {
  return runQueryOne<UserGroupRow>(
    tx,
    'getUserGroupByName',
    `SELECT ${COLUMNS} FROM user_groups WHERE group_name = $1`,
    [groupName]
  );
}

async function insertRow(tx: Transaction, operation: string, id: string, group: NewUserGroup): DataAccessResult<UserGroupRow> {
  const rows = await runQuery<UserGroupRow>(
    tx,
    operation,
    `INSERT INTO user_groups (id, group_name) VALUES ($1, $2) RETURNING ${COLUMNS}`,
    [id, group.group_name]
  );
  if (!rows.ok) return rows;
  return requireRow(rows.value, RESOURCE, id);
}

async function updateRow(tx: Transaction, operation: string, id: string, update: UserGroupUpdate): DataAccessResult<UserGroupRow> {
  const rows = await runQuery<UserGroupRow>(
    tx,
    operation,
    `UPDATE user_groups SET group_name = $2 WHERE id = $1 RETURNING ${COLUMNS}`,
    [id, update.group_name]
  );
  if (!rows.ok) return rows;
  return requireRow(rows.value, RESOURCE, id);
}

/** Insert with a fresh id */
export async function insertUserGroup(tx: Transaction, group: NewUserGroup): DataAccessResult<UserGroupRow> {
  return mutate(tx, 'insertUserGroup', (owned) => insertRow(owned, 'insertUserGroup', randomUUID(), group));
}

export async function updateUserGroup(tx: Transaction, id: string, update: UserGroupUpdate): DataAccessResult<UserGroupRow> {
  return mutate(tx, 'updateUserGroup', (owned) => updateRow(owned, 'updateUserGroup', id, update));
}

/**
 * Update the group with the given id, or insert it under that id
 * (a fresh one when none is given).
 */
export async function saveUserGroup(tx: Transaction, group: NewUserGroup): DataAccessResult<UserGroupRow> {
  return mutate(tx, 'saveUserGroup', async (owned) => {
    const id = group.id ?? randomUUID();
    const existing = await getUserGroupById(owned, id);
    if (!existing.ok) return existing;
    return existing.value
      ? updateRow(owned, 'saveUserGroup', id, group)
      : insertRow(owned, 'saveUserGroup', id, group);
  });
}

export async function deleteUserGroupById(tx: Transaction, id: string): DataAccessResult<UserGroupRow> {
  return deleteById<UserGroupRow>(tx, 'deleteUserGroupById', RESOURCE, 'user_groups', COLUMNS, id);
}

export async function deleteUserGroupsByIds(tx: Transaction, ids: readonly string[]): DataAccessResult<UserGroupRow[]> {
  return deleteByIds<UserGroupRow>(tx, 'deleteUserGroupsByIds', 'user_groups', COLUMNS, ids);
}
