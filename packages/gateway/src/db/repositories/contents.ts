/**
 * Contents data access
 */

import { randomUUID } from 'node:crypto';
import type { ContentFilter, LinkConfig, Query } from '@gatehouse/core';
import type { Transaction } from '../transaction.js';
import type { ContentRow, ContentUpdate, NewContent } from '../../models/content.js';
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

const RESOURCE = 'Content';
const COLUMNS = 'id, body, created_at, updated_at, author_id';

export const CONTENT_SORT_COLUMNS = ['id', 'created_at', 'updated_at', 'author_id'] as const;

const listSpec: ListSpec<ContentFilter> = {
  operation: 'listContents',
  table: 'contents',
  columns: COLUMNS,
  primaryKey: ['id'],
  sortable: CONTENT_SORT_COLUMNS,
  where: (params, filter) => uuidEquals(params, 'author_id', filter?.authorId),
};

export async function listContents(
  tx: Transaction,
  query: Query<ContentFilter>,
  links: LinkConfig
): ListResult<ContentRow> {
  return paginatedQuery<ContentRow, ContentFilter>(tx, listSpec, query, links);
}

export async function getContentById(tx: Transaction, id: string): DataAccessResult<ContentRow | null> {
  return runQueryOne<ContentRow>(tx, 'getContentById', `SELECT ${COLUMNS} FROM contents WHERE id = $1`, [id]);
}

export async function insertContent(tx: Transaction, content: NewContent): DataAccessResult<ContentRow> {
  const id = randomUUID();
  return mutate(tx, 'insertContent', async (owned) => {
    const rows = await runQuery<ContentRow>(
      owned,
      'insertContent',
      `INSERT INTO contents (id, body, author_id) VALUES ($1, $2, $3) RETURNING ${COLUMNS}`,
      [id, content.body, content.author_id ?? null]
    );
    if (!rows.ok) return rows;
    return requireRow(rows.value, RESOURCE, id);
  });
}

/** Replace the body and bump updated_at */
export async function updateContent(tx: Transaction, id: string, update: ContentUpdate): DataAccessResult<ContentRow> {
  return mutate(tx, 'updateContent', async (owned) => {
    const rows = await runQuery<ContentRow>(
      owned,
      'updateContent',
      `UPDATE contents SET body = $2, updated_at = NOW() WHERE id = $1 RETURNING ${COLUMNS}`,
      [id, update.body]
    );
    if (!rows.ok) return rows;
    return requireRow(rows.value, RESOURCE, id);
  });
}

export async function deleteContentById(tx: Transaction, id: string): DataAccessResult<ContentRow> {
  return deleteById<ContentRow>(tx, 'deleteContentById', RESOURCE, 'contents', COLUMNS, id);
}

export async function deleteContentsByIds(tx: Transaction, ids: readonly string[]): DataAccessResult<ContentRow[]> {
  return deleteByIds<ContentRow>(tx, 'deleteContentsByIds', 'contents', COLUMNS, ids);
}
