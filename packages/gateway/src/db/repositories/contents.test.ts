import { describe, it, expect } from 'vitest';
import { createQuery, unwrap, type ContentFilter } from '@gatehouse/core';
import { deleteContentById, insertContent, listContents, updateContent } from './contents.js';
import { createFakeClient, createFakeTransaction } from '../../test-helpers.js';

const links = { baseUrl: 'http://h/api', collectionPath: 'contents' };
const COLUMNS = 'id, body, created_at, updated_at, author_id';
const note = {
  id: 'c1',
  body: 'hello',
  created_at: new Date('2026-03-01T10:00:00.000Z'),
  updated_at: new Date('2026-03-01T10:00:00.000Z'),
  author_id: 'u1',
};

describe('contents', () => {
  it('filters by author', async () => {
    const client = createFakeClient().respond([{ total: '1' }]).respond([note]);
    const query = unwrap(createQuery<ContentFilter>({ filter: { kind: 'content', authorId: 'u1' } }));

    const page = unwrap(await listContents(createFakeTransaction(client), query, links));

    expect(page.pagination?.total).toBe(1);
    expect(client.calls[1]?.sql).toBe(
      `SELECT ${COLUMNS} FROM contents WHERE ($1::uuid IS NULL OR author_id = $1) ORDER BY id ASC LIMIT $2 OFFSET $3`
    );
  });

  it('inserts without an author', async () => {
    const client = createFakeClient().respond([{ ...note, author_id: null }]);

    await insertContent(createFakeTransaction(client), { body: 'hello' });

    expect(client.calls[0]?.params.slice(1)).toEqual(['hello', null]);
    expect(client.statements()[1]).toBe('COMMIT');
  });

  it('update bumps updated_at', async () => {
    const client = createFakeClient().respond([note]);

    await updateContent(createFakeTransaction(client), 'c1', { body: 'edited' });

    expect(client.calls[0]).toEqual({
      sql: `UPDATE contents SET body = $2, updated_at = NOW() WHERE id = $1 RETURNING ${COLUMNS}`,
      params: ['c1', 'edited'],
    });
  });

  it('delete returns the removed row', async () => {
    const client = createFakeClient().respond([note]);

    expect(unwrap(await deleteContentById(createFakeTransaction(client), 'c1'))).toEqual(note);
    expect(client.statements()[1]).toBe('COMMIT');
  });
});
