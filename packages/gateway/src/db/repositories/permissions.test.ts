import { describe, it, expect } from 'vitest';
import { createQuery, ok, unwrap, type PermissionFilter } from '@gatehouse/core';
import {
  deletePermissionsByIds,
  getPermissionById,
  getPermissionByName,
  listPermissions,
  savePermission,
  updatePermission,
} from './permissions.js';
import { createFakeClient, createFakeTransaction } from '../../test-helpers.js';

const links = { baseUrl: 'http://h/api', collectionPath: 'permissions' };
const read = {
  id: 'p1',
  name: 'users.read',
  description: null,
  created_at: new Date('2026-03-01T10:00:00.000Z'),
};

describe('permissions', () => {
  it('filters by a name substring', async () => {
    const client = createFakeClient().respond([{ total: 1 }]).respond([read]);
    const query = unwrap(createQuery<PermissionFilter>({ filter: { kind: 'permission', name: 'read' } }));

    const page = unwrap(await listPermissions(createFakeTransaction(client), query, links));

    expect(page.data).toEqual([read]);
    expect(client.calls[1]).toEqual({
      sql: "SELECT id, name, description, created_at FROM permissions WHERE ($1::text IS NULL OR name ILIKE '%' || $1 || '%') ORDER BY id ASC LIMIT $2 OFFSET $3",
      params: ['read', 10, 0],
    });
  });

  it('get by id returns null when absent', async () => {
    expect(await getPermissionById(createFakeTransaction(), 'p9')).toEqual(ok(null));
  });

  it('looks a permission up by name without closing the transaction', async () => {
    const client = createFakeClient().respond([read]);
    const tx = createFakeTransaction(client);

    const result = await getPermissionByName(tx, 'users.read');

    expect(unwrap(result)).toEqual(read);
    expect(client.calls).toEqual([
      { sql: 'SELECT id, name, description, created_at FROM permissions WHERE name = $1', params: ['users.read'] },
    ]);
    expect(tx.isOpen).toBe(true);
  });

  it('update writes both columns', async () => {
    const client = createFakeClient().respond([read]);

    await updatePermission(createFakeTransaction(client), 'p1', { name: 'users.read', description: 'Read users' });

    expect(client.calls[0]?.params).toEqual(['p1', 'users.read', 'Read users']);
    expect(client.statements()[1]).toBe('COMMIT');
  });

  it('save inserts a missing permission with a null description', async () => {
    const client = createFakeClient().respond([]).respond([read]);

    await savePermission(createFakeTransaction(client), { id: 'p1', name: 'users.read' });

    expect(client.calls[1]).toEqual({
      sql: 'INSERT INTO permissions (id, name, description) VALUES ($1, $2, $3) RETURNING id, name, description, created_at',
      params: ['p1', 'users.read', null],
    });
  });

  it('bulk delete of nothing commits without a statement', async () => {
    const client = createFakeClient();

    expect(await deletePermissionsByIds(createFakeTransaction(client), [])).toEqual(ok([]));
    expect(client.statements()).toEqual(['COMMIT']);
  });
});
