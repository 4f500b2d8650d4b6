import { describe, it, expect } from 'vitest';
import { NotFoundError, createQuery, ok, unwrap, type GroupPermissionFilter } from '@gatehouse/core';
import {
  deleteGroupPermission,
  deleteGroupPermissionsByGroupId,
  groupPermissionExists,
  insertGroupPermission,
  listGroupPermissions,
  listGroupPermissionsByPermissionId,
} from './group-permissions.js';
import { createFakeClient, createFakeTransaction } from '../../test-helpers.js';

const links = { baseUrl: 'http://h/api', collectionPath: 'group_permissions' };
const link = { group_id: 'g1', permission_id: 'p1', created_at: new Date('2026-03-01T10:00:00.000Z') };
const WHERE = '($1::uuid IS NULL OR group_id = $1) AND ($2::uuid IS NULL OR permission_id = $2)';

describe('group permissions', () => {
  it('orders by the composite key by default', async () => {
    const client = createFakeClient().respond([{ total: '1' }]).respond([link]);

    await listGroupPermissions(createFakeTransaction(client), unwrap(createQuery<GroupPermissionFilter>()), links);

    expect(client.calls[1]).toEqual({
      sql: `SELECT group_id, permission_id, created_at FROM group_permissions WHERE ${WHERE} ORDER BY group_id ASC, permission_id ASC LIMIT $3 OFFSET $4`,
      params: [null, null, 10, 0],
    });
  });

  it('lists by permission keeping the requested page', async () => {
    const client = createFakeClient().respond([{ total: '30' }]).respond([link]);
    const query = unwrap(createQuery<GroupPermissionFilter>({ page: 3, size: 5 }));

    const page = unwrap(await listGroupPermissionsByPermissionId(createFakeTransaction(client), 'p1', query, links));

    expect(client.calls[0]?.params).toEqual([null, 'p1']);
    expect(client.calls[1]?.params).toEqual([null, 'p1', 5, 10]);
    expect(page.pagination?.prev_page).toBe('http://h/api/group_permissions?page=2&size=5');
    expect(page.pagination?.next_page).toBe('http://h/api/group_permissions?page=4&size=5');
  });

  it('checks existence', async () => {
    const client = createFakeClient().respond([{ found: true }]);

    expect(await groupPermissionExists(createFakeTransaction(client), link)).toEqual(ok(true));
    expect(client.calls[0]?.params).toEqual(['g1', 'p1']);
  });

  it('inserts a link and commits', async () => {
    const client = createFakeClient().respond([link]);

    expect(unwrap(await insertGroupPermission(createFakeTransaction(client), link))).toEqual(link);
    expect(client.statements()).toEqual([
      'INSERT INTO group_permissions (group_id, permission_id) VALUES ($1, $2) RETURNING group_id, permission_id, created_at',
      'COMMIT',
    ]);
  });

  it('deleting a missing link fails and rolls back', async () => {
    const client = createFakeClient();

    const result = await deleteGroupPermission(createFakeTransaction(client), { group_id: 'g1', permission_id: 'p2' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(result.error.message).toBe('GroupPermission not found: g1/p2');
    }
    expect(client.statements()[1]).toBe('ROLLBACK');
  });

  it('deletes every link of a group', async () => {
    const other = { ...link, permission_id: 'p2' };
    const client = createFakeClient().respond([link, other]);

    expect(await deleteGroupPermissionsByGroupId(createFakeTransaction(client), 'g1')).toEqual(ok([link, other]));
    expect(client.statements()).toEqual([
      'DELETE FROM group_permissions WHERE group_id = $1 RETURNING group_id, permission_id, created_at',
      'COMMIT',
    ]);
  });
});
