import { describe, it, expect } from 'vitest';
import {
  toIsoString,
  toUserGroupResponse,
  toUserResponse,
  toPermissionResponse,
  toGroupPermissionResponse,
  toUserPermissionResponse,
  toContentResponse,
} from './index.js';

const created = new Date('2026-03-01T10:00:00.000Z');

describe('toIsoString', () => {
  it('renders Dates and timestamp strings as ISO-8601', () => {
    expect(toIsoString(created)).toBe('2026-03-01T10:00:00.000Z');
    expect(toIsoString('2026-03-01T11:00:00+01:00')).toBe('2026-03-01T10:00:00.000Z');
  });

  it('keeps null', () => {
    expect(toIsoString(null)).toBeNull();
  });
});

describe('response projections', () => {
  it('user group', () => {
    expect(toUserGroupResponse({ id: 'g1', group_name: 'Admins', created_at: created })).toEqual({
      id: 'g1',
      group_name: 'Admins',
      created_at: '2026-03-01T10:00:00.000Z',
    });
  });

  it('user omits the password hash', () => {
    const response = toUserResponse({
      id: 'u1',
      username: 'alice',
      password_hash: 'salt:hash',
      created_at: created,
      user_group_id: null,
    });
    expect(response).toEqual({
      id: 'u1',
      username: 'alice',
      created_at: '2026-03-01T10:00:00.000Z',
      user_group_id: null,
    });
    expect('password_hash' in response).toBe(false);
  });

  it('permission keeps a null description', () => {
    expect(
      toPermissionResponse({ id: 'p1', name: 'users.read', description: null, created_at: created })
    ).toEqual({ id: 'p1', name: 'users.read', description: null, created_at: '2026-03-01T10:00:00.000Z' });
  });

  it('permission links', () => {
    expect(toGroupPermissionResponse({ group_id: 'g1', permission_id: 'p1', created_at: created })).toEqual({
      group_id: 'g1',
      permission_id: 'p1',
      created_at: '2026-03-01T10:00:00.000Z',
    });
    expect(toUserPermissionResponse({ user_id: 'u1', permission_id: 'p1', created_at: created })).toEqual({
      user_id: 'u1',
      permission_id: 'p1',
      created_at: '2026-03-01T10:00:00.000Z',
    });
  });

  it('content', () => {
    const updated = new Date('2026-03-02T08:30:00.000Z');
    expect(
      toContentResponse({ id: 'c1', body: 'hello', created_at: created, updated_at: updated, author_id: 'u1' })
    ).toEqual({
      id: 'c1',
      body: 'hello',
      created_at: '2026-03-01T10:00:00.000Z',
      updated_at: '2026-03-02T08:30:00.000Z',
      author_id: 'u1',
    });
  });
});
