/**
 * User Group Routes Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Hono } from 'hono';
import {
  NotFoundError,
  StoreError,
  ValidationError,
  createEnvelope,
  createPagination,
  err,
  ok,
} from '@gatehouse/core';

const repo = vi.hoisted(() => ({
  listUserGroups: vi.fn(),
  getUserGroupById: vi.fn(),
  insertUserGroup: vi.fn(),
  saveUserGroup: vi.fn(),
  deleteUserGroupById: vi.fn(),
  deleteUserGroupsByIds: vi.fn(),
}));

vi.mock('../db/repositories/user-groups.js', () => repo);

import { createUserGroupRoutes } from './user-groups.js';
import { loadSettings } from '../config/settings.js';
import { requestContext } from '../middleware/request-context.js';
import { errorHandler } from '../middleware/error-handler.js';
import { createFakeAdapter, type FakeAdapter } from '../test-helpers.js';

const GROUP_ID = '6f1c2d9e-0000-4000-8000-000000000001';
const OTHER_ID = '6f1c2d9e-0000-4000-8000-000000000002';
const admins = { id: GROUP_ID, group_name: 'Admins', created_at: new Date('2026-03-01T10:00:00.000Z') };
const adminsJson = { id: GROUP_ID, group_name: 'Admins', created_at: '2026-03-01T10:00:00.000Z' };
const settings = loadSettings({});
const links = { baseUrl: 'http://127.0.0.1:8000/api', collectionPath: 'user_groups' };

function createApp(db: FakeAdapter) {
  const app = new Hono();
  app.use('*', requestContext);
  app.onError(errorHandler);
  app.route('/api/user_groups', createUserGroupRoutes({ db, settings }));
  return app;
}

function jsonRequest(method: string, body: unknown): RequestInit {
  return { method, body: JSON.stringify(body), headers: { 'Content-Type': 'application/json' } };
}

describe('User Group Routes', () => {
  let db: FakeAdapter;
  let app: Hono;

  beforeEach(() => {
    vi.clearAllMocks();
    db = createFakeAdapter();
    app = createApp(db);
  });

  describe('GET /', () => {
    it('returns the page envelope with links', async () => {
      repo.listUserGroups.mockResolvedValue(ok(createEnvelope([admins], createPagination(2, 5, 6, links))));

      const res = await app.request('/api/user_groups?page=2&size=5&group_name=adm');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: [adminsJson],
        pagination: {
          page: 2,
          size: 5,
          total: 6,
          prev_page: 'http://127.0.0.1:8000/api/user_groups?page=1&size=5',
          next_page: null,
        },
      });
      const [, query, passedLinks] = repo.listUserGroups.mock.calls[0] ?? [];
      expect(query.offset()).toBe(5);
      expect(query.filter).toEqual({ kind: 'userGroup', groupName: 'adm' });
      expect(passedLinks).toEqual(links);
    });

    it('rejects an oversized page before touching the store', async () => {
      const res = await app.request('/api/user_groups?size=500');

      expect(res.status).toBe(400);
      expect((await res.json()).error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'size must not exceed 100, got 500',
      });
      expect(repo.listUserGroups).not.toHaveBeenCalled();
      expect(db.begin).not.toHaveBeenCalled();
    });

    it('rejects a page whose offset cannot be bound as an integer', async () => {
      const res = await app.request('/api/user_groups?page=1000000000000000000000');

      expect(res.status).toBe(400);
      expect((await res.json()).error).toEqual({ code: 'VALIDATION_ERROR', message: 'page 1e+21 is out of range' });
      expect(repo.listUserGroups).not.toHaveBeenCalled();
      expect(db.begin).not.toHaveBeenCalled();
    });

    it('maps an unknown sort column to 400', async () => {
      repo.listUserGroups.mockResolvedValue(
        err(new ValidationError('Unknown sort column: secret. Allowed: id, group_name, created_at'))
      );

      const res = await app.request('/api/user_groups?sort=secret');

      expect(res.status).toBe(400);
      expect(repo.listUserGroups.mock.calls[0]?.[1].sort).toBe('secret');
    });
  });

  describe('GET /:id', () => {
    it('returns one group with null pagination', async () => {
      repo.getUserGroupById.mockResolvedValue(ok(admins));

      const res = await app.request(`/api/user_groups/${GROUP_ID}`);

      expect(await res.json()).toEqual({ data: adminsJson, pagination: null });
      expect(db.opened[0]?.status).toBe('rolled_back');
    });

    it('answers 404 when the group does not exist', async () => {
      repo.getUserGroupById.mockResolvedValue(ok(null));

      const res = await app.request(`/api/user_groups/${GROUP_ID}`);

      expect(res.status).toBe(404);
      expect((await res.json()).error.message).toBe(`UserGroup not found: ${GROUP_ID}`);
    });

    it('rejects an id that is not a UUID', async () => {
      const res = await app.request('/api/user_groups/42');

      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe('id must be a UUID');
    });
  });

  describe('POST /', () => {
    it('inserts and answers 201', async () => {
      repo.insertUserGroup.mockResolvedValue(ok(admins));

      const res = await app.request('/api/user_groups', jsonRequest('POST', { group_name: 'Admins' }));

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({ data: adminsJson, pagination: null });
      expect(repo.insertUserGroup).toHaveBeenCalledWith(db.opened[0], { group_name: 'Admins' });
    });

    it('answers 409 on a duplicate name', async () => {
      repo.insertUserGroup.mockResolvedValue(
        err(new StoreError('insertUserGroup', 'duplicate key value', { driverCode: '23505' }))
      );

      const res = await app.request('/api/user_groups', jsonRequest('POST', { group_name: 'Admins' }));

      expect(res.status).toBe(409);
      expect((await res.json()).error.code).toBe('STORE_ERROR');
    });

    it('rejects malformed JSON', async () => {
      const res = await app.request('/api/user_groups', {
        method: 'POST',
        body: 'not json',
        headers: { 'Content-Type': 'application/json' },
      });

      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe('Invalid JSON in request body');
      expect(db.begin).not.toHaveBeenCalled();
    });

    it('rejects a missing group name', async () => {
      const res = await app.request('/api/user_groups', jsonRequest('POST', {}));

      expect(res.status).toBe(400);
      expect(repo.insertUserGroup).not.toHaveBeenCalled();
    });
  });

  it('PUT / saves with the supplied id', async () => {
    repo.saveUserGroup.mockResolvedValue(ok(admins));

    const res = await app.request('/api/user_groups', jsonRequest('PUT', { id: GROUP_ID, group_name: 'Admins' }));

    expect(res.status).toBe(200);
    expect(repo.saveUserGroup).toHaveBeenCalledWith(db.opened[0], { id: GROUP_ID, group_name: 'Admins' });
  });

  describe('DELETE', () => {
    it('answers 404 for a missing group', async () => {
      repo.deleteUserGroupById.mockResolvedValue(err(new NotFoundError('UserGroup', GROUP_ID)));

      const res = await app.request(`/api/user_groups/${GROUP_ID}`, { method: 'DELETE' });

      expect(res.status).toBe(404);
    });

    it('bulk delete returns the removed groups', async () => {
      repo.deleteUserGroupsByIds.mockResolvedValue(ok([admins]));

      const res = await app.request('/api/user_groups', jsonRequest('DELETE', [GROUP_ID, OTHER_ID]));

      expect(await res.json()).toEqual({ data: [adminsJson], pagination: null });
      expect(repo.deleteUserGroupsByIds).toHaveBeenCalledWith(db.opened[0], [GROUP_ID, OTHER_ID]);
    });

    it('bulk delete rejects ids that are not UUIDs', async () => {
      const res = await app.request('/api/user_groups', jsonRequest('DELETE', ['x']));

      expect(res.status).toBe(400);
      expect(repo.deleteUserGroupsByIds).not.toHaveBeenCalled();
    });
  });
});
