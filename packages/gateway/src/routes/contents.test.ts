/**
 * Content Routes Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Hono } from 'hono';
import { NotFoundError, createEnvelope, createPagination, err, ok } from '@gatehouse/core';

const repo = vi.hoisted(() => ({
  listContents: vi.fn(),
  getContentById: vi.fn(),
  insertContent: vi.fn(),
  updateContent: vi.fn(),
  deleteContentById: vi.fn(),
  deleteContentsByIds: vi.fn(),
}));

vi.mock('../db/repositories/contents.js', () => repo);

import { createContentRoutes } from './contents.js';
import { loadSettings } from '../config/settings.js';
import { errorHandler } from '../middleware/error-handler.js';
import { createFakeAdapter } from '../test-helpers.js';

const CONTENT_ID = '3d2e1f0a-0000-4000-8000-000000000001';
const AUTHOR_ID = '0b6e7c1a-0000-4000-8000-000000000001';
const note = {
  id: CONTENT_ID,
  body: 'hello',
  created_at: new Date('2026-03-01T10:00:00.000Z'),
  updated_at: new Date('2026-03-02T10:00:00.000Z'),
  author_id: AUTHOR_ID,
};

function jsonRequest(method: string, body: unknown): RequestInit {
  return { method, body: JSON.stringify(body), headers: { 'Content-Type': 'application/json' } };
}

describe('Content Routes', () => {
  let app: Hono;

  beforeEach(() => {
    vi.clearAllMocks();
    app = new Hono();
    app.onError(errorHandler);
    app.route('/api/contents', createContentRoutes({ db: createFakeAdapter(), settings: loadSettings({}) }));
  });

  it('lists by author with page links', async () => {
    const links = { baseUrl: 'http://127.0.0.1:8000/api', collectionPath: 'contents' };
    repo.listContents.mockResolvedValue(ok(createEnvelope([note], createPagination(1, 10, 1, links))));

    const res = await app.request(`/api/contents?author_id=${AUTHOR_ID}`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: [
        {
          id: CONTENT_ID,
          body: 'hello',
          created_at: '2026-03-01T10:00:00.000Z',
          updated_at: '2026-03-02T10:00:00.000Z',
          author_id: AUTHOR_ID,
        },
      ],
      pagination: { page: 1, size: 10, total: 1, prev_page: null, next_page: null },
    });
    expect(repo.listContents.mock.calls[0]?.[1].filter).toEqual({ kind: 'content', authorId: AUTHOR_ID });
  });

  it('creates with 201', async () => {
    repo.insertContent.mockResolvedValue(ok(note));

    const res = await app.request('/api/contents', jsonRequest('POST', { body: 'hello', author_id: AUTHOR_ID }));

    expect(res.status).toBe(201);
    expect(repo.insertContent.mock.calls[0]?.[1]).toEqual({ body: 'hello', author_id: AUTHOR_ID });
  });

  it('rejects an empty body', async () => {
    const res = await app.request('/api/contents', jsonRequest('POST', { body: '' }));

    expect(res.status).toBe(400);
    expect((await res.json()).error.message).toBe(
      'Validation failed: body: String must contain at least 1 character(s)'
    );
    expect(repo.insertContent).not.toHaveBeenCalled();
  });

  it('updates by path id', async () => {
    repo.updateContent.mockResolvedValue(ok({ ...note, body: 'edited' }));

    const res = await app.request(`/api/contents/${CONTENT_ID}`, jsonRequest('PUT', { body: 'edited' }));

    expect(res.status).toBe(200);
    expect((await res.json()).data.body).toBe('edited');
    expect(repo.updateContent.mock.calls[0]?.slice(1)).toEqual([CONTENT_ID, { body: 'edited' }]);
  });

  it('answers 404 when updating a missing row', async () => {
    repo.updateContent.mockResolvedValue(err(new NotFoundError('Content', CONTENT_ID)));

    const res = await app.request(`/api/contents/${CONTENT_ID}`, jsonRequest('PUT', { body: 'edited' }));

    expect(res.status).toBe(404);
    expect((await res.json()).error).toEqual({ code: 'NOT_FOUND', message: `Content not found: ${CONTENT_ID}` });
  });

  it('get answers 404 for no row', async () => {
    repo.getContentById.mockResolvedValue(ok(null));

    const res = await app.request(`/api/contents/${CONTENT_ID}`);

    expect(res.status).toBe(404);
  });
});
