import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MemorySessionStore } from './session-store.js';

describe('MemorySessionStore', () => {
  let clock: number;
  let store: MemorySessionStore;

  beforeEach(() => {
    clock = Date.UTC(2026, 0, 1);
    store = new MemorySessionStore({ ttlHours: 1, cleanupIntervalMs: 0, now: () => clock });
  });

  afterEach(() => {
    store.dispose();
  });

  it('creates a session with a 64-character hex token', async () => {
    const session = await store.create({ userId: 'u1', username: 'alice' });
    expect(session.token).toMatch(/^[0-9a-f]{64}$/);
    expect(session.userId).toBe('u1');
    expect(session.username).toBe('alice');
    expect(session.expiresAt.getTime() - session.createdAt.getTime()).toBe(3_600_000);
  });

  it('returns a live session by token', async () => {
    const session = await store.create({ userId: 'u1', username: 'alice' });
    expect(await store.get(session.token)).toEqual(session);
  });

  it('returns null for unknown tokens', async () => {
    expect(await store.get('missing')).toBeNull();
  });

  it('expires sessions after the TTL', async () => {
    const session = await store.create({ userId: 'u1', username: 'alice' });
    clock += 3_600_000;
    expect(await store.get(session.token)).toBeNull();
    expect(store.size).toBe(0);
  });

  it('deletes a session', async () => {
    const session = await store.create({ userId: 'u1', username: 'alice' });
    expect(await store.delete(session.token)).toBe(true);
    expect(await store.delete(session.token)).toBe(false);
    expect(await store.get(session.token)).toBeNull();
  });

  it('purges only expired sessions', async () => {
    await store.create({ userId: 'u1', username: 'alice' });
    clock += 30 * 60_000;
    const fresh = await store.create({ userId: 'u2', username: 'bob' });
    clock += 31 * 60_000;

    expect(await store.purgeExpired()).toBe(1);
    expect(store.size).toBe(1);
    expect(await store.get(fresh.token)).not.toBeNull();
  });
});
