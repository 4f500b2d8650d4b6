/**
 * Session store
 *
 * Sessions map an opaque token to the identity that logged in. The store
 * is an interface so a shared backend can replace the in-process map when
 * the gateway runs as more than one process.
 */

import { randomBytes } from 'node:crypto';
import { MS_PER_HOUR, SESSION_CLEANUP_INTERVAL_MS, SESSION_TOKEN_BYTES } from '../config/defaults.js';
import { getLog } from './log.js';

const log = getLog('Sessions');

export interface SessionData {
  userId: string;
  username: string;
}

export interface Session extends SessionData {
  token: string;
  createdAt: Date;
  expiresAt: Date;
}

export interface SessionStore {
  create(data: SessionData): Promise<Session>;
  /** Returns null for unknown or expired tokens */
  get(token: string): Promise<Session | null>;
  /** Returns whether a session was removed */
  delete(token: string): Promise<boolean>;
  /** Remove expired sessions, returning how many were removed */
  purgeExpired(): Promise<number>;
}

export interface MemorySessionStoreOptions {
  ttlHours: number;
  /** Interval for purgeExpired(); 0 disables the timer */
  cleanupIntervalMs?: number;
  now?: () => number;
}

/**
 * In-process session store with TTL expiry.
 */
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private cleanupTimer: NodeJS.Timeout | null = null;

  constructor(options: MemorySessionStoreOptions) {
    this.ttlMs = options.ttlHours * MS_PER_HOUR;
    this.now = options.now ?? Date.now;

    const interval = options.cleanupIntervalMs ?? SESSION_CLEANUP_INTERVAL_MS;
    if (interval > 0) {
      this.cleanupTimer = setInterval(() => {
        void this.purgeExpired();
      }, interval);
      this.cleanupTimer.unref();
    }
  }

  async create(data: SessionData): Promise<Session> {
    const createdAt = this.now();
    const session: Session = {
      token: randomBytes(SESSION_TOKEN_BYTES).toString('hex'),
      userId: data.userId,
      username: data.username,
      createdAt: new Date(createdAt),
      expiresAt: new Date(createdAt + this.ttlMs),
    };
    this.sessions.set(session.token, session);
    log.info('Session created', { userId: data.userId, sessionCount: this.sessions.size });
    return session;
  }

  async get(token: string): Promise<Session | null> {
    const session = this.sessions.get(token);
    if (!session) return null;

    if (session.expiresAt.getTime() <= this.now()) {
      this.sessions.delete(token);
      return null;
    }
    return session;
  }

  async delete(token: string): Promise<boolean> {
    return this.sessions.delete(token);
  }

  async purgeExpired(): Promise<number> {
    const now = this.now();
    let removed = 0;
    for (const [token, session] of this.sessions) {
      if (session.expiresAt.getTime() <= now) {
        this.sessions.delete(token);
        removed++;
      }
    }
    if (removed > 0) {
      log.debug('Expired sessions purged', { removed, remaining: this.sessions.size });
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Stop the cleanup timer */
  dispose(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }
}
