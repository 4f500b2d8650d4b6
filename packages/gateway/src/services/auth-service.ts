/**
 * Login and logout
 *
 * A login is two reads in one transaction that is never committed; the
 * session is written only after the transaction has been released.
 */

import {
  AuthenticationError,
  ValidationError,
  err,
  ok,
  type DataAccessError,
  type Result,
} from '@gatehouse/core';
import type { DatabaseAdapter } from '../db/adapters/types.js';
import { checkUserPassword, getUserByUsername } from '../db/repositories/users.js';
import type { Session, SessionData, SessionStore } from './session-store.js';
import { getLog } from './log.js';

const log = getLog('Auth');

export interface Credentials {
  username: string;
  password: string;
}

export type LoginError = ValidationError | AuthenticationError | DataAccessError;

/**
 * Verify credentials and open a session.
 *
 * Unknown username fails with ValidationError, a wrong password with
 * AuthenticationError.
 */
export async function login(
  db: DatabaseAdapter,
  sessions: SessionStore,
  credentials: Credentials
): Promise<Result<Session, LoginError>> {
  const identity = await db.read(async (tx): Promise<Result<SessionData, LoginError>> => {
    const user = await getUserByUsername(tx, credentials.username);
    if (!user.ok) return user;
    if (!user.value) return err(new ValidationError('invalid request', { field: 'username' }));

    const matches = await checkUserPassword(tx, user.value.id, credentials.password);
    if (!matches.ok) return matches;
    if (!matches.value) return err(new AuthenticationError('Invalid username or password'));

    return ok({ userId: user.value.id, username: user.value.username });
  });

  if (!identity.ok) {
    log.info('Login rejected', { username: credentials.username, code: identity.error.code });
    return identity;
  }

  const session = await sessions.create(identity.value);
  log.info('Login', { userId: session.userId });
  return ok(session);
}

/** Returns whether a session was removed */
export async function logout(sessions: SessionStore, token: string): Promise<boolean> {
  return sessions.delete(token);
}
