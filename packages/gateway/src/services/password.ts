/**
 * Password hashing
 *
 * scrypt with a random per-password salt, stored as `salt:hash` in hex.
 */

import { randomBytes, scryptSync, timingSafeEqual } from 'node:crypto';
import { PASSWORD_SALT_BYTES, SCRYPT_KEY_LENGTH } from '../config/defaults.js';

/**
 * Hash a password using scrypt. Returns `salt:hash` in hex.
 */
export function hashPassword(password: string): string {
  const salt = randomBytes(PASSWORD_SALT_BYTES).toString('hex');
  const hash = scryptSync(password, salt, SCRYPT_KEY_LENGTH).toString('hex');
  return `${salt}:${hash}`;
}

/**
 * Verify a password against a stored `salt:hash` string.
 * Malformed stored values never match.
 */
export function verifyPassword(password: string, stored: string): boolean {
  const [salt, storedHash, ...rest] = stored.split(':');
  if (!salt || !storedHash || rest.length > 0) return false;

  const storedBuf = Buffer.from(storedHash, 'hex');
  if (storedBuf.length !== SCRYPT_KEY_LENGTH) return false;

  const hashBuf = scryptSync(password, salt, SCRYPT_KEY_LENGTH);
  return timingSafeEqual(hashBuf, storedBuf);
}
