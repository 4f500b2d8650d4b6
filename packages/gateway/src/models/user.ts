/**
 * User
 *
 * The stored row carries the password hash; the response projection never does.
 */

import { toIsoString } from './timestamps.js';

export type UserRow = {
  id: string;
  username: string;
  password_hash: string;
  created_at: Date;
  user_group_id: string | null;
};

export interface UserResponse {
  id: string;
  username: string;
  created_at: string;
  user_group_id: string | null;
}

export interface NewUser {
  /** Honored by saveUser; generated when absent */
  id?: string;
  username: string;
  password_hash: string;
  user_group_id?: string | null;
}

export interface UserUpdate {
  username: string;
  user_group_id: string | null;
  /** Omit to keep the stored hash */
  password_hash?: string;
}

export function toUserResponse(row: UserRow): UserResponse {
  return {
    id: row.id,
    username: row.username,
    created_at: toIsoString(row.created_at),
    user_group_id: row.user_group_id,
  };
}
