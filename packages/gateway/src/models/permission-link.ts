/**
 * Permission links
 *
 * Group-permission and user-permission rows are plain join rows keyed by
 * both ids.
 */

import { toIsoString } from './timestamps.js';

export type GroupPermissionRow = {
  group_id: string;
  permission_id: string;
  created_at: Date;
};

export type UserPermissionRow = {
  user_id: string;
  permission_id: string;
  created_at: Date;
};

export interface GroupPermissionResponse {
  group_id: string;
  permission_id: string;
  created_at: string;
}

export interface UserPermissionResponse {
  user_id: string;
  permission_id: string;
  created_at: string;
}

export interface GroupPermissionKey {
  group_id: string;
  permission_id: string;
}

export interface UserPermissionKey {
  user_id: string;
  permission_id: string;
}

export function toGroupPermissionResponse(row: GroupPermissionRow): GroupPermissionResponse {
  return {
    group_id: row.group_id,
    permission_id: row.permission_id,
    created_at: toIsoString(row.created_at),
  };
}

export function toUserPermissionResponse(row: UserPermissionRow): UserPermissionResponse {
  return {
    user_id: row.user_id,
    permission_id: row.permission_id,
    created_at: toIsoString(row.created_at),
  };
}
