/**
 * User group
 */

import { toIsoString } from './timestamps.js';

export type UserGroupRow = {
  id: string;
  group_name: string;
  created_at: Date;
};

export interface UserGroupResponse {
  id: string;
  group_name: string;
  created_at: string;
}

export interface NewUserGroup {
  /** Honored by saveUserGroup; generated when absent */
  id?: string;
  group_name: string;
}

export interface UserGroupUpdate {
  group_name: string;
}

export function toUserGroupResponse(row: UserGroupRow): UserGroupResponse {
  return {
    id: row.id,
    group_name: row.group_name,
    created_at: toIsoString(row.created_at),
  };
}
