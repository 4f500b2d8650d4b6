/**
 * Permission
 */

import { toIsoString } from './timestamps.js';

export type PermissionRow = {
  id: string;
  name: string;
  description: string | null;
  created_at: Date;
};

export interface PermissionResponse {
  id: string;
  name: string;
  description: string | null;
  created_at: string;
}

export interface NewPermission {
  /** Honored by savePermission; generated when absent */
  id?: string;
  name: string;
  description?: string | null;
}

export interface PermissionUpdate {
  name: string;
  description: string | null;
}

export function toPermissionResponse(row: PermissionRow): PermissionResponse {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    created_at: toIsoString(row.created_at),
  };
}
