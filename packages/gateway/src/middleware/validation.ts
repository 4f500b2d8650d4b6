/**
 * Request validation using Zod
 *
 * Body schemas for every write endpoint. Validation runs before any
 * transaction is opened.
 */

import { z } from 'zod';
import { ValidationError } from '@gatehouse/core';
import { MAX_BULK_DELETE_IDS } from '../config/defaults.js';

const uuid = z.string().uuid();
const name = z.string().trim().min(1).max(255);
const password = z.string().min(1).max(1024);

// ─── User Groups ─────────────────────────────────────────────────

export const userGroupSchema = z.object({
  group_name: name,
});

export const saveUserGroupSchema = userGroupSchema.extend({
  id: uuid.optional(),
});

// ─── Users ───────────────────────────────────────────────────────

export const createUserSchema = z.object({
  username: name,
  password,
  user_group_id: uuid.nullable().optional(),
});

/** Omitting password keeps the stored one; omitting user_group_id clears it */
export const updateUserSchema = z.object({
  username: name,
  password: password.optional(),
  user_group_id: uuid.nullable().optional(),
});

export const saveUserSchema = createUserSchema.extend({
  id: uuid.optional(),
});

// ─── Permissions ─────────────────────────────────────────────────

export const permissionSchema = z.object({
  name,
  description: z.string().max(2000).nullable().optional(),
});

export const savePermissionSchema = permissionSchema.extend({
  id: uuid.optional(),
});

export const groupPermissionSchema = z.object({
  group_id: uuid,
  permission_id: uuid,
});

export const userPermissionSchema = z.object({
  user_id: uuid,
  permission_id: uuid,
});

// ─── Contents ────────────────────────────────────────────────────

export const createContentSchema = z.object({
  body: z.string().min(1).max(100_000),
  author_id: uuid.nullable().optional(),
});

export const updateContentSchema = z.object({
  body: z.string().min(1).max(100_000),
});

// ─── Shared ──────────────────────────────────────────────────────

export const bulkDeleteSchema = z.array(uuid).max(MAX_BULK_DELETE_IDS);

export const loginSchema = z.object({
  username: z.string().min(1).max(255),
  password,
});

export const uuidSchema = uuid;

/**
 * Parse a value against a schema, throwing ValidationError with one
 * entry per issue.
 */
export function validateBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues;
    const summary = issues.map((i) => `${i.path.join('.') || '(body)'}: ${i.message}`).join('; ');
    throw new ValidationError(`Validation failed: ${summary}`, {
      errors: issues.map((i) => ({ path: i.path.map(String), message: i.message })),
    });
  }
  return result.data;
}
