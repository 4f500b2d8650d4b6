/**
 * PostgreSQL Schema Definition
 *
 * Idempotent: every statement can run against an existing database.
 */

import { getLog } from '../services/log.js';

const log = getLog('Schema');

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS user_groups (
  id UUID PRIMARY KEY,
  group_name VARCHAR(255) NOT NULL UNIQUE,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS users (
  id UUID PRIMARY KEY,
  username VARCHAR(255) NOT NULL UNIQUE,
  password_hash VARCHAR(255) NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  user_group_id UUID REFERENCES user_groups(id) ON DELETE SET NULL
);

CREATE TABLE IF NOT EXISTS permissions (
  id UUID PRIMARY KEY,
  name VARCHAR(255) NOT NULL UNIQUE,
  description TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS group_permissions (
  group_id UUID NOT NULL REFERENCES user_groups(id) ON DELETE CASCADE,
  permission_id UUID NOT NULL REFERENCES permissions(id) ON DELETE CASCADE,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  PRIMARY KEY (group_id, permission_id)
);

CREATE TABLE IF NOT EXISTS user_permissions (
  user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  permission_id UUID NOT NULL REFERENCES permissions(id) ON DELETE CASCADE,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  PRIMARY KEY (user_id, permission_id)
);

CREATE TABLE IF NOT EXISTS contents (
  id UUID PRIMARY KEY,
  body TEXT NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  author_id UUID REFERENCES users(id) ON DELETE SET NULL
);
`;

export const INDEXES_SQL = `
CREATE INDEX IF NOT EXISTS idx_users_user_group_id ON users(user_group_id);
CREATE INDEX IF NOT EXISTS idx_group_permissions_permission_id ON group_permissions(permission_id);
CREATE INDEX IF NOT EXISTS idx_user_permissions_permission_id ON user_permissions(permission_id);
CREATE INDEX IF NOT EXISTS idx_contents_author_id ON contents(author_id);
`;

/**
 * Initialize PostgreSQL schema
 */
export async function initializeSchema(exec: (sql: string) => Promise<void>): Promise<void> {
  await exec(SCHEMA_SQL);
  log.info('Tables created');

  await exec(INDEXES_SQL);
  log.info('Indexes created');
}
