/**
 * Runtime settings
 *
 * Read once from the environment at startup (after dotenv has populated it)
 * and passed down explicitly. Nothing below the server entry point reads
 * process.env for these values.
 */

import { z } from 'zod';
import { ValidationError, type LinkConfig, type LogLevel } from '@gatehouse/core';
import {
  API_PREFIX,
  DB_POOL_MAX,
  DEFAULT_HOST,
  DEFAULT_PORT,
  SESSION_TTL_HOURS,
} from './defaults.js';

/** Collection path segment per resource, relative to the API prefix */
export interface RoutePaths {
  userGroups: string;
  users: string;
  permissions: string;
  groupPermissions: string;
  userPermissions: string;
  contents: string;
  auth: string;
  health: string;
}

/** Resources whose listings produce page links */
export type CollectionName = Exclude<keyof RoutePaths, 'auth' | 'health'>;

export interface Settings {
  port: number;
  host: string;
  /** Public origin, without the API prefix */
  baseUrl: string;
  databaseUrl: string;
  poolSize: number;
  sessionTtlHours: number;
  logLevel: LogLevel;
  routes: RoutePaths;
}

const segment = (fallback: string) =>
  z
    .string()
    .transform((value) => value.replace(/^\/+|\/+$/g, ''))
    .pipe(z.string().regex(/^[A-Za-z0-9_-]+$/, 'must be a single path segment'))
    .default(fallback);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  HOST: z.string().min(1).default(DEFAULT_HOST),
  BASE_URL: z.string().url().optional(),
  DATABASE_URL: z.string().min(1).optional(),
  POSTGRES_HOST: z.string().min(1).default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: z.string().min(1).default('postgres'),
  POSTGRES_PASSWORD: z.string().default('postgres'),
  POSTGRES_DB: z.string().min(1).default('gatehouse'),
  POSTGRES_POOL_SIZE: z.coerce.number().int().positive().default(DB_POOL_MAX),
  SESSION_TTL_HOURS: z.coerce.number().positive().default(SESSION_TTL_HOURS),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  ROUTE_USER_GROUPS: segment('user_groups'),
  ROUTE_USERS: segment('users'),
  ROUTE_PERMISSIONS: segment('permissions'),
  ROUTE_GROUP_PERMISSIONS: segment('group_permissions'),
  ROUTE_USER_PERMISSIONS: segment('user_permissions'),
  ROUTE_CONTENTS: segment('contents'),
  ROUTE_AUTH: segment('auth'),
  ROUTE_HEALTH: segment('health'),
});

/**
 * Parse settings from an environment map.
 * Empty variables count as unset.
 *
 * @throws ValidationError listing every invalid variable
 */
export function loadSettings(source: NodeJS.ProcessEnv = process.env): Settings {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue) => ({
      path: issue.path.map(String),
      message: issue.message,
    }));
    const summary = errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ValidationError(`Invalid configuration: ${summary}`, { errors });
  }

  const env = parsed.data;
  const databaseUrl =
    env.DATABASE_URL ??
    `postgresql://${encodeURIComponent(env.POSTGRES_USER)}:${encodeURIComponent(env.POSTGRES_PASSWORD)}@${env.POSTGRES_HOST}:${env.POSTGRES_PORT}/${env.POSTGRES_DB}`;

  return {
    port: env.PORT,
    host: env.HOST,
    baseUrl: (env.BASE_URL ?? `http://${env.HOST}:${env.PORT}`).replace(/\/+$/, ''),
    databaseUrl,
    poolSize: env.POSTGRES_POOL_SIZE,
    sessionTtlHours: env.SESSION_TTL_HOURS,
    logLevel: env.LOG_LEVEL,
    routes: {
      userGroups: env.ROUTE_USER_GROUPS,
      users: env.ROUTE_USERS,
      permissions: env.ROUTE_PERMISSIONS,
      groupPermissions: env.ROUTE_GROUP_PERMISSIONS,
      userPermissions: env.ROUTE_USER_PERMISSIONS,
      contents: env.ROUTE_CONTENTS,
      auth: env.ROUTE_AUTH,
      health: env.ROUTE_HEALTH,
    },
  };
}

/**
 * Link configuration for one collection's page links.
 */
export function linkConfigFor(
  settings: Pick<Settings, 'baseUrl' | 'routes'>,
  collection: CollectionName
): LinkConfig {
  return {
    baseUrl: `${settings.baseUrl}${API_PREFIX}`,
    collectionPath: settings.routes[collection],
  };
}
