/**
 * Database Adapter Types
 *
 * Data-access code never touches the pool directly: it receives a
 * Transaction from begin() (mutations) or read() (lookups).
 */

import type { Settings } from '../../config/settings.js';
import type { Transaction } from '../transaction.js';

export type DatabaseType = 'postgres';

/**
 * Database adapter interface
 */
export interface DatabaseAdapter {
  /** Database type identifier */
  readonly type: DatabaseType;

  /** Check if the pool has been created */
  isConnected(): boolean;

  /**
   * Acquire a client and open a transaction.
   * Fails with StoreError when no client is available within the connect timeout.
   */
  begin(): Promise<Transaction>;

  /**
   * Run read-only work in a transaction that is always rolled back.
   */
  read<T>(fn: (tx: Transaction) => Promise<T>): Promise<T>;

  /**
   * Execute raw SQL outside any transaction (schema setup)
   */
  exec(sql: string): Promise<void>;

  /** Round-trip check used by the health endpoint */
  ping(): Promise<boolean>;

  /**
   * Close the connection pool
   */
  close(): Promise<void>;
}

/**
 * Database configuration
 */
export interface DatabaseConfig {
  type: DatabaseType;
  postgresUrl: string;
  postgresPoolSize?: number;
}

/**
 * Database configuration from loaded settings
 */
export function getDatabaseConfig(settings: Pick<Settings, 'databaseUrl' | 'poolSize'>): DatabaseConfig {
  return {
    type: 'postgres',
    postgresUrl: settings.databaseUrl,
    postgresPoolSize: settings.poolSize,
  };
}
