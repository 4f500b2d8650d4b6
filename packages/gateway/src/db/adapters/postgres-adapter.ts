/**
 * PostgreSQL Database Adapter
 *
 * Uses the 'pg' package with connection pooling
 */

import pg from 'pg';
import type { PoolClient } from 'pg';
import type { DatabaseAdapter, DatabaseConfig } from './types.js';
import { Transaction } from '../transaction.js';
import { toStoreError } from '../errors.js';
import { getLog } from '../../services/log.js';
import { DB_POOL_MAX, DB_IDLE_TIMEOUT_MS, DB_CONNECT_TIMEOUT_MS } from '../../config/defaults.js';

const log = getLog('PostgresAdapter');

const { Pool } = pg;
type PoolType = InstanceType<typeof Pool>;

/** Strip credentials before a connection string reaches the logs */
function describeTarget(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.hostname}:${parsed.port || '5432'}${parsed.pathname}`;
  } catch {
    return 'database';
  }
}

export class PostgresAdapter implements DatabaseAdapter {
  readonly type = 'postgres' as const;
  private pool: PoolType | null = null;
  private readonly config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  /**
   * Create the pool and check that a connection can be made
   */
  async initialize(): Promise<void> {
    const pool = new Pool({
      connectionString: this.config.postgresUrl,
      max: this.config.postgresPoolSize || DB_POOL_MAX,
      idleTimeoutMillis: DB_IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: DB_CONNECT_TIMEOUT_MS,
    });
    pool.on('error', (error) => {
      log.error('Idle client error', error);
    });
    this.pool = pool;

    const client = await pool.connect();
    try {
      await client.query('SELECT 1');
      log.info(`Connected to ${describeTarget(this.config.postgresUrl)}`);
    } finally {
      client.release();
    }
  }

  isConnected(): boolean {
    return this.pool !== null;
  }

  async begin(): Promise<Transaction> {
    const pool = this.requirePool();

    let client: PoolClient;
    try {
      client = await pool.connect();
    } catch (error) {
      throw toStoreError('begin', error);
    }

    try {
      await client.query('BEGIN');
    } catch (error) {
      client.release(error instanceof Error ? error : undefined);
      throw toStoreError('begin', error);
    }

    return new Transaction(client);
  }

  async read<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    const tx = await this.begin();
    try {
      return await fn(tx);
    } finally {
      await tx.rollback();
    }
  }

  async exec(sql: string): Promise<void> {
    await this.requirePool().query(sql);
  }

  async ping(): Promise<boolean> {
    try {
      await this.requirePool().query('SELECT 1');
      return true;
    } catch (error) {
      log.warn('Ping failed', error);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      log.info('Connection pool closed');
    }
  }

  private requirePool(): PoolType {
    if (!this.pool) throw toStoreError('pool', new Error('Database not initialized'));
    return this.pool;
  }
}
