/**
 * Transaction handle
 *
 * Owns one pooled client between BEGIN and COMMIT/ROLLBACK. Closing the
 * handle (either way) returns the client to the pool; every later use
 * fails with TransactionClosedError, except rollback() which is a no-op
 * so cleanup paths can call it unconditionally.
 */

import type { PoolClient, QueryResult, QueryResultRow } from 'pg';
import { TransactionClosedError } from '@gatehouse/core';
import { getLog } from '../services/log.js';

const log = getLog('Transaction');

/** The part of a pooled client a transaction needs */
export type TransactionClient = Pick<PoolClient, 'query' | 'release'>;

export type TransactionState = 'open' | 'committed' | 'rolled_back';

export class Transaction {
  private state: TransactionState = 'open';

  /** Expects a client on which BEGIN has already succeeded */
  constructor(private readonly client: TransactionClient) {}

  get status(): TransactionState {
    return this.state;
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  async query<R extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: unknown[] = []
  ): Promise<QueryResult<R>> {
    this.assertOpen();
    return this.client.query<R>(sql, params);
  }

  /**
   * Commit and release the client.
   * If COMMIT itself fails the server has already aborted the transaction;
   * the handle is closed as rolled back and the error rethrown.
   */
  async commit(): Promise<void> {
    this.assertOpen();
    try {
      await this.client.query('COMMIT');
    } catch (error) {
      this.close('rolled_back', error);
      throw error;
    }
    this.close('committed');
  }

  /**
   * Roll back and release the client. No-op once closed.
   * A failed ROLLBACK is logged and the connection is discarded.
   */
  async rollback(): Promise<void> {
    if (this.state !== 'open') return;
    try {
      await this.client.query('ROLLBACK');
      this.close('rolled_back');
    } catch (error) {
      log.error('Rollback failed', error);
      this.close('rolled_back', error);
    }
  }

  private assertOpen(): void {
    if (this.state !== 'open') {
      throw new TransactionClosedError(this.state);
    }
  }

  private close(state: Exclude<TransactionState, 'open'>, error?: unknown): void {
    this.state = state;
    // Passing an error makes the pool destroy the connection instead of reusing it
    this.client.release(error instanceof Error ? error : undefined);
  }
}
