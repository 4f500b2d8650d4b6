/**
 * Shared Test Helpers
 *
 * A scripted stand-in for a pooled pg client and a database adapter built
 * on it, so data-access code runs its real SQL path without a server.
 *
 * Usage:
 *   const client = createFakeClient().respond([{ total: '1' }]).respond([row]);
 *   const tx = new Transaction(client);
 *   await listUserGroups(tx, query, links);
 *   expect(client.statements()).toEqual([...]);
 */

import { vi, type Mock } from 'vitest';
import type { ILogService } from '@gatehouse/core';
import { Transaction } from './db/transaction.js';
import type { DatabaseAdapter } from './db/adapters/types.js';

// ============================================================
// Mock Log
// ============================================================

export function createMockLog(): ILogService & Record<'debug' | 'info' | 'warn' | 'error', Mock> {
  const child = vi.fn<(module: string) => ILogService>();
  const log = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child,
  };
  child.mockReturnValue(log);
  return log;
}

// ============================================================
// Fake pg client
// ============================================================

type ControlStatement = 'BEGIN' | 'COMMIT' | 'ROLLBACK';

export interface RecordedQuery {
  sql: string;
  params: unknown[];
}

export interface FakeClient {
  query: Mock;
  release: Mock;
  /** Every statement received, whitespace-collapsed */
  calls: RecordedQuery[];
  /** Queue the result of the next data statement */
  respond(rows: object[], rowCount?: number): FakeClient;
  /** Make the next data statement fail */
  fail(error: Error): FakeClient;
  /** Make a transaction-control statement fail */
  failOn(statement: ControlStatement, error: Error): FakeClient;
  statements(): string[];
}

function normalizeSql(sql: string): string {
  return sql.replace(/\s+/g, ' ').trim();
}

function isControl(sql: string): sql is ControlStatement {
  return sql === 'BEGIN' || sql === 'COMMIT' || sql === 'ROLLBACK';
}

export function createFakeClient(): FakeClient {
  const queued: Array<{ rows: object[]; rowCount: number } | Error> = [];
  const controlFailures = new Map<ControlStatement, Error>();
  const calls: RecordedQuery[] = [];

  const query = vi.fn();
  query.mockImplementation(async (text: string, params: unknown[] = []) => {
    const sql = normalizeSql(text);
    calls.push({ sql, params });

    if (isControl(sql)) {
      const failure = controlFailures.get(sql);
      if (failure) throw failure;
      return { rows: [], rowCount: null };
    }

    const next = queued.shift();
    if (next instanceof Error) throw next;
    return next ?? { rows: [], rowCount: 0 };
  });

  const fake: FakeClient = {
    query,
    release: vi.fn(),
    calls,
    respond(rows, rowCount = rows.length) {
      queued.push({ rows, rowCount });
      return fake;
    },
    fail(error) {
      queued.push(error);
      return fake;
    },
    failOn(statement, error) {
      controlFailures.set(statement, error);
      return fake;
    },
    statements() {
      return calls.map((call) => call.sql);
    },
  };
  return fake;
}

/** Open transaction over a fake client, as PostgresAdapter.begin() would return */
export function createFakeTransaction(client: FakeClient = createFakeClient()): Transaction {
  return new Transaction(client);
}

/** Error shaped like the ones pg raises for a failed statement */
export function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

// ============================================================
// Fake database adapter
// ============================================================

export interface FakeAdapter extends DatabaseAdapter {
  begin: Mock<() => Promise<Transaction>>;
  ping: Mock<() => Promise<boolean>>;
  /** Transactions handed out so far */
  opened: Transaction[];
}

/**
 * Adapter whose transactions run on the given fake clients in order,
 * then on fresh empty ones.
 */
export function createFakeAdapter(...clients: FakeClient[]): FakeAdapter {
  const pending = [...clients];
  const opened: Transaction[] = [];

  const begin = vi.fn(async () => {
    const tx = new Transaction(pending.shift() ?? createFakeClient());
    opened.push(tx);
    return tx;
  });

  return {
    type: 'postgres',
    isConnected: () => true,
    begin,
    async read<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
      const tx = await begin();
      try {
        return await fn(tx);
      } finally {
        await tx.rollback();
      }
    },
    exec: vi.fn(async () => {}),
    ping: vi.fn(async () => true),
    close: vi.fn(async () => {}),
    opened,
  };
}
