/**
 * LogService Implementation
 *
 * Structured logging with two modes:
 * - Development: human-readable output with module prefix
 * - Production: one JSON object per line
 *
 * Usage:
 *   const log = createLogService({ level: 'info' });
 *   log.info('Server started', { port: 8000 });
 *
 *   const usersLog = log.child('Users');
 *   usersLog.warn('insertUser failed', { code: '23505' });
 *   // Dev:  [Users] insertUser failed { code: '23505' }
 *   // Prod: {"level":"warn","ts":"...","module":"Users","msg":"insertUser failed","code":"23505"}
 */

import type { ILogService, LogLevel } from '@gatehouse/core';

export interface LogServiceOptions {
  level?: LogLevel;
  json?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/** Flatten log data into fields of the JSON record */
function toFields(data: unknown): Record<string, unknown> {
  if (data === undefined) return {};
  if (data instanceof Error) {
    return { error: { name: data.name, message: data.message, stack: data.stack } };
  }
  return isPlainRecord(data) ? data : { data };
}

export class LogService implements ILogService {
  private readonly levelName: LogLevel;
  private readonly module: string | null;
  private readonly json: boolean;

  constructor(options?: LogServiceOptions & { module?: string }) {
    this.levelName = options?.level ?? 'info';
    this.module = options?.module ?? null;
    this.json = options?.json ?? process.env.NODE_ENV === 'production';
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  child(module: string): ILogService {
    return new LogService({
      level: this.levelName,
      json: this.json,
      module: this.module ? `${this.module}:${module}` : module,
    });
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.levelName]) return;

    const fn =
      level === 'error'
        ? console.error
        : level === 'warn'
          ? console.warn
          : level === 'debug'
            ? console.debug
            : console.log;

    if (this.json) {
      fn(
        JSON.stringify({
          level,
          ts: new Date().toISOString(),
          ...(this.module ? { module: this.module } : {}),
          msg: message,
          ...toFields(data),
        })
      );
      return;
    }

    const line = this.module ? `[${this.module}] ${message}` : message;
    if (data !== undefined) {
      fn(line, data);
    } else {
      fn(line);
    }
  }
}

/**
 * Create a new LogService instance.
 */
export function createLogService(options?: LogServiceOptions): ILogService {
  return new LogService(options);
}
