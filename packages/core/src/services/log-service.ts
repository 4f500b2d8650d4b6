/**
 * ILogService - Structured Logging Interface
 *
 * Usage:
 *   const log = getLog('Users');
 *   log.info('Listing users', { page: 1, size: 10 });
 *
 *   const txLog = log.child('Tx');
 *   txLog.warn('Rollback failed');
 *   // Output: [Users:Tx] Rollback failed
 */

export interface ILogService {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;

  /**
   * Create a child logger scoped to a module.
   * The module name is prepended to all log messages.
   */
  child(module: string): ILogService;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
