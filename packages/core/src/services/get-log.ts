/**
 * Logging Utility
 *
 * Scoped loggers that can be created at module load time, before the
 * process has configured its root log service. Each call resolves the root
 * lazily, so a logger grabbed early starts writing through the configured
 * service as soon as one is registered. Until then output goes to console.
 *
 * Usage:
 *   import { getLog } from '@gatehouse/core';
 *   const log = getLog('Users');
 *   log.info('User created', { id: '...' });
 */

import type { ILogService, LogLevel } from './log-service.js';

let rootLogService: ILogService | null = null;
const scopedLoggers = new Map<string, ILogService>();

/**
 * Register the process-wide log service. Pass null to go back to console output.
 */
export function setLogService(service: ILogService | null): void {
  rootLogService = service;
}

function writeFallback(level: LogLevel, module: string, message: string, data?: unknown): void {
  const fn =
    level === 'error'
      ? console.error
      : level === 'warn'
        ? console.warn
        : level === 'debug'
          ? console.debug
          : console.log;
  if (data !== undefined) fn(`[${module}]`, message, data);
  else fn(`[${module}]`, message);
}

function createScopedLogger(module: string): ILogService {
  const emit = (level: LogLevel, message: string, data?: unknown): void => {
    if (rootLogService) {
      rootLogService.child(module)[level](message, data);
      return;
    }
    writeFallback(level, module, message, data);
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
    child: (sub: string) => getLog(`${module}:${sub}`),
  };
}

/**
 * Get a scoped logger for a module. Loggers are cached by module name.
 */
export function getLog(module: string): ILogService {
  let logger = scopedLoggers.get(module);
  if (!logger) {
    logger = createScopedLogger(module);
    scopedLoggers.set(module, logger);
  }
  return logger;
}
