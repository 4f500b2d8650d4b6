/**
 * Logging utility, re-exported from @gatehouse/core
 *
 * Usage:
 *   import { getLog } from '../services/log.js';
 *   const log = getLog('Users');
 *   log.info('User created', { id: '...' });
 */

export { getLog } from '@gatehouse/core';
