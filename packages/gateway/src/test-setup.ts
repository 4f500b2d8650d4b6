/**
 * Global test setup, run before every test file in gateway.
 *
 * Silences getLog() output. Tests that need to ASSERT on log calls
 * should declare their own `vi.mock` for the log module; the local
 * mock overrides this global one for that file.
 */

import { vi } from 'vitest';

vi.mock('./services/log.js', () => {
  const log = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return { getLog: () => log };
});
