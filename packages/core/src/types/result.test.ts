import { describe, it, expect } from 'vitest';
import { ok, err, unwrap } from './result.js';

describe('Result', () => {
  describe('ok / err', () => {
    it('creates a successful result', () => {
      expect(ok(42)).toEqual({ ok: true, value: 42 });
    });

    it('creates a failed result', () => {
      const error = new Error('boom');
      expect(err(error)).toEqual({ ok: false, error });
    });
  });

  describe('unwrap', () => {
    it('returns value for ok result', () => {
      expect(unwrap(ok('row'))).toBe('row');
    });

    it('throws the error for err result', () => {
      expect(() => unwrap(err(new Error('test error')))).toThrow('test error');
    });

    it('wraps non-Error failures', () => {
      expect(() => unwrap(err('plain'))).toThrow('plain');
    });
  });
});
