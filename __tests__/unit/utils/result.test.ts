import { describe, it, expect } from 'vitest';
import { ok, err, isOk } from '../../../src/utils/result';

describe('utils/result', () => {
  it('ok returns expected shape', () => {
    const r = ok(123);
    expect(r.ok).toBe(true);
    expect(r.value).toBe(123);
    expect(isOk(r)).toBe(true);
  });
  it('err returns expected shape', () => {
    const e = err('E_TEST', 'failed', { held: 1n });
    expect(e.ok).toBe(false);
    expect(e.error).toEqual({ code: 'E_TEST', message: 'failed', cause: { held: 1n } });
    expect(isOk(e)).toBe(false);
  });
});
