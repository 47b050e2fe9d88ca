import { describe, it, expect, beforeEach, vi } from 'vitest';
import { addLoggerRedactFields, categoryLogger, logger, redactMeta, setLoggerContext, warnOnce } from '../../../src/utils/logger';

function lines(spy: { mock: { calls: unknown[][] } }) {
  return spy.mock.calls.map(c => JSON.parse(String(c[0])));
}

describe('logger JSON meta and redaction', () => {
  beforeEach(() => {
    process.env.LOG_JSON = '1';
    process.env.TEST_MODE = '1';
    process.env.LOG_LEVEL = 'INFO';
  });

  it('emits JSON with redacted fields and bigint amounts as strings', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    addLoggerRedactFields(['feedKey']);
    logger.log?.('INFO', 'ORACLE', 'request', {
      url: 'http://feed.local', headers: { Authorization: 'test-secret' }, feedKey: 'test-secret', price: 3000n,
    });
    const [obj] = lines(spy);
    expect(obj.category).toBe('ORACLE');
    expect(obj.data[0]).toEqual({
      url: 'http://feed.local', headers: { Authorization: '***', redacted: true }, feedKey: '***', price: '3000', redacted: true,
    });
  });

  it('adds the logger context to every line', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setLoggerContext({ asset: '0xabc' });
    categoryLogger('CURVE').info('buy ok');
    const [obj] = lines(spy);
    expect(obj).toMatchObject({ level: 'INFO', category: 'CURVE', message: 'buy ok', asset: '0xabc', data: [] });
  });

  it('reduces errors to name and message', () => {
    expect(redactMeta({ error: new RangeError('bad') })).toEqual({ error: { name: 'RangeError', message: 'bad' } });
    expect(redactMeta([1n, 'x'])).toEqual(['1', 'x']);
  });

  it('warnOnce logs a given id only once', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    warnOnce('logger-test-once', 'first');
    warnOnce('logger-test-once', 'second');
    const out = lines(spy);
    expect(out).toHaveLength(1);
    expect(out[0]).toMatchObject({ level: 'WARN', category: 'CONFIG', message: 'first' });
  });
});
