import { describe, it, expect } from 'vitest';
import { atomically, composeRevertible, BusyFlag, UnitQueue } from '../../../src/core/atomic';
import type { Checkpoint, Revertible } from '../../../src/contracts';

class Counter implements Revertible {
  value = 0;
  constructor(private readonly trace: string[] = [], private readonly name = 'c') {}
  checkpoint(): Checkpoint {
    const saved = this.value;
    return { revert: () => { this.trace.push(this.name); this.value = saved; } };
  }
}

describe('core/atomic', () => {
  it('keeps every mutation when the work succeeds', async () => {
    const a = new Counter();
    const out = await atomically([a], async () => { a.value = 5; return 'done'; });
    expect(out).toBe('done');
    expect(a.value).toBe(5);
  });

  it('reverts all participants, newest first, and rethrows', async () => {
    const trace: string[] = [];
    const a = new Counter(trace, 'a');
    const b = new Counter(trace, 'b');
    const boom = new Error('boom');
    await expect(atomically([a, b], async () => {
      a.value = 1;
      b.value = 2;
      throw boom;
    })).rejects.toBe(boom);
    expect([a.value, b.value]).toEqual([0, 0]);
    expect(trace).toEqual(['b', 'a']);
  });

  it('composes revertibles into one checkpoint', () => {
    const a = new Counter();
    const b = new Counter();
    const both = composeRevertible([a, b]);
    const cp = both.checkpoint();
    a.value = 3; b.value = 4;
    cp.revert();
    expect([a.value, b.value]).toEqual([0, 0]);
  });

  it('rejects a nested run and releases the flag afterwards', async () => {
    const flag = new BusyFlag();
    let inner: unknown;
    await flag.run('buy', async () => {
      expect(flag.busy).toBe(true);
      try {
        await flag.run('sell', async () => 1);
      } catch (e) {
        inner = e;
      }
    });
    expect(inner).toMatchObject({ code: 'REENTRANCY_REJECTED', detail: { operation: 'sell', inProgress: 'buy' } });
    expect(flag.busy).toBe(false);
  });

  it('releases the flag when the work fails', async () => {
    const flag = new BusyFlag();
    await expect(flag.run('buy', async () => { throw new Error('x'); })).rejects.toThrow('x');
    expect(flag.busy).toBe(false);
    await expect(flag.run('sell', async () => 2)).resolves.toBe(2);
  });

  it('does not treat independent overlapping runs as re-entry', async () => {
    const flag = new BusyFlag();
    const out = await Promise.all([flag.run('buy', async () => 1), flag.run('sell', async () => 2)]);
    expect(out).toEqual([1, 2]);
    expect(flag.busy).toBe(false);
  });

  it('runs queued units in call order and keeps going after a failure', async () => {
    const queue = new UnitQueue();
    const trace: string[] = [];
    const results = await Promise.allSettled([
      queue.run(async () => {
        trace.push('a:start');
        await new Promise(resolve => setTimeout(resolve, 5));
        trace.push('a:end');
        return 'a';
      }),
      queue.run(async () => { trace.push('b'); throw new Error('b failed'); }),
      queue.run(async () => { trace.push('c'); return 'c'; }),
    ]);
    expect(trace).toEqual(['a:start', 'a:end', 'b', 'c']);
    expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
  });

  it('runs a unit started from inside another one inline', async () => {
    const queue = new UnitQueue();
    const out = await queue.run(async () => {
      expect(queue.inUnit).toBe(true);
      return queue.run(async () => 'inner');
    });
    expect(out).toBe('inner');
    expect(queue.inUnit).toBe(false);
  });
});
