import { describe, it, expect, beforeEach } from 'vitest';
import { getEventBus } from '../../../src/application/events/bus';
import type { ErrorEvent } from '../../../src/application/events/types';
import { getCurveStats, registerStatsSubscriber } from '../../../src/application/events/subscribers/stats-subscriber';
import { captureLogs, expectJsonLog, flushBus, setupJsonLogs } from '../helpers/logging';

const asset = '0xasset';

function failure(code: 'ZERO_INPUT' | 'ORACLE_UNAVAILABLE'): ErrorEvent {
  return { type: 'EVENT/ERROR', at: 0, asset, operation: 'buy', cause: { code, category: code === 'ZERO_INPUT' ? 'input' : 'oracle', message: code } };
}

describe('stats-subscriber', () => {
  beforeEach(() => { setupJsonLogs(); });

  it('accumulates trade counters per asset', async () => {
    registerStatsSubscriber();
    const bus = getEventBus();
    bus.publish({ type: 'PURCHASE_EXECUTED', asset, seq: 1, at: 0, buyer: '0xb', units: 100n, settlementIn: 10n, fee: 1n, price: 7n });
    bus.publish({ type: 'PURCHASE_EXECUTED', asset, seq: 2, at: 0, buyer: '0xb', units: 50n, settlementIn: 10n, fee: 1n, price: 9n });
    bus.publish({ type: 'SALE_EXECUTED', asset, seq: 3, at: 0, seller: '0xb', units: 20n, settlementOut: 3n, fee: 0n, price: 8n });
    await flushBus();
    expect(getCurveStats(asset)).toMatchObject({
      buys: 2, sells: 1, unitsBought: 150n, unitsSold: 20n, settlementIn: 20n, settlementOut: 3n, fees: 2n, lastPrice: 8n, deployed: false,
    });
    expect(getCurveStats('0xother').buys).toBe(0);
  });

  it('warns once consecutive failures reach the threshold and resets on success', async () => {
    const logs = captureLogs();
    registerStatsSubscriber();
    const bus = getEventBus();
    for (let i = 0; i < 5; i++) bus.publish(failure('ORACLE_UNAVAILABLE'));
    await flushBus();
    expect(getCurveStats(asset)).toMatchObject({ failures: 5, consecFail: 5 });
    const hit = expectJsonLog(logs, 'STATS', 'WARN', 'anomaly', ['asset', 'consecFail', 'lastCode']);
    expect(hit?.data).toEqual({ asset, consecFail: 5, lastCode: 'ORACLE_UNAVAILABLE' });

    bus.publish({ type: 'PURCHASE_EXECUTED', asset, seq: 1, at: 0, buyer: '0xb', units: 1n, settlementIn: 1n, fee: 0n, price: 7n });
    bus.publish(failure('ZERO_INPUT'));
    await flushBus();
    expect(getCurveStats(asset)).toMatchObject({ failures: 6, consecFail: 1 });
  });

  it('marks deployment and logs it', async () => {
    const logs = captureLogs();
    registerStatsSubscriber();
    getEventBus().publish({
      type: 'LIQUIDITY_DEPLOYED', asset, seq: 9, at: 0, settlementAmount: 5n, unitsAmount: 200n, feeSettlement: 1n, poolId: 'pool-1',
    });
    await flushBus();
    expect(getCurveStats(asset).deployed).toBe(true);
    expectJsonLog(logs, 'STATS', 'INFO', 'liquidity deployed', ['asset', 'buys']);
  });
});
