import { describe, it, expect, beforeEach } from 'vitest';
import { getEventBus } from '../../../src/application/events/bus';
import { registerLoggerSubscriber } from '../../../src/application/events/subscribers/logger-subscriber';
import { setupJsonLogs, captureLogs, expectJsonLog, flushBus } from '../helpers/logging';

describe('logger-subscriber', () => {
  beforeEach(() => { setupJsonLogs(); });

  it('logs curve events with INFO and bigint fields as strings', async () => {
    const logs = captureLogs();
    registerLoggerSubscriber();
    getEventBus().publish({
      type: 'PURCHASE_EXECUTED', asset: '0xasset', seq: 4, at: 100, buyer: '0xbuyer', units: 5n, settlementIn: 6n, fee: 0n, price: 7n,
    });
    await flushBus();
    const hit = expectJsonLog(logs, 'CURVE-EVENT', 'INFO', 'PURCHASE_EXECUTED', ['asset', 'seq', 'at', 'buyer', 'units', 'price']);
    expect(hit?.data).toEqual({ asset: '0xasset', seq: 4, at: 100, buyer: '0xbuyer', units: '5', settlementIn: '6', fee: '0', price: '7' });
  });

  it('stops logging after unsubscribe', async () => {
    const logs = captureLogs();
    const off = registerLoggerSubscriber();
    off();
    getEventBus().publish({ type: 'PRICE_REFRESHED', asset: '0xasset', seq: 1, at: 0, newPrice: 1n });
    await flushBus();
    expect(logs.filter(l => l.category === 'CURVE-EVENT')).toHaveLength(0);
  });
});
