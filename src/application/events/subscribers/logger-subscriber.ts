import { getEventBus, type Unsubscribe } from '../bus';
import type { CurveEvent } from '../types';
import { log } from '../../../utils/logger';

const CURVE_EVENT_TYPES = ['PURCHASE_EXECUTED', 'SALE_EXECUTED', 'PRICE_REFRESHED', 'LIQUIDITY_DEPLOYED', 'ASSET_CREATED'] as const;

function summarize(ev: CurveEvent): Record<string, unknown> {
  switch (ev.type) {
    case 'PURCHASE_EXECUTED':
      return { buyer: ev.buyer, units: ev.units, settlementIn: ev.settlementIn, fee: ev.fee, price: ev.price };
    case 'SALE_EXECUTED':
      return { seller: ev.seller, units: ev.units, settlementOut: ev.settlementOut, fee: ev.fee, price: ev.price };
    case 'PRICE_REFRESHED':
      return { newPrice: ev.newPrice };
    case 'LIQUIDITY_DEPLOYED':
      return { settlementAmount: ev.settlementAmount, unitsAmount: ev.unitsAmount, feeSettlement: ev.feeSettlement, poolId: ev.poolId };
    case 'ASSET_CREATED':
      return { creator: ev.creator, name: ev.name, symbol: ev.symbol, engine: ev.engine };
  }
}

export function registerLoggerSubscriber(): Unsubscribe {
  const bus = getEventBus();
  const offs = CURVE_EVENT_TYPES.map(t => bus.subscribe(t, (ev) => {
    log('INFO', 'CURVE-EVENT', ev.type, { asset: ev.asset, seq: ev.seq, at: ev.at, ...summarize(ev) });
  }));
  return () => { for (const off of offs) off(); };
}
