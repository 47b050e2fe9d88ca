import { getEventBus, type Unsubscribe } from '../bus';
import { log } from '../../../utils/logger';

export interface CurveStats {
  buys: number;
  sells: number;
  unitsBought: bigint;
  unitsSold: bigint;
  settlementIn: bigint;
  settlementOut: bigint;
  fees: bigint;
  failures: number;
  consecFail: number;
  lastPrice: bigint;
  deployed: boolean;
}

const state = new Map<string, CurveStats>();
const FAIL_WARN_AFTER = Math.max(1, Number(process.env.STATS_FAIL_WARN || '5'));

function empty(): CurveStats {
  return {
    buys: 0, sells: 0, unitsBought: 0n, unitsSold: 0n, settlementIn: 0n, settlementOut: 0n,
    fees: 0n, failures: 0, consecFail: 0, lastPrice: 0n, deployed: false,
  };
}

function entry(asset: string): CurveStats {
  let s = state.get(asset);
  if (!s) { s = empty(); state.set(asset, s); }
  return s;
}

/** Copy of the counters kept for `asset`. */
export function getCurveStats(asset: string): CurveStats {
  return { ...(state.get(asset) ?? empty()) };
}

export function resetCurveStats() {
  state.clear();
}

export function registerStatsSubscriber(): Unsubscribe {
  const bus = getEventBus();
  const offs = [
    bus.subscribe('PURCHASE_EXECUTED', (ev) => {
      const s = entry(ev.asset);
      s.buys++; s.consecFail = 0;
      s.unitsBought += ev.units; s.settlementIn += ev.settlementIn; s.fees += ev.fee; s.lastPrice = ev.price;
    }),
    bus.subscribe('SALE_EXECUTED', (ev) => {
      const s = entry(ev.asset);
      s.sells++; s.consecFail = 0;
      s.unitsSold += ev.units; s.settlementOut += ev.settlementOut; s.fees += ev.fee; s.lastPrice = ev.price;
    }),
    bus.subscribe('LIQUIDITY_DEPLOYED', (ev) => {
      const s = entry(ev.asset);
      s.deployed = true;
      log('INFO', 'STATS', 'liquidity deployed', { asset: ev.asset, buys: s.buys, sells: s.sells, settlementIn: s.settlementIn });
    }),
    bus.subscribe('EVENT/ERROR', (ev) => {
      if (!ev.asset) return;
      const s = entry(ev.asset);
      s.failures++; s.consecFail++;
      if (s.consecFail === FAIL_WARN_AFTER) {
        log('WARN', 'STATS', 'anomaly', { asset: ev.asset, consecFail: s.consecFail, lastCode: ev.cause.code });
      }
    }),
  ];
  return () => { for (const off of offs) off(); };
}
