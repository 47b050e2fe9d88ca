import type { Checkpoint, Clock, OracleReading, PriceOracleAdapter, Revertible } from '../contracts';
import { systemClock } from '../contracts';
import { CurveError, isCurveError } from '../application/errors';
import { categoryLogger, type Logger } from '../utils/logger';
import { rescale } from '../utils/units';
import { ORACLE_DECIMALS } from './pricing';

export interface PriceCacheState {
  /** Oracle price rescaled to 18 decimals; 0 until the first refresh. */
  referencePrice: bigint;
  /** Seconds since epoch of the last refresh. */
  lastRefreshTime: number;
}

export interface RefreshOutcome {
  price: bigint;
  refreshed: boolean;
  at: number;
}

/**
 * Time-window cache in front of a {@link PriceOracleAdapter}.
 *
 * `refresh()` is the mutating path used by transactions; `read()` answers
 * views and never writes the cache, even when it has to ask the oracle.
 */
export class OraclePriceCache implements Revertible {
  private state: PriceCacheState = { referencePrice: 0n, lastRefreshTime: 0 };
  private readonly log: Logger;

  constructor(
    private readonly oracle: PriceOracleAdapter,
    readonly updateIntervalSec: number,
    private readonly clock: Clock = systemClock,
    logger?: Logger,
  ) {
    this.log = logger ?? categoryLogger('ORACLE');
  }

  snapshot(): Readonly<PriceCacheState> {
    return { ...this.state };
  }

  isStale(now: number = this.clock()): boolean {
    return this.state.referencePrice === 0n || now >= this.state.lastRefreshTime + this.updateIntervalSec;
  }

  async refresh(now: number = this.clock()): Promise<RefreshOutcome> {
    if (!this.isStale(now)) {
      return { price: this.state.referencePrice, refreshed: false, at: this.state.lastRefreshTime };
    }
    const price = await this.fetch();
    this.state = { referencePrice: price, lastRefreshTime: now };
    this.log.debug('oracle price refreshed', { price, at: now });
    return { price, refreshed: true, at: now };
  }

  async read(now: number = this.clock()): Promise<bigint> {
    if (!this.isStale(now)) return this.state.referencePrice;
    return this.fetch();
  }

  checkpoint(): Checkpoint {
    const saved = { ...this.state };
    return { revert: () => { this.state = saved; } };
  }

  private async fetch(): Promise<bigint> {
    let reading: OracleReading;
    try {
      reading = await this.oracle.latestPrice();
    } catch (e) {
      if (isCurveError(e)) throw e;
      this.log.warn('oracle read failed', { error: e });
      throw new CurveError('ORACLE_UNAVAILABLE', 'price oracle unavailable', { cause: e });
    }
    if (reading.price <= 0n) {
      throw new CurveError('ORACLE_INVALID_PRICE', 'oracle reported a non-positive price', {
        detail: { price: reading.price, updatedAt: reading.updatedAt },
      });
    }
    const scaled = rescale(reading.price, reading.decimals, ORACLE_DECIMALS);
    if (scaled <= 0n) {
      throw new CurveError('ORACLE_INVALID_PRICE', 'oracle price rounds to zero', {
        detail: { price: reading.price, decimals: reading.decimals },
      });
    }
    return scaled;
  }
}
