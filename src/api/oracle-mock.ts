import type { Clock, OracleReading, PriceOracleAdapter } from '../contracts';
import { systemClock } from '../contracts';

export interface MockOracleOptions {
  /** Raw answer, scaled by `decimals`. */
  price: bigint;
  decimals?: number;
  clock?: Clock;
}

/** Settable price oracle for paper runs and tests. 8 decimals by default, like a typical push feed. */
export class MockOracle implements PriceOracleAdapter {
  private price: bigint;
  private readonly decimals: number;
  private readonly clock: Clock;
  private failure: Error | null = null;
  private reads = 0;

  constructor(opts: MockOracleOptions) {
    this.price = opts.price;
    this.decimals = opts.decimals ?? 8;
    this.clock = opts.clock ?? systemClock;
  }

  get readCount(): number { return this.reads; }

  setPrice(price: bigint) {
    this.price = price;
  }

  setFailure(error: Error | null) {
    this.failure = error;
  }

  async latestPrice(): Promise<OracleReading> {
    this.reads++;
    if (this.failure) throw this.failure;
    return { price: this.price, decimals: this.decimals, updatedAt: this.clock() };
  }
}
