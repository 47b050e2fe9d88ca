import type { Address, Checkpoint, Revertible } from '../contracts';
import type { LiquidityVenue, PoolRequest } from '../adapters/dex-liquidity-sink';
import { labelAddress } from '../utils/address';

export interface MockPool extends PoolRequest {
  poolId: string;
}

/** In-process stand-in for an exchange venue. */
export class MockVenue implements LiquidityVenue, Revertible {
  private pools: MockPool[] = [];
  private failure: string | null = null;

  constructor(readonly address: Address = labelAddress('mock-venue')) {}

  /** Make every following `addLiquidity` throw with `message`, or clear with null. */
  setFailure(message: string | null) {
    this.failure = message;
  }

  async addLiquidity(req: PoolRequest): Promise<string> {
    if (this.failure !== null) throw new Error(this.failure);
    const poolId = `pool-${this.pools.length + 1}`;
    this.pools.push({ ...req, poolId });
    return poolId;
  }

  listPools(): readonly MockPool[] {
    return this.pools;
  }

  checkpoint(): Checkpoint {
    const saved = [...this.pools];
    return { revert: () => { this.pools = saved; } };
  }
}
