import type { Checkpoint, Revertible } from '../contracts';
import type { InventoryCounters } from './pricing';

export interface CurveState extends InventoryCounters {
  /** Running reference-currency value (18 decimals) raised by buys. */
  cumulativeRaisedValueUSD: bigint;
}

export function initialCurveState(totalSupply: bigint): CurveState {
  return {
    unsoldInventory: totalSupply,
    cumulativeRaisedValueUSD: 0n,
    liquidityDeployed: false,
    deployedUnits: 0n,
  };
}

/** Owns the engine's mutable counters; writes go through `update` so they can be rolled back. */
export class CurveStateCell implements Revertible {
  private state: CurveState;

  constructor(private readonly totalSupply: bigint) {
    this.state = initialCurveState(totalSupply);
  }

  get(): Readonly<CurveState> {
    return this.state;
  }

  update(patch: Partial<CurveState>): Readonly<CurveState> {
    const next = { ...this.state, ...patch };
    assertCurveInvariants(this.totalSupply, this.state, next);
    this.state = next;
    return next;
  }

  checkpoint(): Checkpoint {
    const saved = this.state;
    return { revert: () => { this.state = saved; } };
  }
}

export function assertCurveInvariants(totalSupply: bigint, prev: CurveState, next: CurveState) {
  if (next.unsoldInventory < 0n || next.unsoldInventory + next.deployedUnits > totalSupply) {
    throw new RangeError(`unsold inventory out of range: ${next.unsoldInventory}`);
  }
  if (prev.liquidityDeployed && !next.liquidityDeployed) {
    throw new RangeError('liquidity deployment latch cannot be reset');
  }
  if (next.cumulativeRaisedValueUSD < prev.cumulativeRaisedValueUSD) {
    throw new RangeError('raised value cannot decrease');
  }
}
