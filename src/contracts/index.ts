// Capability contracts the curve engine consumes.
// Each is bound to one caller identity (the engine's own account) by whoever wires it.

import type { Address } from '../utils/address';
import type { Result } from '../utils/result';

export type { Address };

// --- Atomicity ---

/** Restores the state captured when the checkpoint was taken. */
export interface Checkpoint { revert(): void }

/** Anything whose state can be captured and rolled back. */
export interface Revertible { checkpoint(): Checkpoint }

/**
 * The execution substrate: the external world the engine mutates
 * (ledgers, venue) seen as one revertible unit. Units of work against it
 * never overlap, so a checkpoint taken at the start of one only covers that
 * unit's own changes.
 */
export interface ExecutionSubstrate extends Revertible {
  /** Run `work` after every earlier unit has settled; a call from inside a running unit joins it. */
  run<T>(work: () => Promise<T>): Promise<T>;
}

// --- Asset ledger ---

export interface AssetLedger {
  /** Ledger identity, recorded by the liquidity sink as the deposited asset. */
  readonly asset: Address;
  transfer(to: Address, amount: bigint): Promise<boolean>;
  transferFrom(from: Address, to: Address, amount: bigint): Promise<boolean>;
  approve(spender: Address, amount: bigint): Promise<boolean>;
  balanceOf(account: Address): Promise<bigint>;
}

// --- Settlement (native value) ---

export interface SettlementLedger {
  balanceOf(account: Address): Promise<bigint>;
  /** Send value from the bound account. */
  transfer(to: Address, amount: bigint): Promise<boolean>;
  /** Take value a caller attached to its call into the bound account. */
  pull(from: Address, amount: bigint): Promise<boolean>;
}

// --- Price oracle ---

export interface OracleReading {
  /** Raw integer answer, scaled by `decimals`. */
  price: bigint;
  decimals: number;
  /** Seconds since epoch. */
  updatedAt: number;
}

export interface PriceOracleAdapter {
  latestPrice(): Promise<OracleReading>;
}

// --- Liquidity sink ---

export interface LiquidityDeposit {
  asset: Address;
  units: bigint;
  /** Settlement already transferred to the sink alongside the call. */
  settlement: bigint;
  collector: Address;
  /** Account that approved `units` to the sink. */
  from: Address;
}

export interface DepositReceipt {
  asset: Address;
  units: bigint;
  settlement: bigint;
  poolId: string;
}

export interface SinkFailure { code: string; message: string; cause?: unknown }

export interface LiquiditySink {
  /** Account the sink receives value and allowances on. */
  readonly address: Address;
  deploy(deposit: LiquidityDeposit): Promise<Result<DepositReceipt, SinkFailure>>;
}

// --- Clock ---

/** Returns the current time in seconds since epoch. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
