import type {
  Address, AssetLedger, Checkpoint, DepositReceipt, LiquidityDeposit, LiquiditySink, Revertible, SettlementLedger, SinkFailure,
} from '../contracts';
import { err, ok, type Result } from '../utils/result';
import { categoryLogger, type Logger } from '../utils/logger';

export interface PoolRequest {
  asset: Address;
  units: bigint;
  settlement: bigint;
  collector: Address;
}

/** Exchange venue the sink seeds; it receives the units and settlement before `addLiquidity` is called. */
export interface LiquidityVenue {
  readonly address: Address;
  /** Returns the pool id; throws when the venue rejects the request. */
  addLiquidity(req: PoolRequest): Promise<string>;
}

export interface SinkWiring {
  address: Address;
  venue: LiquidityVenue;
  /** Settlement ledger acting as the sink. */
  settlement: SettlementLedger;
  /** Asset ledger for `asset` acting as the sink, if the asset is known. */
  ledgerFor(asset: Address): AssetLedger | undefined;
  logger?: Logger;
}

export interface DepositRecord extends DepositReceipt {
  collector: Address;
  from: Address;
}

/**
 * Liquidity sink in front of an exchange venue: pulls the approved units,
 * hands units and attached settlement to the venue and keeps a deposit record.
 */
export class DexLiquiditySink implements LiquiditySink, Revertible {
  readonly address: Address;
  private readonly venue: LiquidityVenue;
  private readonly settlement: SettlementLedger;
  private readonly ledgerFor: (asset: Address) => AssetLedger | undefined;
  private readonly log: Logger;
  private records: DepositRecord[] = [];

  constructor(w: SinkWiring) {
    this.address = w.address;
    this.venue = w.venue;
    this.settlement = w.settlement;
    this.ledgerFor = w.ledgerFor;
    this.log = w.logger ?? categoryLogger('LIQUIDITY');
  }

  get deposits(): readonly DepositRecord[] { return this.records; }

  async deploy(d: LiquidityDeposit): Promise<Result<DepositReceipt, SinkFailure>> {
    const ledger = this.ledgerFor(d.asset);
    if (!ledger) return err('UNKNOWN_ASSET', `asset ${d.asset} is not listed`);
    if (d.units <= 0n) return err('EMPTY_DEPOSIT', 'deposit carries no units');

    const held = await this.settlement.balanceOf(this.address);
    if (held < d.settlement) return err('SETTLEMENT_MISSING', 'attached settlement not received', { held, expected: d.settlement });

    if (!(await ledger.transferFrom(d.from, this.address, d.units))) {
      return err('UNITS_NOT_APPROVED', 'could not pull approved units');
    }
    if (!(await ledger.transfer(this.venue.address, d.units))) {
      return err('VENUE_TRANSFER_FAILED', 'could not forward units to venue');
    }
    if (!(await this.settlement.transfer(this.venue.address, d.settlement))) {
      return err('VENUE_TRANSFER_FAILED', 'could not forward settlement to venue');
    }

    let poolId: string;
    try {
      poolId = await this.venue.addLiquidity({ asset: d.asset, units: d.units, settlement: d.settlement, collector: d.collector });
    } catch (e) {
      this.log.warn('venue rejected liquidity', { asset: d.asset, error: e });
      return err('VENUE_REJECTED', e instanceof Error ? e.message : String(e), e);
    }

    const receipt: DepositReceipt = { asset: d.asset, units: d.units, settlement: d.settlement, poolId };
    this.records.push({ ...receipt, collector: d.collector, from: d.from });
    this.log.info('liquidity deposited', { asset: d.asset, units: d.units, settlement: d.settlement, poolId });
    return ok(receipt);
  }

  checkpoint(): Checkpoint {
    const saved = [...this.records];
    return { revert: () => { this.records = saved; } };
  }
}
