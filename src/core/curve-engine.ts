import type {
  Address, AssetLedger, Clock, ExecutionSubstrate, LiquiditySink, PriceOracleAdapter, SettlementLedger,
} from '../contracts';
import { systemClock } from '../contracts';
import { createCurveConfig, validateCurveConfig, type CurveConfig } from '../config/curve-config';
import { CurveError, buildErrorEventMeta, categoryOf, normalizeErrorCode } from '../application/errors';
import { AuditLog } from '../application/events/audit-log';
import { getEventBus, type EventBus } from '../application/events/bus';
import type { CurveEvent } from '../application/events/types';
import { isAddress } from '../utils/address';
import { categoryLogger, type Logger } from '../utils/logger';
import { atomically, BusyFlag } from './atomic';
import { CurveStateCell, type CurveState } from './curve-state';
import { deploymentBlocker, runDeployment, type DeploymentOutcome } from './liquidity';
import { OraclePriceCache, type RefreshOutcome } from './price-cache';
import {
  computeFee, marketCap, quoteBuyUnits, quoteSellSettlement, sellableUnits, settlementForUnits, soldUnits, spotPrice, toReferenceValue,
} from './pricing';
import { requireTransfer } from './transfers';

export interface CurveEngineDeps {
  /** The engine's own account on both ledgers. */
  address: Address;
  /** Asset ledger acting as the engine. */
  asset: AssetLedger;
  /** Settlement ledger acting as the engine. */
  settlement: SettlementLedger;
  oracle: PriceOracleAdapter;
  liquiditySink: LiquiditySink;
  feeCollector: Address;
  liquidityCollector: Address;
  substrate: ExecutionSubstrate;
  config?: Partial<CurveConfig>;
  auditLog?: AuditLog;
  bus?: EventBus;
  clock?: Clock;
  logger?: Logger;
  liquidityLogger?: Logger;
}

export interface BuyOptions {
  /** Reject the fill when fewer units would be delivered. */
  minUnitsOut?: bigint;
}

export interface BuyQuote {
  unitsOut: bigint;
  /** Settlement actually taken; below the offer when the fill is capped at the sale threshold. */
  settlementCharged: bigint;
  price: bigint;
}

export interface PurchaseReceipt extends BuyQuote {
  fee: bigint;
  /** Part of the offer that was never pulled from the payer. */
  unspent: bigint;
  liquidity: DeploymentOutcome | null;
}

export interface SellQuote {
  settlementOut: bigint;
  fee: bigint;
  net: bigint;
  price: bigint;
}

export interface SaleReceipt extends SellQuote {
  units: bigint;
}

export interface CurveSnapshot extends CurveState {
  asset: Address;
  soldUnits: bigint;
  sellableUnits: bigint;
  thresholdReached: boolean;
  referencePrice: bigint;
  lastRefreshTime: number;
}

interface OperationMeta {
  account?: Address;
  amount?: bigint;
}

/**
 * Bonding-curve market for one issued asset.
 *
 * Every mutating entry point runs as one atomic unit on the execution
 * substrate, which orders units from independent callers; a call back into the
 * engine from inside a running unit is rejected. Engine counters, the oracle
 * cache and the substrate are checkpointed and reverted together on failure. Events raised inside a unit
 * are buffered and only reach the audit log and the bus after it succeeds.
 */
export class CurveEngine {
  readonly address: Address;
  readonly config: Readonly<CurveConfig>;
  readonly auditLog: AuditLog;

  private readonly asset: AssetLedger;
  private readonly settlement: SettlementLedger;
  private readonly sink: LiquiditySink;
  private readonly feeCollector: Address;
  private readonly liquidityCollector: Address;
  private readonly substrate: ExecutionSubstrate;
  private readonly bus: EventBus;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly liquidityLog: Logger;

  private readonly state: CurveStateCell;
  private readonly cache: OraclePriceCache;
  private readonly busy = new BusyFlag();
  private pending: CurveEvent[] = [];

  constructor(deps: CurveEngineDeps) {
    const cfg = createCurveConfig(deps.config);
    const check = validateCurveConfig(cfg);
    if (!check.valid) {
      throw new CurveError('INVALID_CONFIG', `invalid curve config: ${check.errors.join('; ')}`, { detail: { errors: check.errors } });
    }
    for (const [name, value] of [['feeCollector', deps.feeCollector], ['liquidityCollector', deps.liquidityCollector]] as const) {
      if (!isAddress(value)) throw new CurveError('INVALID_CONFIG', `invalid ${name} address: ${value}`);
    }
    this.config = cfg;
    this.address = deps.address;
    this.asset = deps.asset;
    this.settlement = deps.settlement;
    this.sink = deps.liquiditySink;
    this.feeCollector = deps.feeCollector;
    this.liquidityCollector = deps.liquidityCollector;
    this.substrate = deps.substrate;
    this.auditLog = deps.auditLog ?? new AuditLog();
    this.bus = deps.bus ?? getEventBus();
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? categoryLogger('CURVE');
    this.liquidityLog = deps.liquidityLogger ?? categoryLogger('LIQUIDITY');
    this.state = new CurveStateCell(cfg.totalSupply);
    this.cache = new OraclePriceCache(deps.oracle, cfg.oracleUpdateIntervalSec, this.clock);
  }

  get assetId(): Address { return this.asset.asset; }

  // --- mutating operations ---

  async buy(settlementIn: bigint, buyer: Address, opts: BuyOptions = {}): Promise<PurchaseReceipt> {
    return this.execute('buy', { account: buyer, amount: settlementIn }, async () => {
      if (settlementIn <= 0n) throw new CurveError('ZERO_INPUT', 'settlement amount must be positive');
      const before = this.state.get();
      if (before.unsoldInventory === 0n || sellableUnits(this.config.deployUnits, before) === 0n) {
        throw new CurveError('SUPPLY_EXHAUSTED', 'no inventory left for sale');
      }

      const { price: oraclePrice } = await this.refreshOracle();
      const q = this.planBuy(settlementIn, oraclePrice, before);
      if (q.unitsOut === 0n) throw new CurveError('ZERO_OUTPUT', 'settlement amount buys zero units', { detail: { settlementIn, price: q.price } });
      if (opts.minUnitsOut !== undefined && q.unitsOut < opts.minUnitsOut) {
        throw new CurveError('SLIPPAGE_EXCEEDED', 'fill below minimum units out', {
          detail: { unitsOut: q.unitsOut, minUnitsOut: opts.minUnitsOut },
        });
      }

      await requireTransfer('SETTLEMENT_TRANSFER_FAILED', 'could not take payment from buyer',
        () => this.settlement.pull(buyer, q.settlementCharged), { buyer, amount: q.settlementCharged });
      const { fee, net } = computeFee(q.settlementCharged, this.config.feePercent);
      if (fee > 0n) {
        await requireTransfer('FEE_TRANSFER_FAILED', 'fee transfer rejected',
          () => this.settlement.transfer(this.feeCollector, fee), { fee });
      }
      await requireTransfer('LEDGER_TRANSFER_FAILED', 'asset transfer to buyer rejected',
        () => this.asset.transfer(buyer, q.unitsOut), { buyer, units: q.unitsOut });

      const basis = this.config.raisedValueBasis === 'net' ? net : q.settlementCharged;
      const after = this.state.update({
        unsoldInventory: before.unsoldInventory - q.unitsOut,
        cumulativeRaisedValueUSD: before.cumulativeRaisedValueUSD + toReferenceValue(basis, oraclePrice),
      });

      const liquidity = deploymentBlocker(this.config, after) === null ? await this.deploy() : null;

      this.emit({
        type: 'PURCHASE_EXECUTED', buyer, units: q.unitsOut, settlementIn: q.settlementCharged, fee, price: q.price,
      });
      return { ...q, fee, unspent: settlementIn - q.settlementCharged, liquidity };
    });
  }

  async sell(unitsIn: bigint, seller: Address): Promise<SaleReceipt> {
    return this.execute('sell', { account: seller, amount: unitsIn }, async () => {
      if (unitsIn <= 0n) throw new CurveError('ZERO_INPUT', 'unit amount must be positive');

      const { price: oraclePrice } = await this.refreshOracle();
      const before = this.state.get();
      const q = this.planSell(unitsIn, oraclePrice, before);
      const sold = soldUnits(this.config.totalSupply, before);
      if (unitsIn > sold) {
        throw new CurveError('INSUFFICIENT_INVENTORY', 'cannot sell back more units than were sold', { detail: { unitsIn, sold } });
      }
      if (q.settlementOut === 0n) throw new CurveError('ZERO_OUTPUT', 'unit amount is worth zero settlement', { detail: { unitsIn } });
      const reserve = await this.settlement.balanceOf(this.address);
      if (reserve < q.settlementOut) {
        throw new CurveError('INSUFFICIENT_RESERVE', 'engine reserve below sale proceeds', {
          detail: { reserve, settlementOut: q.settlementOut },
        });
      }

      await requireTransfer('LEDGER_TRANSFER_FAILED', 'could not take units from seller',
        () => this.asset.transferFrom(seller, this.address, unitsIn), { seller, units: unitsIn });
      this.state.update({ unsoldInventory: before.unsoldInventory + unitsIn });

      if (q.fee > 0n) {
        await requireTransfer('FEE_TRANSFER_FAILED', 'fee transfer rejected',
          () => this.settlement.transfer(this.feeCollector, q.fee), { fee: q.fee });
      }
      await requireTransfer('SETTLEMENT_TRANSFER_FAILED', 'payout to seller rejected',
        () => this.settlement.transfer(seller, q.net), { seller, amount: q.net });

      this.emit({
        type: 'SALE_EXECUTED', seller, units: unitsIn, settlementOut: q.settlementOut, fee: q.fee, price: q.price,
      });
      return { ...q, units: unitsIn };
    });
  }

  /** Refresh the cached oracle price if the update interval has passed. */
  async refreshPrice(): Promise<RefreshOutcome> {
    return this.execute('refreshPrice', {}, () => this.refreshOracle());
  }

  /** Run the deployment transition explicitly once its guard holds. */
  async deployLiquidity(): Promise<DeploymentOutcome> {
    return this.execute('deployLiquidity', {}, async () => {
      const blocker = deploymentBlocker(this.config, this.state.get());
      if (blocker === 'ALREADY_DEPLOYED') throw new CurveError('ALREADY_DEPLOYED', 'liquidity already deployed');
      if (blocker) throw new CurveError('THRESHOLD_NOT_MET', 'deployment thresholds not met', { detail: { blocker } });
      return this.deploy();
    });
  }

  // --- views ---

  /** Oracle price (18 decimals); reads through to the oracle when the cache is stale, without updating it. */
  async getOraclePrice(): Promise<bigint> {
    return this.cache.read(this.clock());
  }

  async getCurrentPrice(): Promise<bigint> {
    const oraclePrice = await this.getOraclePrice();
    return spotPrice(this.config, oraclePrice, soldUnits(this.config.totalSupply, this.state.get()), this.config.priceFractionPolicy);
  }

  async quoteBuy(settlementIn: bigint): Promise<BuyQuote> {
    return this.planBuy(settlementIn, await this.getOraclePrice(), this.state.get());
  }

  async quoteSell(unitsIn: bigint): Promise<SellQuote> {
    return this.planSell(unitsIn, await this.getOraclePrice(), this.state.get());
  }

  /** Settlement a buy must offer to receive at least `units` at the current price. */
  async quoteSettlementForUnits(units: bigint): Promise<bigint> {
    const oraclePrice = await this.getOraclePrice();
    const price = spotPrice(this.config, oraclePrice, soldUnits(this.config.totalSupply, this.state.get()), this.config.priceFractionPolicy);
    return settlementForUnits(units, oraclePrice, price);
  }

  /** Total supply valued at the current unit price, in reference currency (18 decimals). */
  async getMarketCapUSD(): Promise<bigint> {
    return marketCap(this.config.totalSupply, await this.getCurrentPrice());
  }

  getState(): CurveSnapshot {
    const s = this.state.get();
    const cached = this.cache.snapshot();
    const sold = soldUnits(this.config.totalSupply, s);
    return {
      ...s,
      asset: this.assetId,
      soldUnits: sold,
      sellableUnits: sellableUnits(this.config.deployUnits, s),
      thresholdReached: sold >= this.config.saleThreshold && s.cumulativeRaisedValueUSD >= this.config.raiseTargetUSD,
      referencePrice: cached.referencePrice,
      lastRefreshTime: cached.lastRefreshTime,
    };
  }

  get isBusy(): boolean { return this.busy.busy; }

  // --- internals ---

  private planBuy(settlementIn: bigint, oraclePrice: bigint, s: CurveState): BuyQuote {
    const price = spotPrice(this.config, oraclePrice, soldUnits(this.config.totalSupply, s), this.config.priceFractionPolicy);
    const quoted = quoteBuyUnits(settlementIn, oraclePrice, price);
    if (quoted > s.unsoldInventory) {
      throw new CurveError('INSUFFICIENT_INVENTORY', 'not enough inventory for this purchase', {
        detail: { unitsOut: quoted, unsoldInventory: s.unsoldInventory },
      });
    }
    const sellable = sellableUnits(this.config.deployUnits, s);
    if (quoted <= sellable) return { unitsOut: quoted, settlementCharged: settlementIn, price };
    // cap the fill so the crossing purchase lands on the threshold exactly
    return { unitsOut: sellable, settlementCharged: settlementForUnits(sellable, oraclePrice, price), price };
  }

  private planSell(unitsIn: bigint, oraclePrice: bigint, s: CurveState): SellQuote {
    if (unitsIn <= 0n) throw new CurveError('EMPTY_INPUT', 'unit amount must be positive');
    const sold = soldUnits(this.config.totalSupply, s);
    if (sold === 0n) throw new CurveError('NO_INVENTORY_SOLD', 'nothing has been sold yet');
    const price = spotPrice(this.config, oraclePrice, sold, this.config.priceFractionPolicy);
    const settlementOut = quoteSellSettlement(unitsIn, oraclePrice, price);
    const { fee, net } = computeFee(settlementOut, this.config.feePercent);
    return { settlementOut, fee, net, price };
  }

  private async refreshOracle(): Promise<RefreshOutcome> {
    const outcome = await this.cache.refresh(this.clock());
    if (outcome.refreshed) this.emit({ type: 'PRICE_REFRESHED', newPrice: outcome.price });
    return outcome;
  }

  private async deploy(): Promise<DeploymentOutcome> {
    const outcome = await runDeployment({
      cfg: this.config,
      state: this.state,
      engine: this.address,
      asset: this.asset,
      settlement: this.settlement,
      sink: this.sink,
      feeCollector: this.feeCollector,
      liquidityCollector: this.liquidityCollector,
      log: this.liquidityLog,
    });
    this.emit({ type: 'LIQUIDITY_DEPLOYED', ...outcome });
    return outcome;
  }

  private emit(ev: PendingEvent): void {
    this.pending.push({ ...ev, asset: this.assetId, seq: 0, at: this.clock() });
  }

  private async execute<T>(operation: string, meta: OperationMeta, work: () => Promise<T>): Promise<T> {
    try {
      return await this.substrate.run(() => this.busy.run(operation, async () => {
        this.pending = [];
        try {
          const result = await atomically([this.state, this.cache, this.substrate], work);
          this.commit();
          return result;
        } finally {
          this.pending = [];
        }
      }));
    } catch (e) {
      this.reportFailure(operation, meta, e);
      throw e;
    }
  }

  private commit() {
    for (const ev of this.pending) {
      const committed = this.auditLog.append(ev);
      this.bus.publish(committed);
      this.log.debug('event committed', { type: committed.type, seq: committed.seq });
    }
  }

  private reportFailure(operation: string, meta: OperationMeta, e: unknown) {
    const payload = buildErrorEventMeta({ asset: this.assetId, operation, account: meta.account, amount: meta.amount }, e);
    const code = normalizeErrorCode(e);
    const level = categoryOf(code) === 'input' || code === 'REENTRANCY_REJECTED' ? 'warn' : 'error';
    this.log[level](`${operation} failed: ${code}`, payload);
    this.bus.publish({ type: 'EVENT/ERROR', at: this.clock(), ...payload });
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type PendingEvent = DistributiveOmit<CurveEvent, 'asset' | 'seq' | 'at'>;
