import type { Address, Clock, ExecutionSubstrate, LiquiditySink, PriceOracleAdapter } from '../contracts';
import { systemClock } from '../contracts';
import { createCurveConfig, type CurveConfig } from '../config/curve-config';
import type { InMemoryAssetLedger, InMemoryAssetRegistry } from '../adapters/in-memory-asset-ledger';
import type { InMemorySettlementLedger } from '../adapters/in-memory-settlement-ledger';
import { CurveEngine, type PurchaseReceipt } from '../core/curve-engine';
import { atomically } from '../core/atomic';
import { requireTransfer } from '../core/transfers';
import { labelAddress, isAddress } from '../utils/address';
import { parseUnits } from '../utils/units';
import { categoryLogger, type Logger } from '../utils/logger';
import { CurveError, buildErrorEventMeta } from './errors';
import { AuditLog } from './events/audit-log';
import { getEventBus, type EventBus } from './events/bus';
import type { AssetCreatedEvent } from './events/types';

export const DEFAULT_CREATION_FEE = parseUnits('0.002');

/** Proof of administrative authority over one factory; only identity matters. */
export interface AdminCapability {
  readonly kind: 'curve-factory-admin';
  readonly factory: Address;
}

export interface CurveFactoryDeps {
  address?: Address;
  registry: InMemoryAssetRegistry;
  settlement: InMemorySettlementLedger;
  liquiditySink: LiquiditySink;
  feeCollector: Address;
  liquidityCollector: Address;
  substrate: ExecutionSubstrate;
  creationFee?: bigint;
  curveConfig?: Partial<CurveConfig>;
  auditLog?: AuditLog;
  bus?: EventBus;
  clock?: Clock;
  logger?: Logger;
}

export interface CreateAssetParams {
  name: string;
  symbol: string;
  creator: Address;
  /** Settlement offered by the creator: the creation fee plus an optional initial buy. */
  payment: bigint;
  oracle: PriceOracleAdapter;
}

export interface CreatedAsset {
  asset: Address;
  engine: CurveEngine;
  ledger: InMemoryAssetLedger;
  creator: Address;
  initialBuy: PurchaseReceipt | null;
}

/**
 * Issues new assets: stub-deploys a ledger holding the full supply in a fresh
 * engine account, wires a {@link CurveEngine} to it and optionally runs the
 * creator's first buy, all in one atomic unit.
 */
export class CurveFactory {
  readonly address: Address;
  readonly auditLog: AuditLog;
  private readonly admin: AdminCapability;
  private readonly registry: InMemoryAssetRegistry;
  private readonly settlement: InMemorySettlementLedger;
  private readonly substrate: ExecutionSubstrate;
  private readonly curveConfig: Partial<CurveConfig>;
  private readonly liquidityCollector: Address;
  private readonly bus: EventBus;
  private readonly clock: Clock;
  private readonly log: Logger;

  private sink: LiquiditySink;
  private feeCollector: Address;
  private fee: bigint;
  private assets = new Map<Address, CreatedAsset>();
  private launched = 0;

  private constructor(deps: CurveFactoryDeps, admin: AdminCapability) {
    this.address = admin.factory;
    this.admin = admin;
    this.registry = deps.registry;
    this.settlement = deps.settlement;
    this.substrate = deps.substrate;
    this.curveConfig = deps.curveConfig ?? {};
    this.sink = deps.liquiditySink;
    this.feeCollector = deps.feeCollector;
    this.liquidityCollector = deps.liquidityCollector;
    this.fee = deps.creationFee ?? DEFAULT_CREATION_FEE;
    this.auditLog = deps.auditLog ?? new AuditLog();
    this.bus = deps.bus ?? getEventBus();
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? categoryLogger('FACTORY');
  }

  /** Build a factory and the capability that authorizes its administrative setters. */
  static create(deps: CurveFactoryDeps): { factory: CurveFactory; admin: AdminCapability } {
    const admin: AdminCapability = Object.freeze({ kind: 'curve-factory-admin', factory: deps.address ?? labelAddress('curve-factory') });
    return { factory: new CurveFactory(deps, admin), admin };
  }

  get creationFee(): bigint { return this.fee; }

  async createAsset(p: CreateAssetParams): Promise<CreatedAsset> {
    // taken before any await so overlapping calls never share an engine account
    const engineAddress = labelAddress(`engine:${this.address}:${p.symbol}:${this.launched++}`);
    try {
      if (p.payment < this.fee) {
        throw new CurveError('INSUFFICIENT_RESERVE', 'payment below creation fee', { detail: { payment: p.payment, creationFee: this.fee } });
      }
      const { created, event } = await this.substrate.run(async () => {
        const unit = await atomically([this.registry, this.auditLog, this.substrate], async () => {
          if (this.accountInUse(engineAddress)) {
            throw new CurveError('INVALID_CONFIG', `engine account already in use: ${engineAddress}`, { detail: { engine: engineAddress } });
          }
          if (this.fee > 0n) {
            const factoryLedger = this.settlement.connect(this.address);
            await requireTransfer('SETTLEMENT_TRANSFER_FAILED', 'could not take creation fee',
              () => factoryLedger.pull(p.creator, this.fee));
            await requireTransfer('FEE_TRANSFER_FAILED', 'creation fee transfer rejected',
              () => factoryLedger.transfer(this.feeCollector, this.fee));
          }

          const config = createCurveConfig(this.curveConfig);
          const ledger = this.registry.deploy({ name: p.name, symbol: p.symbol }, config.totalSupply, engineAddress);
          const engine = new CurveEngine({
            address: engineAddress,
            asset: ledger.connect(engineAddress),
            settlement: this.settlement.connect(engineAddress),
            oracle: p.oracle,
            liquiditySink: this.sink,
            feeCollector: this.feeCollector,
            liquidityCollector: this.liquidityCollector,
            substrate: this.substrate,
            config,
            auditLog: this.auditLog,
            bus: this.bus,
            clock: this.clock,
          });

          const event = this.auditLog.append<AssetCreatedEvent>({
            type: 'ASSET_CREATED', asset: ledger.asset, seq: 0, at: this.clock(),
            creator: p.creator, name: p.name, symbol: p.symbol, engine: engineAddress,
          });

          const remainder = p.payment - this.fee;
          const initialBuy = remainder > 0n ? await engine.buy(remainder, p.creator) : null;
          const created: CreatedAsset = { asset: ledger.asset, engine, ledger, creator: p.creator, initialBuy };
          return { created, event };
        });
        this.assets.set(unit.created.asset, unit.created);
        return unit;
      });
      this.bus.publish(event);
      this.log.info('asset created', { asset: created.asset, symbol: p.symbol, creator: p.creator, engine: engineAddress });
      return created;
    } catch (e) {
      const payload = buildErrorEventMeta({ operation: 'createAsset', account: p.creator, amount: p.payment }, e);
      this.log.warn('asset creation failed', payload);
      this.bus.publish({ type: 'EVENT/ERROR', at: this.clock(), ...payload });
      throw e;
    }
  }

  getEngine(asset: Address): CurveEngine | undefined {
    return this.assets.get(asset)?.engine;
  }

  listAssets(): CreatedAsset[] {
    return [...this.assets.values()];
  }

  // --- administrative setters ---

  setCreationFee(cap: AdminCapability, fee: bigint) {
    this.authorize(cap, 'setCreationFee');
    if (fee < 0n) throw new CurveError('INVALID_CONFIG', 'creation fee must be >= 0');
    this.fee = fee;
  }

  setFeeCollector(cap: AdminCapability, collector: Address) {
    this.authorize(cap, 'setFeeCollector');
    if (!isAddress(collector)) throw new CurveError('INVALID_CONFIG', `invalid fee collector address: ${collector}`);
    this.feeCollector = collector;
  }

  /** Applies to assets created afterwards; existing engines keep their sink. */
  setLiquiditySink(cap: AdminCapability, sink: LiquiditySink) {
    this.authorize(cap, 'setLiquiditySink');
    this.sink = sink;
  }

  /** An account some engine or holder already uses on the settlement ledger or any asset ledger. */
  private accountInUse(account: Address): boolean {
    if ([...this.assets.values()].some(a => a.engine.address.toLowerCase() === account.toLowerCase())) return true;
    if (this.settlement.balanceOf(account) > 0n) return true;
    return this.registry.list().some(l => l.balanceOf(account) > 0n);
  }

  private authorize(cap: AdminCapability, operation: string) {
    if (cap !== this.admin) {
      this.log.warn('unauthorized admin call', { operation });
      throw new CurveError('UNAUTHORIZED', `${operation} requires the factory admin capability`);
    }
  }
}
