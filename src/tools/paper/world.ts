import type { Address, Clock } from '../../contracts';
import { createCurveConfig, type CurveConfig } from '../../config/curve-config';
import { InMemoryAssetRegistry, type InMemoryAssetLedger } from '../../adapters/in-memory-asset-ledger';
import { InMemorySettlementLedger } from '../../adapters/in-memory-settlement-ledger';
import { InMemorySubstrate } from '../../adapters/in-memory-substrate';
import { DexLiquiditySink } from '../../adapters/dex-liquidity-sink';
import { MockOracle } from '../../api/oracle-mock';
import { MockVenue } from '../../api/venue-mock';
import { AuditLog } from '../../application/events/audit-log';
import { getEventBus, type EventBus } from '../../application/events/bus';
import { CurveEngine } from '../../core/curve-engine';
import { labelAddress } from '../../utils/address';

/** Settable clock in seconds. */
export class ManualClock {
  constructor(private t = 1_700_000_000) {}
  readonly now: Clock = () => this.t;
  advance(seconds: number) { this.t += seconds; }
}

export interface PaperWorldOptions {
  /** Oracle answer with 8 decimals; 3000 USD by default. */
  oraclePrice?: bigint;
  bus?: EventBus;
  startTime?: number;
  feeCollector?: Address;
  liquidityCollector?: Address;
}

export interface PaperWorld {
  clock: ManualClock;
  oracle: MockOracle;
  settlement: InMemorySettlementLedger;
  registry: InMemoryAssetRegistry;
  venue: MockVenue;
  sink: DexLiquiditySink;
  substrate: InMemorySubstrate;
  auditLog: AuditLog;
  bus: EventBus;
  feeCollector: Address;
  liquidityCollector: Address;
}

/** Fully in-process world: ledgers, oracle, venue and sink, checkpointed by one substrate. */
export function buildPaperWorld(opts: PaperWorldOptions = {}): PaperWorld {
  const clock = new ManualClock(opts.startTime);
  const oracle = new MockOracle({ price: opts.oraclePrice ?? 300_000_000_000n, decimals: 8, clock: clock.now });
  const settlement = new InMemorySettlementLedger();
  const registry = new InMemoryAssetRegistry();
  const venue = new MockVenue();
  const sinkAddress = labelAddress('liquidity-sink');
  const sink = new DexLiquiditySink({
    address: sinkAddress,
    venue,
    settlement: settlement.connect(sinkAddress),
    ledgerFor: (asset) => registry.ledgerFor(asset, sinkAddress),
  });
  const substrate = new InMemorySubstrate([settlement, registry, sink, venue]);
  return {
    clock, oracle, settlement, registry, venue, sink, substrate,
    auditLog: new AuditLog(),
    bus: opts.bus ?? getEventBus(),
    feeCollector: opts.feeCollector ?? labelAddress('fee-collector'),
    liquidityCollector: opts.liquidityCollector ?? labelAddress('liquidity-collector'),
  };
}

export interface LaunchedCurve {
  engine: CurveEngine;
  ledger: InMemoryAssetLedger;
}

/** Deploy a ledger holding the whole supply in a fresh engine account and wire an engine to it. */
export function launchCurve(world: PaperWorld, symbol = 'CURVE', config: Partial<CurveConfig> = {}): LaunchedCurve {
  const engineAddress = labelAddress(`engine:${symbol}`);
  const cfg = createCurveConfig(config);
  const ledger = world.registry.deploy({ name: symbol, symbol }, cfg.totalSupply, engineAddress);
  const engine = new CurveEngine({
    address: engineAddress,
    asset: ledger.connect(engineAddress),
    settlement: world.settlement.connect(engineAddress),
    oracle: world.oracle,
    liquiditySink: world.sink,
    feeCollector: world.feeCollector,
    liquidityCollector: world.liquidityCollector,
    substrate: world.substrate,
    config: cfg,
    auditLog: world.auditLog,
    bus: world.bus,
    clock: world.clock.now,
  });
  return { engine, ledger };
}
