import type { Address, AssetLedger, SettlementLedger } from '../../../src/contracts';
import { createCurveConfig, type CurveConfig } from '../../../src/config/curve-config';
import { CurveEngine } from '../../../src/core/curve-engine';
import { buildPaperWorld, launchCurve, type PaperWorld } from '../../../src/tools/paper/world';
import { getEventBus } from '../../../src/application/events/bus';
import { labelAddress } from '../../../src/utils/address';

/** One whole settlement unit (18 decimals). */
export const ONE = 10n ** 18n;
export const MILLION_UNITS = 1_000_000n * ONE;

/** Units delivered by seven 1.0 buys from a fresh curve at an oracle price of 3000. */
export const SEVEN_BUYS = [
  428571428571428571428571428n,
  69767441860465116279069767n,
  61224489795918367346938775n,
  55555555555555555555555555n,
  50847457627118644067796610n,
  47619047619047619047619047n,
  44776119402985074626865671n,
];
export const SEVEN_BUY_PRICES = [7n, 43n, 49n, 54n, 59n, 63n, 67n];

export function setupCurve(config: Partial<CurveConfig> = {}) {
  const world = buildPaperWorld({ bus: getEventBus() });
  const { engine, ledger } = launchCurve(world, 'TEST', config);
  return { world, engine, ledger };
}

export function fund(world: PaperWorld, label: string, amount: bigint): Address {
  const who = labelAddress(label);
  world.settlement.credit(who, amount);
  return who;
}

/** Balances and counters that a failed operation must leave untouched. */
export function fingerprint(ctx: ReturnType<typeof setupCurve>, accounts: Address[] = []) {
  const { world, engine, ledger } = ctx;
  const s = engine.getState();
  return {
    unsold: s.unsoldInventory,
    raised: s.cumulativeRaisedValueUSD,
    deployed: s.liquidityDeployed,
    deployedUnits: s.deployedUnits,
    engineSettlement: world.settlement.balanceOf(engine.address),
    engineUnits: ledger.balanceOf(engine.address),
    feeCollector: world.settlement.balanceOf(world.feeCollector),
    sink: world.settlement.balanceOf(world.sink.address),
    venueUnits: ledger.balanceOf(world.venue.address),
    audit: world.auditLog.size,
    accounts: accounts.map(a => [world.settlement.balanceOf(a), ledger.balanceOf(a)]),
  };
}

export interface WireOptions {
  config?: Partial<CurveConfig>;
  wrapAsset?: (inner: AssetLedger) => AssetLedger;
  wrapSettlement?: (inner: SettlementLedger) => SettlementLedger;
}

/** Engine on a fresh world with hooks to wrap the collaborators it is given. */
export function wireEngine(opts: WireOptions = {}) {
  const world = buildPaperWorld({ bus: getEventBus() });
  const engineAddress = labelAddress('engine:WIRED');
  const cfg = createCurveConfig(opts.config);
  const ledger = world.registry.deploy({ name: 'Wired', symbol: 'WIRED' }, cfg.totalSupply, engineAddress);
  const asset = ledger.connect(engineAddress);
  const settlement = world.settlement.connect(engineAddress);
  const engine = new CurveEngine({
    address: engineAddress,
    asset: opts.wrapAsset ? opts.wrapAsset(asset) : asset,
    settlement: opts.wrapSettlement ? opts.wrapSettlement(settlement) : settlement,
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
  return { world, engine, ledger };
}

/** Seven purchases of 1.0 from distinct buyers, all inside one oracle interval. */
export async function runSevenBuys(ctx: { world: PaperWorld; engine: CurveEngine }): Promise<Address[]> {
  const buyers: Address[] = [];
  for (let i = 0; i < 7; i++) {
    const buyer = fund(ctx.world, `buyer-${i}`, ONE);
    await ctx.engine.buy(ONE, buyer);
    buyers.push(buyer);
  }
  return buyers;
}
