import 'dotenv/config';
import { buildPaperWorld, type PaperWorld } from './paper/world';
import type { PriceOracleAdapter } from '../contracts';
import type { CurveConfig } from '../config/curve-config';
import { CurveFactory } from '../application/curve-factory';
import { registerAllSubscribers } from '../application/events';
import type { CurveEvent } from '../application/events/types';
import { HttpPriceFeed } from '../api/price-feed-http';
import type { CurveEngine } from '../core/curve-engine';
import { loadAppConfig, type AppConfig } from '../utils/config';
import { labelAddress, type Address } from '../utils/address';
import { formatUnits, parseUnits } from '../utils/units';
import { logError, logInfo } from '../utils/logger';

// Paper run of a launch through the factory: SIM_BUYS purchases of
// SIM_BUY_AMOUNT each, then one purchase sized to land on the sale threshold.

function printState(label: string, engine: CurveEngine) {
  const s = engine.getState();
  logInfo(`[SIM] ${label}`, {
    unsold: formatUnits(s.unsoldInventory),
    sold: formatUnits(s.soldUnits),
    raisedUSD: formatUnits(s.cumulativeRaisedValueUSD),
    deployed: s.liquidityDeployed,
  });
}

export interface SimulationParams {
  buys: number;
  /** Settlement offered by each buy. */
  amount: bigint;
  /** Oracle answer with 8 decimals. */
  oraclePrice: bigint;
  curve?: Partial<CurveConfig>;
  feeCollector?: Address;
  liquidityCollector?: Address;
  /** Price source for the curve; the world's mock oracle when omitted. */
  oracle?: PriceOracleAdapter;
  creationFee?: bigint;
}

export interface SimulationResult {
  world: PaperWorld;
  engine: CurveEngine;
  /** Records committed by the closing buy. */
  closing: CurveEvent[];
}

export async function runSimulation(p: SimulationParams): Promise<SimulationResult> {
  const world = buildPaperWorld({ oraclePrice: p.oraclePrice, feeCollector: p.feeCollector, liquidityCollector: p.liquidityCollector });
  const { factory } = CurveFactory.create({
    registry: world.registry,
    settlement: world.settlement,
    liquiditySink: world.sink,
    feeCollector: world.feeCollector,
    liquidityCollector: world.liquidityCollector,
    substrate: world.substrate,
    creationFee: p.creationFee,
    curveConfig: p.curve,
    auditLog: world.auditLog,
    bus: world.bus,
    clock: world.clock.now,
  });
  const creator = labelAddress('creator');
  world.settlement.credit(creator, factory.creationFee);
  const { engine } = await factory.createAsset({
    name: 'Paper', symbol: 'PAPER', creator, payment: factory.creationFee, oracle: p.oracle ?? world.oracle,
  });
  printState('launched', engine);

  for (let i = 0; i < p.buys; i++) {
    const buyer = labelAddress(`buyer-${i}`);
    world.settlement.credit(buyer, p.amount);
    const r = await engine.buy(p.amount, buyer);
    logInfo(`[SIM] buy #${i + 1}`, { units: formatUnits(r.unitsOut), price: r.price, fee: formatUnits(r.fee) });
    world.clock.advance(30);
  }
  printState(`after ${p.buys} buys`, engine);

  const mark = world.auditLog.lastSeq;
  const { sellableUnits, liquidityDeployed } = engine.getState();
  if (!liquidityDeployed && sellableUnits > 0n) {
    const closer = labelAddress('closer');
    const needed = await engine.quoteSettlementForUnits(sellableUnits);
    world.settlement.credit(closer, needed);
    const r = await engine.buy(needed, closer);
    logInfo('[SIM] closing buy', {
      units: formatUnits(r.unitsOut), charged: formatUnits(r.settlementCharged), deployed: r.liquidity !== null,
    });
  }
  const closing = world.auditLog.since(mark);
  printState('final', engine);
  logInfo('[SIM] closing records', { types: closing.map(r => r.type) });
  logInfo('[SIM] balances', {
    engine: formatUnits(world.settlement.balanceOf(engine.address)),
    feeCollector: formatUnits(world.settlement.balanceOf(world.feeCollector)),
    venue: formatUnits(world.settlement.balanceOf(world.venue.address)),
    pools: world.venue.listPools().length,
    auditRecords: world.auditLog.size,
  });
  return { world, engine, closing };
}

/** Simulation inputs from the app config and the SIM_* variables; PRICE_FEED_URL replaces the mock oracle. */
export function simulationParams(app: AppConfig, env: NodeJS.ProcessEnv = process.env): SimulationParams {
  return {
    buys: Math.max(0, Number(env.SIM_BUYS || '7')),
    amount: parseUnits(env.SIM_BUY_AMOUNT || '1'),
    oraclePrice: BigInt(env.SIM_ORACLE_PRICE || '300000000000'),
    curve: app.curve,
    feeCollector: app.feeCollector,
    liquidityCollector: app.liquidityCollector,
    oracle: app.priceFeedUrl ? new HttpPriceFeed(app.priceFeedUrl) : undefined,
    creationFee: app.creationFee,
  };
}

async function main() {
  const app = loadAppConfig();
  registerAllSubscribers();
  await runSimulation(simulationParams(app));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logError('[SIM] simulation failed', err);
    process.exitCode = 1;
  });
}
