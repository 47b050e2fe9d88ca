import type { Address, AssetLedger, DepositReceipt, LiquiditySink, SettlementLedger, SinkFailure } from '../contracts';
import type { Result } from '../utils/result';
import type { CurveConfig } from '../config/curve-config';
import { CurveError } from '../application/errors';
import type { Logger } from '../utils/logger';
import type { CurveState, CurveStateCell } from './curve-state';
import { soldUnits } from './pricing';
import { requireTransfer } from './transfers';

export type DeploymentBlocker = 'ALREADY_DEPLOYED' | 'RAISE_TARGET_NOT_MET' | 'SALE_THRESHOLD_NOT_MET';

/** Why the deployment transition may not run yet, or null when its guard holds. */
export function deploymentBlocker(cfg: CurveConfig, s: CurveState): DeploymentBlocker | null {
  if (s.liquidityDeployed) return 'ALREADY_DEPLOYED';
  if (s.cumulativeRaisedValueUSD < cfg.raiseTargetUSD) return 'RAISE_TARGET_NOT_MET';
  if (soldUnits(cfg.totalSupply, s) < cfg.saleThreshold) return 'SALE_THRESHOLD_NOT_MET';
  return null;
}

export interface DeploymentContext {
  cfg: CurveConfig;
  state: CurveStateCell;
  engine: Address;
  asset: AssetLedger;
  settlement: SettlementLedger;
  sink: LiquiditySink;
  feeCollector: Address;
  liquidityCollector: Address;
  log: Logger;
}

export interface DeploymentOutcome {
  settlementAmount: bigint;
  unitsAmount: bigint;
  feeSettlement: bigint;
  poolId: string;
}

/**
 * The one-shot Active -> Deployed transition. Must run inside the caller's
 * atomic unit: any throw here rolls back the triggering operation as well.
 * The latch is written last.
 */
export async function runDeployment(ctx: DeploymentContext): Promise<DeploymentOutcome> {
  const { cfg, state } = ctx;
  const s = state.get();
  if (s.liquidityDeployed) throw new CurveError('ALREADY_DEPLOYED', 'liquidity already deployed');

  const needed = cfg.deploySettlement + cfg.deployFeeSettlement;
  const held = await ctx.settlement.balanceOf(ctx.engine);
  if (held < needed || s.unsoldInventory < cfg.deployUnits) {
    throw new CurveError('INSUFFICIENT_RESERVE_FOR_DEPLOYMENT', 'engine cannot fund the liquidity deployment', {
      detail: { settlementHeld: held, settlementNeeded: needed, unitsHeld: s.unsoldInventory, unitsNeeded: cfg.deployUnits },
    });
  }

  await requireTransfer('LEDGER_TRANSFER_FAILED', 'allowance for liquidity sink rejected',
    () => ctx.asset.approve(ctx.sink.address, cfg.deployUnits));
  await requireTransfer('SETTLEMENT_TRANSFER_FAILED', 'settlement transfer to liquidity sink rejected',
    () => ctx.settlement.transfer(ctx.sink.address, cfg.deploySettlement));

  let outcome: Result<DepositReceipt, SinkFailure>;
  try {
    outcome = await ctx.sink.deploy({
      asset: ctx.asset.asset,
      units: cfg.deployUnits,
      settlement: cfg.deploySettlement,
      collector: ctx.liquidityCollector,
      from: ctx.engine,
    });
  } catch (e) {
    throw new CurveError('LIQUIDITY_SINK_FAILED', 'liquidity sink threw', { cause: e });
  }
  if (!outcome.ok) {
    throw new CurveError('LIQUIDITY_SINK_FAILED', `liquidity sink failed: ${outcome.error.message}`, {
      cause: outcome.error.cause,
      detail: { sinkCode: outcome.error.code },
    });
  }
  await requireTransfer('LEDGER_TRANSFER_FAILED', 'could not reset the liquidity sink allowance',
    () => ctx.asset.approve(ctx.sink.address, 0n));

  if (cfg.deployFeeSettlement > 0n) {
    await requireTransfer('FEE_TRANSFER_FAILED', 'deployment fee transfer rejected',
      () => ctx.settlement.transfer(ctx.feeCollector, cfg.deployFeeSettlement));
  }

  state.update({ unsoldInventory: s.unsoldInventory - cfg.deployUnits, deployedUnits: cfg.deployUnits });
  state.update({ liquidityDeployed: true });

  ctx.log.info('liquidity deployed', {
    asset: ctx.asset.asset, units: cfg.deployUnits, settlement: cfg.deploySettlement, poolId: outcome.value.poolId,
  });
  return {
    settlementAmount: cfg.deploySettlement,
    unitsAmount: cfg.deployUnits,
    feeSettlement: cfg.deployFeeSettlement,
    poolId: outcome.value.poolId,
  };
}
