import type { CurveConfig, PriceFractionPolicy } from '../config/curve-config';
import { CurveError } from '../application/errors';
import { ceilDiv, pow10 } from '../utils/units';

/** Fixed base of unit prices: a price of 7 means 0.000007 reference units per asset unit. */
export const PRICE_DECIMALS = 1_000_000n;
/** Oracle readings are rescaled to this many decimals on ingestion. */
export const ORACLE_DECIMALS = 18;
export const ORACLE_BASE = pow10(ORACLE_DECIMALS);

type PricingParams = Pick<CurveConfig, 'initialMultiplier' | 'finalMultiplier' | 'priceNormalizer' | 'saleThreshold'>;

export function initialPrice(cfg: PricingParams, oraclePrice: bigint): bigint {
  return cfg.initialMultiplier * oraclePrice / cfg.priceNormalizer;
}

export function finalPrice(cfg: PricingParams, oraclePrice: bigint): bigint {
  return cfg.finalMultiplier * oraclePrice / cfg.priceNormalizer;
}

/**
 * Linear interpolation between the initial and final price by `sold / saleThreshold`.
 * Under 'extrapolate' the fraction is not capped, so sales past the threshold keep
 * raising the price; 'clamp' pins it at the final price.
 */
export function spotPrice(
  cfg: PricingParams,
  oraclePrice: bigint,
  sold: bigint,
  policy: PriceFractionPolicy = 'extrapolate',
): bigint {
  const start = initialPrice(cfg, oraclePrice);
  if (sold <= 0n) return start;
  const end = finalPrice(cfg, oraclePrice);
  const effective = policy === 'clamp' && sold > cfg.saleThreshold ? cfg.saleThreshold : sold;
  return start + (end - start) * effective / cfg.saleThreshold;
}

function requirePositivePrice(price: bigint) {
  if (price <= 0n) {
    throw new CurveError('ORACLE_INVALID_PRICE', 'derived unit price is zero', { detail: { price } });
  }
}

/** Reference-currency value (18 decimals) of a settlement amount. */
export function toReferenceValue(settlement: bigint, oraclePrice: bigint): bigint {
  return settlement * oraclePrice / ORACLE_BASE;
}

/** Units bought by `settlementIn` at `price`. Rounds down. */
export function quoteBuyUnits(settlementIn: bigint, oraclePrice: bigint, price: bigint): bigint {
  requirePositivePrice(price);
  return toReferenceValue(settlementIn, oraclePrice) * PRICE_DECIMALS / price;
}

/** Settlement paid out for `unitsIn` at `price`, before fees. Rounds down. */
export function quoteSellSettlement(unitsIn: bigint, oraclePrice: bigint, price: bigint): bigint {
  if (oraclePrice <= 0n) {
    throw new CurveError('ORACLE_INVALID_PRICE', 'oracle price must be positive', { detail: { oraclePrice } });
  }
  const usd = unitsIn * price / PRICE_DECIMALS;
  return usd * ORACLE_BASE / oraclePrice;
}

/**
 * Smallest settlement amount whose buy quote is at least `units`.
 * Both divisions round up, so the payer never receives more than they paid for.
 */
export function settlementForUnits(units: bigint, oraclePrice: bigint, price: bigint): bigint {
  requirePositivePrice(price);
  if (oraclePrice <= 0n) {
    throw new CurveError('ORACLE_INVALID_PRICE', 'oracle price must be positive', { detail: { oraclePrice } });
  }
  const usd = ceilDiv(units * price, PRICE_DECIMALS);
  return ceilDiv(usd * ORACLE_BASE, oraclePrice);
}

export function computeFee(gross: bigint, feePercent: bigint): { fee: bigint; net: bigint } {
  const fee = gross * feePercent / 100n;
  return { fee, net: gross - fee };
}

// --- inventory bookkeeping ---

export interface InventoryCounters {
  unsoldInventory: bigint;
  deployedUnits: bigint;
  liquidityDeployed: boolean;
}

export function soldUnits(totalSupply: bigint, s: InventoryCounters): bigint {
  return totalSupply - s.unsoldInventory - s.deployedUnits;
}

/** Units a buy may take: the deployment slice stays reserved until the latch flips. */
export function sellableUnits(deployUnits: bigint, s: InventoryCounters): bigint {
  if (s.liquidityDeployed) return s.unsoldInventory;
  const free = s.unsoldInventory - deployUnits;
  return free > 0n ? free : 0n;
}

export function marketCap(totalSupply: bigint, price: bigint): bigint {
  return totalSupply * price / PRICE_DECIMALS;
}
