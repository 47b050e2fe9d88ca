import { warnOnce, logWarn } from '../utils/logger';
import { parseUnits } from '../utils/units';

export type PriceFractionPolicy = 'extrapolate' | 'clamp';
export type RaisedValueBasis = 'gross' | 'net';

/** Immutable per-asset curve parameters. Amounts are 18-decimal raw units. */
export interface CurveConfig {
  totalSupply: bigint;
  /** Units sold at which the price reaches the final multiplier. */
  saleThreshold: bigint;
  /** Reference-currency value (18 decimals) that must be raised before deployment. */
  raiseTargetUSD: bigint;
  initialMultiplier: bigint;
  finalMultiplier: bigint;
  /** Divisor turning `multiplier * oraclePrice` into a 6-decimal unit price. */
  priceNormalizer: bigint;
  /** Integer percent charged on every buy and sell. */
  feePercent: bigint;
  oracleUpdateIntervalSec: number;
  deployUnits: bigint;
  deploySettlement: bigint;
  deployFeeSettlement: bigint;
  priceFractionPolicy: PriceFractionPolicy;
  raisedValueBasis: RaisedValueBasis;
}

export const DEFAULT_CURVE_CONFIG: Readonly<CurveConfig> = Object.freeze({
  totalSupply: parseUnits('1000000000'),
  saleThreshold: parseUnits('800000000'),
  raiseTargetUSD: parseUnits('18000'),
  initialMultiplier: 7n,
  finalMultiplier: 75n,
  priceNormalizer: parseUnits('3000'),
  feePercent: 1n,
  oracleUpdateIntervalSec: 60,
  deployUnits: parseUnits('200000000'),
  deploySettlement: parseUnits('5'),
  deployFeeSettlement: parseUnits('1'),
  priceFractionPolicy: 'extrapolate',
  raisedValueBasis: 'gross',
});

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Build a frozen config from the defaults plus overrides. */
export function createCurveConfig(overrides: Partial<CurveConfig> = {}): Readonly<CurveConfig> {
  return Object.freeze({ ...DEFAULT_CURVE_CONFIG, ...overrides });
}

export function validateCurveConfig(cfg: CurveConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (cfg.totalSupply <= 0n) errors.push('totalSupply must be > 0');
  if (cfg.saleThreshold <= 0n) errors.push('saleThreshold must be > 0');
  if (cfg.saleThreshold > cfg.totalSupply) errors.push('saleThreshold must be <= totalSupply');
  if (cfg.initialMultiplier <= 0n) errors.push('initialMultiplier must be > 0');
  if (cfg.finalMultiplier < cfg.initialMultiplier) errors.push('finalMultiplier must be >= initialMultiplier');
  if (cfg.priceNormalizer <= 0n) errors.push('priceNormalizer must be > 0');
  if (cfg.feePercent < 0n || cfg.feePercent >= 100n) errors.push('feePercent must be in [0,100)');
  if (!(Number.isInteger(cfg.oracleUpdateIntervalSec) && cfg.oracleUpdateIntervalSec >= 0)) errors.push('oracleUpdateIntervalSec must be a non-negative integer');
  if (cfg.deployUnits < 0n || cfg.deploySettlement < 0n || cfg.deployFeeSettlement < 0n) errors.push('deployment amounts must be >= 0');
  if (cfg.deployUnits > cfg.totalSupply) errors.push('deployUnits must be <= totalSupply');

  if (cfg.raiseTargetUSD === 0n) warnings.push('raiseTargetUSD is 0; deployment depends on the sale threshold only');
  if (cfg.totalSupply - cfg.deployUnits < cfg.saleThreshold) warnings.push('saleThreshold exceeds the units left for sale after the deployment reservation; deployment can never trigger');
  if (cfg.feePercent > 10n) warnings.push('feePercent above 10');

  for (const w of warnings) warnOnce('curve-cfg:' + w, w);
  if (errors.length) logWarn('[CONFIG] invalid curve config detected', { errors, warnings });
  return { valid: errors.length === 0, errors, warnings };
}
