/**
 * Fixed-point helpers for 18-decimal amounts.
 *
 * Rounding: FLOOR everywhere except {@link ceilDiv}, which callers use
 * when a payer must never under-pay.
 */

export const DEFAULT_DECIMALS = 18;

/** Ceiling division for non-negative bigints: ceil(a / b) */
export function ceilDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) throw new Error('Division by zero');
  if (a === 0n) return 0n;
  return (a + b - 1n) / b;
}

export function pow10(decimals: number): bigint {
  return 10n ** BigInt(decimals);
}

/**
 * Parse a decimal string ("1.5", "1000000000") into raw units.
 * Extra fractional digits beyond `decimals` are rejected rather than rounded.
 */
export function parseUnits(value: string, decimals: number = DEFAULT_DECIMALS): bigint {
  const trimmed = value.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) throw new Error(`Invalid decimal amount: ${value}`);
  const [whole, frac = ''] = trimmed.split('.');
  if (frac.length > decimals) throw new Error(`Too many decimals in ${value} (max ${decimals})`);
  return BigInt(whole) * pow10(decimals) + BigInt(frac.padEnd(decimals, '0') || '0');
}

/** Render raw units as a decimal string without trailing zeros. */
export function formatUnits(value: bigint, decimals: number = DEFAULT_DECIMALS): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const base = pow10(decimals);
  const whole = abs / base;
  const frac = (abs % base).toString().padStart(decimals, '0').replace(/0+$/, '');
  return `${negative ? '-' : ''}${whole.toString()}${frac ? '.' + frac : ''}`;
}

/** Rescale a raw integer from one decimal base to another (floor when shrinking). */
export function rescale(value: bigint, fromDecimals: number, toDecimals: number): bigint {
  if (fromDecimals === toDecimals) return value;
  if (fromDecimals < toDecimals) return value * pow10(toDecimals - fromDecimals);
  return value / pow10(fromDecimals - toDecimals);
}
