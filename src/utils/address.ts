export type Address = string;

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && ADDRESS_RE.test(value);
}

export function validateAddress(value: unknown, name = 'account'): Address {
  if (!isAddress(value)) throw new Error(`Invalid ${name} address: ${String(value)}`);
  return value;
}

/** Deterministic placeholder address derived from a label, for paper runs and fixtures. */
export function labelAddress(label: string): Address {
  let h = 0x811c9dc5;
  let out = '';
  for (let round = 0; out.length < 40; round++) {
    for (const ch of `${label}#${round}`) {
      h ^= ch.charCodeAt(0);
      h = Math.imul(h, 0x01000193) >>> 0;
    }
    out += h.toString(16).padStart(8, '0');
  }
  return `0x${out.slice(0, 40)}`;
}
