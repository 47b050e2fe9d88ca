import axios from 'axios';
import { z } from 'zod';
import type { OracleReading, PriceOracleAdapter } from '../contracts';
import { CurveError } from '../application/errors';
import { log } from '../utils/logger';

const integerString = z.union([
  z.string().regex(/^-?\d+$/),
  z.number().int(),
]).transform(v => BigInt(v));

const ReadingSchema = z.object({
  price: integerString,
  decimals: z.number().int().min(0).max(36),
  updatedAt: z.number().int().nonnegative(),
});

export interface HttpPriceFeedOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
}

/**
 * Oracle adapter reading `{ price, decimals, updatedAt }` from an HTTP endpoint.
 * `price` may be a JSON number or an integer string (for values past 2^53).
 */
export class HttpPriceFeed implements PriceOracleAdapter {
  constructor(private readonly url: string, private readonly opts: HttpPriceFeedOptions = {}) {}

  async latestPrice(): Promise<OracleReading> {
    let data: unknown;
    try {
      const r = await axios.get(this.url, { timeout: this.opts.timeoutMs ?? 5000, headers: this.opts.headers });
      data = r.data;
    } catch (e) {
      log('WARN', 'ORACLE', 'price feed request failed', { url: this.url, error: e });
      throw new CurveError('ORACLE_UNAVAILABLE', `price feed unreachable: ${this.url}`, { cause: e });
    }
    const parsed = ReadingSchema.safeParse(data);
    if (!parsed.success) {
      throw new CurveError('ORACLE_INVALID_PRICE', 'price feed returned a malformed reading', {
        detail: { issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`) },
      });
    }
    return parsed.data;
  }
}
