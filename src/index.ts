// Library entrypoint: loads .env and re-exports the public surface.

import dotenv from 'dotenv';
dotenv.config();

export * from './contracts';
export * from './config/curve-config';
export * from './core/pricing';
export { CurveEngine } from './core/curve-engine';
export type {
  CurveEngineDeps, BuyOptions, BuyQuote, PurchaseReceipt, SellQuote, SaleReceipt, CurveSnapshot,
} from './core/curve-engine';
export { OraclePriceCache } from './core/price-cache';
export { atomically, composeRevertible, BusyFlag, UnitQueue } from './core/atomic';
export { CurveError, isCurveError, normalizeErrorCode, type CurveErrorCode, type ErrorCategory } from './application/errors';
export * from './application/events';
export { CurveFactory, DEFAULT_CREATION_FEE, type AdminCapability, type CreateAssetParams, type CreatedAsset } from './application/curve-factory';
export { InMemoryAssetLedger, InMemoryAssetRegistry } from './adapters/in-memory-asset-ledger';
export { InMemorySettlementLedger } from './adapters/in-memory-settlement-ledger';
export { InMemorySubstrate } from './adapters/in-memory-substrate';
export { DexLiquiditySink, type LiquidityVenue, type PoolRequest } from './adapters/dex-liquidity-sink';
export { HttpPriceFeed } from './api/price-feed-http';
export { MockOracle } from './api/oracle-mock';
export { MockVenue } from './api/venue-mock';
export { loadAppConfig, resetConfigCache, type AppConfig } from './utils/config';
export { parseUnits, formatUnits } from './utils/units';
export { ok, err, isOk, type Result } from './utils/result';
