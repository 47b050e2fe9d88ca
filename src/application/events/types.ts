import type { ErrorEventMeta } from '../errors';

export interface CurveEventBase {
  /** Issued asset (ledger identity) the event belongs to. */
  asset: string;
  /** Assigned by the audit log on commit; 0 until then. */
  seq: number;
  /** Seconds since epoch, from the engine clock. */
  at: number;
}

export type PurchaseExecutedEvent = CurveEventBase & {
  type: 'PURCHASE_EXECUTED';
  buyer: string;
  units: bigint;
  settlementIn: bigint;
  fee: bigint;
  price: bigint;
};

export type SaleExecutedEvent = CurveEventBase & {
  type: 'SALE_EXECUTED';
  seller: string;
  units: bigint;
  settlementOut: bigint;
  fee: bigint;
  price: bigint;
};

export type PriceRefreshedEvent = CurveEventBase & {
  type: 'PRICE_REFRESHED';
  newPrice: bigint;
};

export type LiquidityDeployedEvent = CurveEventBase & {
  type: 'LIQUIDITY_DEPLOYED';
  settlementAmount: bigint;
  unitsAmount: bigint;
  feeSettlement: bigint;
  poolId: string;
};

export type AssetCreatedEvent = CurveEventBase & {
  type: 'ASSET_CREATED';
  creator: string;
  name: string;
  symbol: string;
  engine: string;
};

export type CurveEvent =
  | PurchaseExecutedEvent
  | SaleExecutedEvent
  | PriceRefreshedEvent
  | LiquidityDeployedEvent
  | AssetCreatedEvent;

export type ErrorEvent = { type: 'EVENT/ERROR'; at: number } & ErrorEventMeta;

export type AppEvent = CurveEvent | ErrorEvent;

export type AppEventType = AppEvent['type'];

export type EventOf<T extends AppEventType> = Extract<AppEvent, { type: T }>;
