export type ErrorCategory = 'input' | 'oracle' | 'transfer' | 'reentrancy' | 'deployment' | 'access' | 'unknown';

export type CurveErrorCode =
  // input validation
  | 'ZERO_INPUT'
  | 'EMPTY_INPUT'
  | 'ZERO_OUTPUT'
  | 'SUPPLY_EXHAUSTED'
  | 'INSUFFICIENT_INVENTORY'
  | 'INSUFFICIENT_RESERVE'
  | 'NO_INVENTORY_SOLD'
  | 'SLIPPAGE_EXCEEDED'
  | 'INVALID_CONFIG'
  // oracle faults
  | 'ORACLE_INVALID_PRICE'
  | 'ORACLE_UNAVAILABLE'
  // downstream transfer failures
  | 'LEDGER_TRANSFER_FAILED'
  | 'SETTLEMENT_TRANSFER_FAILED'
  | 'FEE_TRANSFER_FAILED'
  // reentrancy
  | 'REENTRANCY_REJECTED'
  // deployment transition
  | 'INSUFFICIENT_RESERVE_FOR_DEPLOYMENT'
  | 'LIQUIDITY_SINK_FAILED'
  | 'ALREADY_DEPLOYED'
  | 'THRESHOLD_NOT_MET'
  // administrative capability
  | 'UNAUTHORIZED';

export type ErrorCode = CurveErrorCode | 'UNKNOWN';

const CATEGORY: Record<CurveErrorCode, ErrorCategory> = {
  ZERO_INPUT: 'input',
  EMPTY_INPUT: 'input',
  ZERO_OUTPUT: 'input',
  SUPPLY_EXHAUSTED: 'input',
  INSUFFICIENT_INVENTORY: 'input',
  INSUFFICIENT_RESERVE: 'input',
  NO_INVENTORY_SOLD: 'input',
  SLIPPAGE_EXCEEDED: 'input',
  INVALID_CONFIG: 'input',
  ORACLE_INVALID_PRICE: 'oracle',
  ORACLE_UNAVAILABLE: 'oracle',
  LEDGER_TRANSFER_FAILED: 'transfer',
  SETTLEMENT_TRANSFER_FAILED: 'transfer',
  FEE_TRANSFER_FAILED: 'transfer',
  REENTRANCY_REJECTED: 'reentrancy',
  INSUFFICIENT_RESERVE_FOR_DEPLOYMENT: 'deployment',
  LIQUIDITY_SINK_FAILED: 'deployment',
  ALREADY_DEPLOYED: 'deployment',
  THRESHOLD_NOT_MET: 'deployment',
  UNAUTHORIZED: 'access',
};

function isCurveErrorCode(code: string): code is CurveErrorCode {
  return Object.prototype.hasOwnProperty.call(CATEGORY, code);
}

export function categoryOf(code: ErrorCode): ErrorCategory {
  return code === 'UNKNOWN' ? 'unknown' : CATEGORY[code];
}

/** Typed failure surfaced by every curve operation. */
export class CurveError extends Error {
  readonly code: CurveErrorCode;
  readonly category: ErrorCategory;
  readonly detail?: Record<string, unknown>;

  constructor(code: CurveErrorCode, message: string, options?: { cause?: unknown; detail?: Record<string, unknown> }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'CurveError';
    this.code = code;
    this.category = CATEGORY[code];
    this.detail = options?.detail;
  }
}

export function isCurveError(err: unknown, code?: CurveErrorCode): err is CurveError {
  return err instanceof CurveError && (code === undefined || err.code === code);
}

function readCode(v: unknown): string {
  if (typeof v !== 'object' || v === null || !('code' in v)) return '';
  return String(v.code ?? '');
}

export function normalizeErrorCode(err: unknown): ErrorCode {
  if (err instanceof CurveError) return err.code;
  const own = readCode(err);
  const cause = typeof err === 'object' && err !== null && 'cause' in err ? readCode(err.cause) : '';
  const code = (own || cause).toUpperCase();
  if (!code) return 'UNKNOWN';
  if (isCurveErrorCode(code)) return code;
  if (/ECONNRESET|ETIMEDOUT|ENETUNREACH|ECONNREFUSED|EAI_AGAIN|ECONNABORTED/.test(code)) return 'ORACLE_UNAVAILABLE';
  return 'UNKNOWN';
}

export interface ErrorEventMeta {
  asset?: string;
  operation: string;
  account?: string;
  amount?: bigint;
  cause: { code: ErrorCode; category: ErrorCategory; message: string; detail?: Record<string, unknown> };
}

export function buildErrorEventMeta(base: {
  asset?: string | null;
  operation: string;
  account?: string | null;
  amount?: bigint | null;
}, err: unknown): ErrorEventMeta {
  const code = normalizeErrorCode(err);
  return {
    asset: base.asset ?? undefined,
    operation: base.operation,
    account: base.account ?? undefined,
    amount: base.amount ?? undefined,
    cause: {
      code,
      category: categoryOf(code),
      message: err instanceof Error ? err.message : String(err),
      detail: err instanceof CurveError ? err.detail : undefined,
    },
  };
}
