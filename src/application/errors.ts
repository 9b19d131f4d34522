export type ErrorCode =
  | 'SIZING'
  | 'PORTFOLIO_LIMIT'
  | 'INVALID_SIGNAL'
  | 'ENTRY_FAILED'
  | 'GATEWAY_TRANSIENT'
  | 'GATEWAY_REJECTED'
  | 'FEED_UNAVAILABLE'
  | 'INCONSISTENT_FILL'
  | 'NETWORK'
  | 'RATE_LIMITED'
  | 'UNKNOWN';

export class EngineError extends Error {
  readonly code: ErrorCode;
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Signal cannot be sized; rejected before any order is placed. */
export class SizingError extends EngineError {
  constructor(message: string) { super('SIZING', message); }
}

export type PortfolioLimit = 'MAX_OPEN_TRADES' | 'PORTFOLIO_RISK' | 'CORRELATED' | 'DUPLICATE_SYMBOL';

export class PortfolioLimitExceeded extends EngineError {
  readonly limit: PortfolioLimit;
  constructor(limit: PortfolioLimit, message: string) {
    super('PORTFOLIO_LIMIT', message);
    this.limit = limit;
  }
}

export class InvalidSignalError extends EngineError {
  readonly issues: string[];
  constructor(issues: string[]) {
    super('INVALID_SIGNAL', `invalid signal: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class EntryFailed extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) { super('ENTRY_FAILED', message, options); }
}

export class GatewayTransientError extends EngineError {
  readonly attempts: number;
  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super('GATEWAY_TRANSIENT', message, options);
    this.attempts = attempts;
  }
}

export class GatewayRejectedError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) { super('GATEWAY_REJECTED', message, options); }
}

export class FeedUnavailable extends EngineError {
  readonly symbol: string;
  constructor(symbol: string, options?: { cause?: unknown }) {
    super('FEED_UNAVAILABLE', `no price for ${symbol}`, options);
    this.symbol = symbol;
  }
}

export class InconsistentFillReport extends EngineError {
  readonly orderId: string;
  constructor(orderId: string, message: string) {
    super('INCONSISTENT_FILL', message);
    this.orderId = orderId;
  }
}

function readProp(err: unknown, key: string): unknown {
  if (err === null || typeof err !== 'object' || !(key in err)) return undefined;
  const value: unknown = Reflect.get(err, key);
  return value;
}

function rawCode(err: unknown): string {
  const direct = readProp(err, 'code');
  const cause = readProp(err, 'cause');
  const code = direct ?? readProp(cause, 'code');
  return code == null ? '' : String(code).toUpperCase();
}

function httpStatus(err: unknown): number | undefined {
  const status = readProp(readProp(err, 'response'), 'status') ?? readProp(err, 'status');
  return typeof status === 'number' ? status : undefined;
}

export function normalizeErrorCode(err: unknown): ErrorCode {
  if (err instanceof EngineError) return err.code;
  const status = httpStatus(err);
  if (status === 429) return 'RATE_LIMITED';
  const code = rawCode(err);
  if (code === 'RATE_LIMITED') return 'RATE_LIMITED';
  if (code === 'NETWORK' || /ECONNRESET|ETIMEDOUT|ENETUNREACH|ECONNREFUSED|EAI_AGAIN|ECONNABORTED/.test(code)) return 'NETWORK';
  if (status != null && status >= 500) return 'NETWORK';
  return 'UNKNOWN';
}

/**
 * Transient failures are worth retrying with the same intent; anything the
 * exchange answered definitively (4xx other than 429, explicit rejection) is not.
 */
export function isTransient(err: unknown): boolean {
  if (err instanceof GatewayRejectedError) return false;
  if (err instanceof GatewayTransientError) return true;
  const code = normalizeErrorCode(err);
  if (code === 'NETWORK' || code === 'RATE_LIMITED') return true;
  const status = httpStatus(err);
  if (status != null) return false;
  return code === 'UNKNOWN';
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
