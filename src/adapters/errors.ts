/**
 * Exchange client error types.
 *
 * `ExchangeError` is the single normalized failure callers see for remote
 * operations. The error mapper builds it from raw failures, including the
 * `InvalidArgumentError`s raised by argument checks that never reach the
 * exchange. State and capability errors are never remapped.
 */

export type ExchangeErrorCode =
  | "AUTH_ERROR"
  | "RATE_LIMIT_EXCEEDED"
  | "INSUFFICIENT_FUNDS"
  | "INVALID_ORDER"
  | "NETWORK_ERROR"
  | "EXCHANGE_UNAVAILABLE"
  | "UNKNOWN";

export const EXCHANGE_ERROR_CODES = [
  "AUTH_ERROR",
  "RATE_LIMIT_EXCEEDED",
  "INSUFFICIENT_FUNDS",
  "INVALID_ORDER",
  "NETWORK_ERROR",
  "EXCHANGE_UNAVAILABLE",
  "UNKNOWN",
] as const satisfies readonly ExchangeErrorCode[];

const RETRYABLE_CODES: ReadonlySet<ExchangeErrorCode> = new Set([
  "RATE_LIMIT_EXCEEDED",
  "NETWORK_ERROR",
  "EXCHANGE_UNAVAILABLE",
]);

export const isRetryableCode = (code: ExchangeErrorCode): boolean => RETRYABLE_CODES.has(code);

/** Where a failure happened */
export interface ExchangeErrorContext {
  exchange?: string;
  operation?: string;
  symbol?: string;
}

export class ExchangeError extends Error {
  public override readonly name = "ExchangeError";
  public readonly exchange: string | null;
  public readonly operation: string | null;
  public readonly symbol: string | null;
  public readonly retryable: boolean;

  constructor(
    message: string,
    public readonly code: ExchangeErrorCode,
    context: ExchangeErrorContext = {},
    public override readonly cause?: unknown,
    /** Suggested delay before retrying, when the exchange or limiter gave one */
    public readonly retryAfterMs: number | null = null,
  ) {
    super(message, { cause });
    this.exchange = context.exchange ?? null;
    this.operation = context.operation ?? null;
    this.symbol = context.symbol ?? null;
    this.retryable = isRetryableCode(code);
  }
}

export const isExchangeError = (value: unknown): value is ExchangeError =>
  value instanceof ExchangeError;

/**
 * Operation attempted in a state that does not allow it.
 */
export class ClientStateError extends Error {
  public override readonly name = "ClientStateError";

  constructor(
    message: string,
    public readonly state: string,
    public readonly operation: string,
  ) {
    super(message);
  }
}

/**
 * Optional capability the exchange integration does not provide.
 */
export class UnsupportedOperationError extends Error {
  public override readonly name = "UnsupportedOperationError";

  constructor(
    public readonly operation: string,
    public readonly exchange: string,
  ) {
    super(`${exchange} does not support ${operation}`);
  }
}

/**
 * Caller argument rejected before any request is sent.
 * The error mapper classifies it as INVALID_ORDER.
 */
export class InvalidArgumentError extends Error {
  public override readonly name = "InvalidArgumentError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
