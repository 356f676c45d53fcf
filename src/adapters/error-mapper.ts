/**
 * Maps raw failures from exchange libraries, HTTP stacks and the local rate
 * limiter onto the closed set of `ExchangeErrorCode`s.
 *
 * `map` is total (any thrown value yields an `ExchangeError`) and
 * deterministic: the same input and clock always give the same code, message
 * and retry hint. Rules run in a fixed order and the first match wins.
 */

import {
  AccountSuspended,
  ArgumentsRequired,
  AuthenticationError,
  BadRequest,
  BadSymbol,
  DDoSProtection,
  ExchangeNotAvailable,
  InsufficientFunds,
  InvalidOrder,
  NetworkError,
  OnMaintenance,
  OrderNotFound,
  PermissionDenied,
  RateLimitExceeded,
  RequestTimeout,
} from "ccxt";
import * as v from "valibot";

import {
  getRetryAfterHeader,
  parseRetryAfterMs,
  RateLimitExceededError,
} from "@/lib/rate-limiter";

import {
  ExchangeError,
  type ExchangeErrorCode,
  type ExchangeErrorContext,
  InvalidArgumentError,
} from "./errors";

/**
 * Custom classification tried before the built-in rules.
 * Returns null to defer to the next rule.
 */
export type ErrorMappingRule = (
  raw: unknown,
  context: ExchangeErrorContext,
) => ExchangeError | null;

export interface ErrorMapperConfig {
  rules?: readonly ErrorMappingRule[];
  /** Clock for HTTP-date Retry-After values (default: Date.now) */
  now?: () => number;
}

export interface ErrorMapper {
  map: (raw: unknown, context?: ExchangeErrorContext) => ExchangeError;
}

type ErrorClass = new (...args: never[]) => Error;

// Most specific first: ccxt nests RateLimitExceeded and OnMaintenance under NetworkError
const CCXT_ERROR_CODES: ReadonlyArray<readonly [ErrorClass, string, ExchangeErrorCode]> = [
  [RateLimitExceeded, "RateLimitExceeded", "RATE_LIMIT_EXCEEDED"],
  [DDoSProtection, "DDoSProtection", "RATE_LIMIT_EXCEEDED"],
  [OnMaintenance, "OnMaintenance", "EXCHANGE_UNAVAILABLE"],
  [ExchangeNotAvailable, "ExchangeNotAvailable", "EXCHANGE_UNAVAILABLE"],
  [RequestTimeout, "RequestTimeout", "NETWORK_ERROR"],
  [NetworkError, "NetworkError", "NETWORK_ERROR"],
  [AccountSuspended, "AccountSuspended", "AUTH_ERROR"],
  [PermissionDenied, "PermissionDenied", "AUTH_ERROR"],
  [AuthenticationError, "AuthenticationError", "AUTH_ERROR"],
  [InsufficientFunds, "InsufficientFunds", "INSUFFICIENT_FUNDS"],
  [OrderNotFound, "OrderNotFound", "INVALID_ORDER"],
  [InvalidOrder, "InvalidOrder", "INVALID_ORDER"],
  [BadSymbol, "BadSymbol", "INVALID_ORDER"],
  [BadRequest, "BadRequest", "INVALID_ORDER"],
  [ArgumentsRequired, "ArgumentsRequired", "INVALID_ORDER"],
];

const HTTP_STATUS_CODES: ReadonlyMap<number, ExchangeErrorCode> = new Map([
  [400, "INVALID_ORDER"],
  [401, "AUTH_ERROR"],
  [403, "AUTH_ERROR"],
  [418, "RATE_LIMIT_EXCEEDED"],
  [422, "INVALID_ORDER"],
  [429, "RATE_LIMIT_EXCEEDED"],
  [500, "EXCHANGE_UNAVAILABLE"],
  [502, "EXCHANGE_UNAVAILABLE"],
  [503, "EXCHANGE_UNAVAILABLE"],
  [504, "EXCHANGE_UNAVAILABLE"],
]);

const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const NETWORK_ERROR_NAMES: ReadonlySet<string> = new Set(["TimeoutError", "AbortError"]);

// Checked against the lower-cased message, in order
const MESSAGE_PATTERNS: ReadonlyArray<readonly [string, ExchangeErrorCode]> = [
  ["insufficient", "INSUFFICIENT_FUNDS"],
  ["not enough balance", "INSUFFICIENT_FUNDS"],
  ["rate limit", "RATE_LIMIT_EXCEEDED"],
  ["too many requests", "RATE_LIMIT_EXCEEDED"],
  ["too many visits", "RATE_LIMIT_EXCEEDED"],
  ["invalid api key", "AUTH_ERROR"],
  ["api key", "AUTH_ERROR"],
  ["signature", "AUTH_ERROR"],
  ["unauthorized", "AUTH_ERROR"],
  ["authentication", "AUTH_ERROR"],
  ["permission denied", "AUTH_ERROR"],
  ["maintenance", "EXCHANGE_UNAVAILABLE"],
  ["service unavailable", "EXCHANGE_UNAVAILABLE"],
  ["temporarily unavailable", "EXCHANGE_UNAVAILABLE"],
  ["bad gateway", "EXCHANGE_UNAVAILABLE"],
  ["timed out", "NETWORK_ERROR"],
  ["timeout", "NETWORK_ERROR"],
  ["socket hang up", "NETWORK_ERROR"],
  ["network", "NETWORK_ERROR"],
  ["fetch failed", "NETWORK_ERROR"],
  ["order not found", "INVALID_ORDER"],
  ["invalid order", "INVALID_ORDER"],
  ["invalid quantity", "INVALID_ORDER"],
  ["invalid price", "INVALID_ORDER"],
  ["min notional", "INVALID_ORDER"],
  ["reduce only", "INVALID_ORDER"],
  ["reduceonly", "INVALID_ORDER"],
  ["precision", "INVALID_ORDER"],
];

const readProperty = (value: unknown, key: string): unknown =>
  value !== null && typeof value === "object" && key in value ? Reflect.get(value, key) : undefined;

const describeFailure = (raw: unknown): string => {
  if (raw instanceof Error) {
    return raw.message || raw.name;
  }
  if (typeof raw === "string") {
    return raw;
  }
  try {
    return JSON.stringify(raw) ?? String(raw);
  } catch {
    // BigInt and circular structures
    return Object.prototype.toString.call(raw);
  }
};

const readStatus = (raw: unknown): number | null => {
  const candidates = [
    readProperty(raw, "status"),
    readProperty(raw, "statusCode"),
    readProperty(raw, "httpStatus"),
    readProperty(readProperty(raw, "response"), "status"),
  ];
  for (const candidate of candidates) {
    if (typeof candidate === "number" && Number.isInteger(candidate)) {
      return candidate;
    }
    if (typeof candidate === "string" && /^\d{3}$/.test(candidate)) {
      return Number.parseInt(candidate, 10);
    }
  }
  return null;
};

const readHeaders = (raw: unknown): unknown =>
  readProperty(raw, "headers") ?? readProperty(readProperty(raw, "response"), "headers");

const readNetworkCode = (raw: unknown): string | null => {
  const candidates = [readProperty(raw, "code"), readProperty(readProperty(raw, "cause"), "code")];
  for (const candidate of candidates) {
    if (typeof candidate === "string" && NETWORK_ERROR_CODES.has(candidate)) {
      return candidate;
    }
  }
  return null;
};

const withContext = (error: ExchangeError, context: ExchangeErrorContext): ExchangeError => {
  const missing =
    (error.exchange === null && context.exchange !== undefined) ||
    (error.operation === null && context.operation !== undefined) ||
    (error.symbol === null && context.symbol !== undefined);
  if (!missing) {
    return error;
  }
  return new ExchangeError(
    error.message,
    error.code,
    {
      exchange: error.exchange ?? context.exchange,
      operation: error.operation ?? context.operation,
      symbol: error.symbol ?? context.symbol,
    },
    error.cause,
    error.retryAfterMs,
  );
};

/**
 * Create an error mapper.
 *
 * @example
 * ```typescript
 * const mapper = createErrorMapper({
 *   rules: [(raw) => (isMyVenueBan(raw) ? new ExchangeError("banned", "AUTH_ERROR") : null)],
 * });
 *
 * try {
 *   await exchange.fetchTicker("BTC/USDT");
 * } catch (error) {
 *   throw mapper.map(error, { exchange: "binance", operation: "getTicker" });
 * }
 * ```
 */
export const createErrorMapper = (config: ErrorMapperConfig = {}): ErrorMapper => {
  const { rules = [], now = Date.now } = config;

  const map = (raw: unknown, context: ExchangeErrorContext = {}): ExchangeError => {
    for (const rule of rules) {
      const mapped = rule(raw, context);
      if (mapped) {
        return withContext(mapped, context);
      }
    }

    if (raw instanceof ExchangeError) {
      return withContext(raw, context);
    }

    const message = describeFailure(raw);
    const create = (code: ExchangeErrorCode, retryAfterMs: number | null = null): ExchangeError =>
      new ExchangeError(message, code, context, raw, retryAfterMs);

    if (raw instanceof RateLimitExceededError) {
      return create("RATE_LIMIT_EXCEEDED", raw.waitTimeMs);
    }

    if (raw instanceof InvalidArgumentError) {
      return create("INVALID_ORDER");
    }

    // Response schema drift is not a transport or order problem
    if (v.isValiError(raw)) {
      return create("UNKNOWN");
    }

    for (const [errorClass, , code] of CCXT_ERROR_CODES) {
      if (raw instanceof errorClass) {
        return create(code);
      }
    }
    const name = readProperty(raw, "name");
    for (const [, className, code] of CCXT_ERROR_CODES) {
      if (name === className) {
        return create(code);
      }
    }

    const status = readStatus(raw);
    const statusCode = status === null ? undefined : HTTP_STATUS_CODES.get(status);
    if (statusCode) {
      const hinted = statusCode === "RATE_LIMIT_EXCEEDED" || statusCode === "EXCHANGE_UNAVAILABLE";
      return create(
        statusCode,
        hinted ? parseRetryAfterMs(getRetryAfterHeader(readHeaders(raw)), now()) : null,
      );
    }

    const networkName = typeof name === "string" && NETWORK_ERROR_NAMES.has(name);
    if (networkName || readNetworkCode(raw) !== null) {
      return create("NETWORK_ERROR");
    }

    const lowered = message.toLowerCase();
    for (const [pattern, code] of MESSAGE_PATTERNS) {
      if (lowered.includes(pattern)) {
        return create(code);
      }
    }

    return create("UNKNOWN");
  };

  return { map };
};

/** Mapper with the built-in rules only */
export const defaultErrorMapper = createErrorMapper();
