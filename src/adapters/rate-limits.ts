/**
 * Default rate limit rules per exchange.
 *
 * Budgets sit below the venues' published REST limits, expressed as
 * requests per second for the client's three categories.
 *
 * - Binance futures: 2400 weight/min (IP), 300 orders per 10 s
 *   @see https://developers.binance.com/docs/derivatives/usds-margined-futures/general-info
 * - Bybit v5: 120 public requests per 5 s, 10/s per private endpoint
 *   @see https://bybit-exchange.github.io/docs/v5/rate-limit
 * - OKX: 20 requests per 2 s on most endpoints
 *   @see https://www.okx.com/docs-v5/en/#overview-rate-limits
 */

import { perSecondRules, type RateLimitRule } from "@/lib/rate-limiter";

export const CCXT_RATE_LIMITS: Readonly<Record<string, readonly RateLimitRule[]>> = {
  binance: perSecondRules({ "market-data": 20, account: 5, orders: 10 }),
  binanceusdm: perSecondRules({ "market-data": 20, account: 5, orders: 10 }),
  bybit: perSecondRules({ "market-data": 24, account: 10, orders: 10 }),
  okx: perSecondRules({ "market-data": 10, account: 10, orders: 10 }),
};

/** Conservative budget for exchanges without their own entry */
export const DEFAULT_RATE_LIMITS: readonly RateLimitRule[] = perSecondRules({
  "market-data": 10,
  account: 5,
  orders: 5,
});

export const getDefaultRateLimitRules = (exchange: string): readonly RateLimitRule[] =>
  CCXT_RATE_LIMITS[exchange] ?? DEFAULT_RATE_LIMITS;
