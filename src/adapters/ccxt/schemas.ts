/**
 * Valibot schemas for ccxt unified responses.
 *
 * Only the fields the normalizers read are declared; everything else
 * (including `info`, the raw venue payload) is stripped. ccxt reports
 * missing values as undefined or null, so most fields are nullish.
 */

import * as v from "valibot";

const nullishNumber = v.nullish(v.pipe(v.number(), v.finite()));
const nullishString = v.nullish(v.string());

/** Schema for a ccxt ticker */
export const CcxtTickerSchema = v.object({
  symbol: v.string(),
  last: nullishNumber,
  close: nullishNumber,
  bid: nullishNumber,
  ask: nullishNumber,
  baseVolume: nullishNumber,
  timestamp: nullishNumber,
});

const CcxtRangeSchema = v.nullish(
  v.object({
    min: nullishNumber,
    max: nullishNumber,
  }),
);

/** Schema for a ccxt market (instrument metadata) */
export const CcxtMarketSchema = v.object({
  symbol: v.string(),
  base: v.string(),
  quote: v.string(),
  settle: nullishString,
  type: v.string(),
  active: v.nullish(v.boolean()),
  contractSize: nullishNumber,
  precision: v.nullish(
    v.object({
      amount: nullishNumber,
      price: nullishNumber,
    }),
  ),
  limits: v.nullish(
    v.object({
      amount: CcxtRangeSchema,
      cost: CcxtRangeSchema,
      price: CcxtRangeSchema,
    }),
  ),
});

/** Schema for the market dictionary returned by loadMarkets */
export const CcxtMarketsSchema = v.record(v.string(), v.unknown());

const CcxtAmountsSchema = v.optional(v.record(v.string(), nullishNumber), {});

/** Schema for a ccxt balance structure (per-asset maps only) */
export const CcxtBalanceSchema = v.object({
  free: CcxtAmountsSchema,
  used: CcxtAmountsSchema,
  total: CcxtAmountsSchema,
});

/** Schema for a ccxt position */
export const CcxtPositionSchema = v.object({
  symbol: v.string(),
  id: v.nullish(v.union([v.string(), v.number()])),
  side: nullishString,
  contracts: nullishNumber,
  entryPrice: nullishNumber,
  markPrice: nullishNumber,
  liquidationPrice: nullishNumber,
  notional: nullishNumber,
  leverage: nullishNumber,
  collateral: nullishNumber,
  unrealizedPnl: nullishNumber,
  marginMode: nullishString,
  hedged: v.nullish(v.boolean()),
  timestamp: nullishNumber,
  info: v.nullish(v.record(v.string(), v.unknown())),
});

/** Schema for a ccxt order */
export const CcxtOrderSchema = v.object({
  id: v.pipe(v.string(), v.minLength(1)),
  clientOrderId: nullishString,
  symbol: nullishString,
  side: nullishString,
  type: nullishString,
  status: nullishString,
  amount: nullishNumber,
  filled: nullishNumber,
  price: nullishNumber,
  average: nullishNumber,
  reduceOnly: v.nullish(v.boolean()),
  timestamp: nullishNumber,
});

/** Schema for a ccxt trigger (conditional) order */
export const CcxtTriggerOrderSchema = v.object({
  id: v.pipe(v.string(), v.minLength(1)),
  clientOrderId: nullishString,
  symbol: nullishString,
  side: nullishString,
  type: nullishString,
  amount: nullishNumber,
  triggerPrice: nullishNumber,
  stopPrice: nullishNumber,
  takeProfitPrice: nullishNumber,
  stopLossPrice: nullishNumber,
  reduceOnly: v.nullish(v.boolean()),
});

/** Schema for the symbol-keyed dictionary returned by fetchFundingRates */
export const CcxtFundingRatesSchema = v.record(v.string(), v.unknown());

/** Schema for a ccxt funding rate */
export const CcxtFundingRateSchema = v.object({
  symbol: v.string(),
  fundingRate: nullishNumber,
  fundingTimestamp: nullishNumber,
  nextFundingTimestamp: nullishNumber,
});

/** Schema for a ccxt trade (own fill) */
export const CcxtTradeSchema = v.object({
  side: v.picklist(["buy", "sell"]),
  amount: v.pipe(v.number(), v.finite()),
  price: v.pipe(v.number(), v.finite()),
  timestamp: v.pipe(v.number(), v.finite()),
  fee: v.nullish(
    v.object({
      cost: nullishNumber,
      currency: nullishString,
    }),
  ),
});

/** Schema for a ccxt funding history entry */
export const CcxtFundingHistorySchema = v.object({
  amount: v.pipe(v.number(), v.finite()),
  timestamp: v.pipe(v.number(), v.finite()),
});

export type CcxtTicker = v.InferOutput<typeof CcxtTickerSchema>;
export type CcxtMarket = v.InferOutput<typeof CcxtMarketSchema>;
export type CcxtPosition = v.InferOutput<typeof CcxtPositionSchema>;
export type CcxtOrder = v.InferOutput<typeof CcxtOrderSchema>;
