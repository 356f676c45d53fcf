/**
 * Normalizers for converting ccxt unified structures to domain types.
 *
 * All normalizers validate input with Valibot schemas to catch API drift.
 * The output is DTO-shaped; the client validates and freezes it.
 */

import * as v from "valibot";

import type { FundingPayment, ReportFill } from "../position-report";
import type {
  Balance,
  FundingRate,
  Market,
  Order,
  OrderSide,
  OrderStatus,
  OrderType,
  Position,
  Ticker,
  TriggerOrder,
} from "../types";
import { marketTypeSchema } from "../types";
import {
  CcxtBalanceSchema,
  CcxtFundingHistorySchema,
  CcxtFundingRateSchema,
  CcxtFundingRatesSchema,
  CcxtMarketSchema,
  CcxtMarketsSchema,
  CcxtOrderSchema,
  CcxtPositionSchema,
  CcxtTickerSchema,
  CcxtTradeSchema,
  CcxtTriggerOrderSchema,
} from "./schemas";

/** ccxt `precisionMode` value where precision counts decimal places */
export const DECIMAL_PLACES_MODE = 2;

const ORDER_STATUSES: Record<string, OrderStatus> = {
  open: "OPEN",
  closed: "CLOSED",
  canceled: "CANCELED",
  cancelled: "CANCELED",
  expired: "EXPIRED",
  rejected: "REJECTED",
};

// Venue fields carrying the last position update when ccxt leaves timestamp empty
const POSITION_UPDATE_KEYS = ["updateTime", "updatedTime", "uTime"] as const;

const toDate = (timestamp: number | null | undefined, now: () => Date): Date =>
  timestamp === null || timestamp === undefined ? now() : new Date(timestamp);

const toOrderSide = (side: string | null | undefined): OrderSide | null => {
  switch (side?.toLowerCase()) {
    case "buy":
      return "BUY";
    case "sell":
      return "SELL";
    default:
      return null;
  }
};

/** Parses a millisecond timestamp given as a number or a numeric string */
const parseEpochMs = (value: unknown): number | null => {
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof parsed === "number" && Number.isFinite(parsed) && parsed > 0 ? parsed : null;
};

export const normalizeTicker = (
  response: unknown,
  now: () => Date = () => new Date(),
): Ticker => {
  const parsed = v.parse(CcxtTickerSchema, response);
  const lastPrice = parsed.last ?? parsed.close;
  if (lastPrice === null || lastPrice === undefined) {
    throw new Error(`Ticker for ${parsed.symbol} has no last price`);
  }

  return {
    symbol: parsed.symbol,
    lastPrice,
    bidPrice: parsed.bid ?? null,
    askPrice: parsed.ask ?? null,
    baseVolume: parsed.baseVolume ?? null,
    timestamp: toDate(parsed.timestamp, now),
  };
};

/**
 * Converts a precision value to a step size.
 * Under DECIMAL_PLACES mode ccxt reports 8 for a step of 0.00000001.
 */
export const precisionToStep = (
  precision: number | null | undefined,
  precisionMode: number | undefined,
): number | null => {
  if (precision === null || precision === undefined) {
    return null;
  }
  return precisionMode === DECIMAL_PLACES_MODE ? 10 ** -precision : precision;
};

/**
 * Normalize a ccxt market.
 *
 * @returns null for market types outside spot, swap, future and option
 */
export const normalizeMarket = (response: unknown, precisionMode?: number): Market | null => {
  const parsed = v.parse(CcxtMarketSchema, response);
  const type = parsed.type;
  if (!v.is(marketTypeSchema, type)) {
    return null;
  }

  return {
    symbol: parsed.symbol,
    base: parsed.base,
    quote: parsed.quote,
    settle: parsed.settle ?? null,
    type,
    // ccxt leaves `active` undefined when the venue does not say
    active: parsed.active ?? true,
    contractSize: parsed.contractSize ?? null,
    amountPrecision: precisionToStep(parsed.precision?.amount, precisionMode),
    pricePrecision: precisionToStep(parsed.precision?.price, precisionMode),
    minAmount: parsed.limits?.amount?.min ?? null,
    maxAmount: parsed.limits?.amount?.max ?? null,
    minCost: parsed.limits?.cost?.min ?? null,
    minPrice: parsed.limits?.price?.min ?? null,
    maxPrice: parsed.limits?.price?.max ?? null,
  };
};

/** Normalize the market dictionary returned by `loadMarkets` */
export const normalizeMarkets = (response: unknown, precisionMode?: number): Market[] =>
  Object.values(v.parse(CcxtMarketsSchema, response)).flatMap((market) => {
    const normalized = normalizeMarket(market, precisionMode);
    return normalized ? [normalized] : [];
  });

/**
 * Normalize a ccxt balance structure to one Balance per asset.
 * Assets reported with no amounts at all are skipped.
 */
export const normalizeBalances = (response: unknown): Balance[] => {
  const parsed = v.parse(CcxtBalanceSchema, response);
  const assets = new Set([
    ...Object.keys(parsed.total),
    ...Object.keys(parsed.free),
    ...Object.keys(parsed.used),
  ]);

  return [...assets].flatMap((asset) => {
    const free = parsed.free[asset] ?? null;
    const used = parsed.used[asset] ?? null;
    const total = parsed.total[asset] ?? null;
    if (free === null && used === null && total === null) {
      return [];
    }
    return [
      {
        asset,
        free: free ?? 0,
        used: used ?? 0,
        total: total ?? (free ?? 0) + (used ?? 0),
      },
    ];
  });
};

/**
 * Normalize a ccxt position.
 *
 * Missing `contracts` counts as zero. Without a side the sign of
 * `contracts` decides. Without a timestamp the venue's update time is used,
 * then the current time.
 */
export const normalizePosition = (
  response: unknown,
  now: () => Date = () => new Date(),
): Position => {
  const parsed = v.parse(CcxtPositionSchema, response);
  const contracts = parsed.contracts ?? 0;
  const side = parsed.side?.toLowerCase();
  const marginMode = parsed.marginMode?.toLowerCase();

  const info = parsed.info;
  const updatedAt = info
    ? (POSITION_UPDATE_KEYS.map((key) => parseEpochMs(info[key])).find((ms) => ms !== null) ??
      null)
    : null;

  return {
    symbol: parsed.symbol,
    side: side === "short" || (side !== "long" && contracts < 0) ? "SHORT" : "LONG",
    contracts: Math.abs(contracts),
    entryPrice: parsed.entryPrice ?? 0,
    markPrice: parsed.markPrice ?? null,
    liquidationPrice: parsed.liquidationPrice ?? null,
    notional: parsed.notional ?? null,
    leverage: parsed.leverage ?? null,
    collateral: parsed.collateral ?? null,
    unrealizedPnl: parsed.unrealizedPnl ?? null,
    marginMode: marginMode === "isolated" || marginMode === "cross" ? marginMode : null,
    hedged: parsed.hedged ?? false,
    id: parsed.id === null || parsed.id === undefined ? null : String(parsed.id),
    timestamp: toDate(parsed.timestamp ?? updatedAt, now),
  };
};

export const normalizePositions = (
  response: unknown,
  now: () => Date = () => new Date(),
): Position[] =>
  v.parse(v.array(v.unknown()), response).map((position) => normalizePosition(position, now));

/** Whether a raw order response names its side */
export const hasOrderSide = (response: unknown): boolean => {
  const result = v.safeParse(CcxtOrderSchema, response);
  return result.success && toOrderSide(result.output.side) !== null;
};

/** Values used where the venue's order response omits a field */
export interface OrderFallback {
  symbol: string;
  status: OrderStatus;
  side?: OrderSide;
  type?: OrderType;
  amount?: number;
  price?: number;
  reduceOnly?: boolean;
}

/**
 * Normalize a ccxt order.
 *
 * Several venues acknowledge creates and cancels with a partial order; the
 * fallback fills what the response leaves out.
 *
 * @throws Error when neither the response nor the fallback gives a side
 */
export const normalizeOrder = (
  response: unknown,
  fallback: OrderFallback,
  now: () => Date = () => new Date(),
): Order => {
  const parsed = v.parse(CcxtOrderSchema, response);
  const side = toOrderSide(parsed.side) ?? fallback.side;
  if (!side) {
    throw new Error(`Order ${parsed.id} has no side`);
  }

  const rawType = parsed.type?.toLowerCase();
  const price = parsed.price ?? fallback.price ?? null;
  const type: OrderType =
    rawType === "market"
      ? "MARKET"
      : rawType === "limit"
        ? "LIMIT"
        : (fallback.type ?? (price === null ? "MARKET" : "LIMIT"));

  const amount = parsed.amount ?? fallback.amount ?? 0;

  return {
    id: parsed.id,
    clientOrderId: parsed.clientOrderId ?? null,
    symbol: parsed.symbol ?? fallback.symbol,
    side,
    type,
    status: ORDER_STATUSES[parsed.status?.toLowerCase() ?? ""] ?? fallback.status,
    amount,
    filled: parsed.filled ?? 0,
    price,
    average: parsed.average ?? null,
    reduceOnly: parsed.reduceOnly ?? fallback.reduceOnly ?? false,
    timestamp: toDate(parsed.timestamp, now),
  };
};

/**
 * Normalize a ccxt funding rate.
 *
 * @throws Error when the response carries neither funding timestamp
 */
export const normalizeFundingRate = (response: unknown, exchange: string): FundingRate => {
  const parsed = v.parse(CcxtFundingRateSchema, response);
  const fundingTime = parsed.fundingTimestamp ?? parsed.nextFundingTimestamp;
  if (fundingTime === null || fundingTime === undefined) {
    throw new Error(`Funding rate for ${parsed.symbol} has no funding timestamp`);
  }

  return {
    symbol: parsed.symbol,
    exchange,
    rate: parsed.fundingRate ?? 0,
    fundingTime: new Date(fundingTime),
  };
};

/**
 * Normalize the funding rate dictionary of `fetchFundingRates`.
 *
 * The dictionary key names the symbol. Entries without a rate or a funding
 * time are skipped: venues list perpetuals that are not funding yet.
 */
export const normalizeFundingRates = (response: unknown, exchange: string): FundingRate[] =>
  Object.entries(v.parse(CcxtFundingRatesSchema, response)).flatMap(([symbol, raw]) => {
    const parsed = v.parse(CcxtFundingRateSchema, { ...v.parse(v.looseObject({}), raw), symbol });
    const fundingTime = parsed.fundingTimestamp ?? parsed.nextFundingTimestamp;
    if (
      parsed.fundingRate === null ||
      parsed.fundingRate === undefined ||
      fundingTime === null ||
      fundingTime === undefined
    ) {
      return [];
    }
    return [{ symbol, exchange, rate: parsed.fundingRate, fundingTime: new Date(fundingTime) }];
  });

/**
 * Normalize a ccxt trigger order.
 *
 * Order types other than limit (stop-market, take-profit-market) count as
 * MARKET.
 *
 * @throws Error when the order has no side
 */
export const normalizeTriggerOrder = (response: unknown, symbol: string): TriggerOrder => {
  const parsed = v.parse(CcxtTriggerOrderSchema, response);
  const side = toOrderSide(parsed.side);
  if (!side) {
    throw new Error(`Trigger order ${parsed.id} has no side`);
  }

  return {
    id: parsed.id,
    clientOrderId: parsed.clientOrderId ?? null,
    symbol: parsed.symbol ?? symbol,
    side,
    type: parsed.type?.toLowerCase() === "limit" ? "LIMIT" : "MARKET",
    amount: parsed.amount ?? 0,
    triggerPrice: parsed.triggerPrice ?? parsed.stopPrice ?? null,
    takeProfitPrice: parsed.takeProfitPrice ?? null,
    stopLossPrice: parsed.stopLossPrice ?? null,
    reduceOnly: parsed.reduceOnly ?? true,
  };
};

export const normalizeTriggerOrders = (response: unknown, symbol: string): TriggerOrder[] =>
  v.parse(v.array(v.unknown()), response).map((order) => normalizeTriggerOrder(order, symbol));

/** Normalize own trades to report fills; fees without a currency are dropped */
export const normalizeTrades = (response: unknown): ReportFill[] =>
  v.parse(v.array(CcxtTradeSchema), response).map((trade) => {
    const fee =
      trade.fee?.currency && trade.fee.cost !== null && trade.fee.cost !== undefined
        ? { currency: trade.fee.currency, cost: trade.fee.cost }
        : undefined;

    return {
      side: trade.side === "buy" ? "BUY" : "SELL",
      amount: trade.amount,
      price: trade.price,
      timestamp: new Date(trade.timestamp),
      ...(fee ? { fee } : {}),
    };
  });

export const normalizeFundingHistory = (response: unknown): FundingPayment[] =>
  v.parse(v.array(CcxtFundingHistorySchema), response).map((entry) => ({
    amount: entry.amount,
    timestamp: new Date(entry.timestamp),
  }));
