/**
 * Exchange client contracts and normalized DTOs.
 *
 * DTOs are plain records validated with Valibot and frozen on construction.
 * Numbers are finite floats as the exchanges report them; symbols use the
 * unified `BASE/QUOTE[:SETTLE]` format (settle may carry an expiry suffix).
 */

import * as v from "valibot";

// Enums
export type OrderSide = "BUY" | "SELL";

export type OrderType = "MARKET" | "LIMIT";

export type OrderStatus = "OPEN" | "CLOSED" | "CANCELED" | "EXPIRED" | "REJECTED";

export type PositionSide = "LONG" | "SHORT";

export type MarginMode = "isolated" | "cross";

export type MarketType = "spot" | "swap" | "future" | "option";

export type AccountType = "spot" | "swap" | "future";

// Domain Types
export interface Ticker {
  symbol: string;
  lastPrice: number;
  bidPrice: number | null;
  askPrice: number | null;
  baseVolume: number | null;
  timestamp: Date;
}

export interface Balance {
  asset: string;
  free: number;
  used: number; // Held in orders or as margin
  total: number;
}

export interface Position {
  symbol: string;
  side: PositionSide;
  contracts: number;
  entryPrice: number;
  markPrice: number | null;
  liquidationPrice: number | null;
  notional: number | null;
  leverage: number | null;
  collateral: number | null;
  unrealizedPnl: number | null;
  marginMode: MarginMode | null;
  hedged: boolean;
  id: string | null;
  timestamp: Date;
}

export interface Order {
  id: string;
  clientOrderId: string | null;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  status: OrderStatus;
  amount: number;
  filled: number;
  price: number | null; // null for market orders
  average: number | null;
  reduceOnly: boolean;
  timestamp: Date;
}

export interface Market {
  symbol: string;
  base: string;
  quote: string;
  settle: string | null;
  type: MarketType;
  active: boolean;
  contractSize: number | null;
  amountPrecision: number | null; // Step size
  pricePrecision: number | null; // Tick size
  minAmount: number | null;
  maxAmount: number | null;
  minCost: number | null;
  minPrice: number | null;
  maxPrice: number | null;
}

export interface FundingRate {
  symbol: string;
  exchange: string;
  rate: number; // Fraction per funding interval, 0.0001 = 0.01%
  fundingTime: Date;
}

export interface FeeEntry {
  currency: string;
  cost: number;
}

export interface ClosedPositionReport {
  exchange: string;
  symbol: string;
  side: PositionSide;
  contracts: number;
  openedAt: Date;
  closedAt: Date;
  entryPriceAvg: number;
  exitPriceAvg: number;
  leverage: number | null;
  fundingIncome: number;
  feesTotal: number;
  fees: readonly FeeEntry[];
  fundingIncomePercent: number | null;
  feesTotalPercent: number | null;
}

/** Open conditional order (take-profit, stop-loss or both) */
export interface TriggerOrder {
  id: string;
  clientOrderId: string | null;
  symbol: string;
  side: OrderSide; // Side of the order placed when it fires
  type: OrderType;
  amount: number;
  triggerPrice: number | null;
  takeProfitPrice: number | null;
  stopLossPrice: number | null;
  reduceOnly: boolean;
}

// Order Creation Parameters
export interface CreateOrderParams {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  amount: number;
  price?: number; // Required for LIMIT orders
  reduceOnly?: boolean;
  clientOrderId?: string;
  marginMode?: MarginMode;
}

/** Entry order with take-profit and stop-loss attached */
export interface CreateTpslParams {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  amount: number;
  price?: number; // Required for LIMIT orders
  takeProfit: number;
  stopLoss: number;
  marginMode?: MarginMode; // Default: isolated
  clientOrderId?: string;
}

/** Standalone take-profit or stop-loss for an open position */
export interface ProtectiveOrderParams {
  symbol: string;
  side: OrderSide; // Side that closes the position
  amount: number;
  triggerPrice: number;
}

// Valibot Schemas
export const SYMBOL_PATTERN = /^[\w.-]+\/[\w.-]+(?::[\w.-]+)?$/;

export const symbolSchema = v.pipe(
  v.string(),
  v.regex(SYMBOL_PATTERN, "Expected a unified symbol like BTC/USDT:USDT"),
);

const dateSchema = v.pipe(
  v.custom<Date>((input) => input instanceof Date, "Expected Date"),
  v.check((input) => !Number.isNaN(input.getTime()), "Invalid Date"),
);

const finiteSchema = v.pipe(v.number(), v.finite());

const amountSchema = v.pipe(v.number(), v.finite(), v.minValue(0));

const nullableFinite = v.nullable(finiteSchema);

const nullableAmount = v.nullable(amountSchema);

export const orderSideSchema = v.picklist(["BUY", "SELL"] as const);

export const orderTypeSchema = v.picklist(["MARKET", "LIMIT"] as const);

export const orderStatusSchema = v.picklist([
  "OPEN",
  "CLOSED",
  "CANCELED",
  "EXPIRED",
  "REJECTED",
] as const);

export const positionSideSchema = v.picklist(["LONG", "SHORT"] as const);

export const marginModeSchema = v.picklist(["isolated", "cross"] as const);

export const marketTypeSchema = v.picklist(["spot", "swap", "future", "option"] as const);

export const accountTypeSchema = v.picklist(["spot", "swap", "future"] as const);

export const tickerSchema = v.object({
  symbol: symbolSchema,
  lastPrice: amountSchema,
  bidPrice: nullableAmount,
  askPrice: nullableAmount,
  baseVolume: nullableAmount,
  timestamp: dateSchema,
});

export const balanceSchema = v.object({
  asset: v.pipe(v.string(), v.minLength(1)),
  free: finiteSchema,
  used: finiteSchema,
  total: finiteSchema,
});

export const positionSchema = v.object({
  symbol: symbolSchema,
  side: positionSideSchema,
  contracts: amountSchema,
  entryPrice: amountSchema,
  markPrice: nullableAmount,
  liquidationPrice: nullableAmount,
  notional: nullableFinite,
  leverage: nullableAmount,
  collateral: nullableFinite,
  unrealizedPnl: nullableFinite,
  marginMode: v.nullable(marginModeSchema),
  hedged: v.boolean(),
  id: v.nullable(v.string()),
  timestamp: dateSchema,
});

export const orderSchema = v.object({
  id: v.pipe(v.string(), v.minLength(1)),
  clientOrderId: v.nullable(v.string()),
  symbol: symbolSchema,
  side: orderSideSchema,
  type: orderTypeSchema,
  status: orderStatusSchema,
  amount: amountSchema,
  filled: amountSchema,
  price: nullableAmount,
  average: nullableAmount,
  reduceOnly: v.boolean(),
  timestamp: dateSchema,
});

export const marketSchema = v.object({
  symbol: symbolSchema,
  base: v.pipe(v.string(), v.minLength(1)),
  quote: v.pipe(v.string(), v.minLength(1)),
  settle: v.nullable(v.string()),
  type: marketTypeSchema,
  active: v.boolean(),
  contractSize: nullableAmount,
  amountPrecision: nullableAmount,
  pricePrecision: nullableAmount,
  minAmount: nullableAmount,
  maxAmount: nullableAmount,
  minCost: nullableAmount,
  minPrice: nullableAmount,
  maxPrice: nullableAmount,
});

export const fundingRateSchema = v.object({
  symbol: symbolSchema,
  exchange: v.pipe(v.string(), v.minLength(1)),
  rate: finiteSchema,
  fundingTime: dateSchema,
});

export const triggerOrderSchema = v.object({
  id: v.pipe(v.string(), v.minLength(1)),
  clientOrderId: v.nullable(v.string()),
  symbol: symbolSchema,
  side: orderSideSchema,
  type: orderTypeSchema,
  amount: amountSchema,
  triggerPrice: nullableAmount,
  takeProfitPrice: nullableAmount,
  stopLossPrice: nullableAmount,
  reduceOnly: v.boolean(),
});

export const feeEntrySchema = v.object({
  currency: v.string(),
  cost: finiteSchema,
});

export const closedPositionReportSchema = v.object({
  exchange: v.pipe(v.string(), v.minLength(1)),
  symbol: symbolSchema,
  side: positionSideSchema,
  contracts: amountSchema,
  openedAt: dateSchema,
  closedAt: dateSchema,
  entryPriceAvg: amountSchema,
  exitPriceAvg: amountSchema,
  leverage: nullableAmount,
  fundingIncome: finiteSchema,
  feesTotal: finiteSchema,
  fees: v.array(feeEntrySchema),
  fundingIncomePercent: nullableFinite,
  feesTotalPercent: nullableFinite,
});

export const createOrderParamsSchema = v.pipe(
  v.object({
    symbol: symbolSchema,
    side: orderSideSchema,
    type: orderTypeSchema,
    amount: v.pipe(v.number(), v.finite(), v.gtValue(0)),
    price: v.optional(v.pipe(v.number(), v.finite(), v.gtValue(0))),
    reduceOnly: v.optional(v.boolean()),
    clientOrderId: v.optional(v.pipe(v.string(), v.minLength(1))),
    marginMode: v.optional(marginModeSchema),
  }),
  v.check(
    (params) => params.type !== "LIMIT" || params.price !== undefined,
    "LIMIT orders require a price",
  ),
);

const positiveNumber = v.pipe(v.number(), v.finite(), v.gtValue(0));

export const createTpslParamsSchema = v.pipe(
  v.object({
    symbol: symbolSchema,
    side: orderSideSchema,
    type: orderTypeSchema,
    amount: positiveNumber,
    price: v.optional(positiveNumber),
    takeProfit: positiveNumber,
    stopLoss: positiveNumber,
    marginMode: v.optional(marginModeSchema, "isolated"),
    clientOrderId: v.optional(v.pipe(v.string(), v.minLength(1))),
  }),
  v.check(
    (params) => params.type !== "LIMIT" || params.price !== undefined,
    "LIMIT orders require a price",
  ),
  v.check(
    (params) =>
      params.side === "BUY"
        ? params.takeProfit > params.stopLoss
        : params.takeProfit < params.stopLoss,
    "Take-profit must be on the profitable side of the stop-loss",
  ),
);

export const protectiveOrderParamsSchema = v.object({
  symbol: symbolSchema,
  side: orderSideSchema,
  amount: positiveNumber,
  triggerPrice: positiveNumber,
});

// Type Guards (using Valibot)
export const isTicker = (value: unknown): value is Ticker => v.is(tickerSchema, value);

export const isBalance = (value: unknown): value is Balance => v.is(balanceSchema, value);

export const isPosition = (value: unknown): value is Position => v.is(positionSchema, value);

export const isOrder = (value: unknown): value is Order => v.is(orderSchema, value);

export const isMarket = (value: unknown): value is Market => v.is(marketSchema, value);

export const isFundingRate = (value: unknown): value is FundingRate =>
  v.is(fundingRateSchema, value);

export const isCreateOrderParams = (value: unknown): value is CreateOrderParams =>
  v.is(createOrderParamsSchema, value);

export const isTriggerOrder = (value: unknown): value is TriggerOrder =>
  v.is(triggerOrderSchema, value);

/** Freezes a record along with the arrays (and their items) it holds */
const freezeRecord = <T extends object>(record: T): Readonly<T> => {
  const values: unknown[] = Object.values(record);
  for (const value of values) {
    if (Array.isArray(value)) {
      for (const item of value) {
        if (item !== null && typeof item === "object") {
          Object.freeze(item);
        }
      }
      Object.freeze(value);
    }
  }
  return Object.freeze(record);
};

// Validating constructors: throw ValiError on malformed input
export const parseTicker = (input: unknown): Readonly<Ticker> =>
  freezeRecord(v.parse(tickerSchema, input));

export const parseBalance = (input: unknown): Readonly<Balance> =>
  freezeRecord(v.parse(balanceSchema, input));

export const parsePosition = (input: unknown): Readonly<Position> =>
  freezeRecord(v.parse(positionSchema, input));

export const parseOrder = (input: unknown): Readonly<Order> =>
  freezeRecord(v.parse(orderSchema, input));

export const parseMarket = (input: unknown): Readonly<Market> =>
  freezeRecord(v.parse(marketSchema, input));

export const parseFundingRate = (input: unknown): Readonly<FundingRate> =>
  freezeRecord(v.parse(fundingRateSchema, input));

export const parseClosedPositionReport = (input: unknown): Readonly<ClosedPositionReport> =>
  freezeRecord(v.parse(closedPositionReportSchema, input));

export const parseCreateOrderParams = (input: unknown): Readonly<CreateOrderParams> =>
  freezeRecord(v.parse(createOrderParamsSchema, input));

export const parseTriggerOrder = (input: unknown): Readonly<TriggerOrder> =>
  freezeRecord(v.parse(triggerOrderSchema, input));

/**
 * The narrow surface an exchange integration provides.
 *
 * Implementations return DTO-shaped data; the client validates and freezes
 * it. Optional members are capabilities some exchanges lack.
 */
export interface ExchangeCapabilities {
  readonly id: string;

  loadMarkets(reload: boolean): Promise<Market[]>;
  fetchTicker(symbol: string): Promise<Ticker>;
  fetchBalances(): Promise<Balance[]>;
  fetchPositions(symbols?: readonly string[]): Promise<Position[]>;
  createOrder(params: CreateOrderParams): Promise<Order>;
  cancelOrder(id: string, symbol: string): Promise<Order>;
  /** Releases connections; called once by the client on close */
  close(): Promise<void>;

  fetchFundingRate?(symbol: string): Promise<FundingRate>;
  setLeverage?(leverage: number, symbol: string): Promise<void>;
  priceToPrecision?(symbol: string, price: number): number;
  /** Null when no position was opened and closed since `since` */
  fetchClosedPositionReport?(symbol: string, since?: Date): Promise<ClosedPositionReport | null>;

  /** Current rates of every perpetual the exchange lists, in one request */
  fetchFundingRates?(): Promise<FundingRate[]>;
  /** Places the entry order; take-profit and stop-loss rest as trigger orders */
  createTpslOrder?(params: CreateTpslParams): Promise<Order>;
  fetchTriggerOrders?(symbol: string): Promise<TriggerOrder[]>;
  cancelTriggerOrders?(symbol: string, ids: readonly string[]): Promise<void>;
  createTakeProfitOrder?(params: ProtectiveOrderParams): Promise<Order>;
  createStopLossOrder?(params: ProtectiveOrderParams): Promise<Order>;
  setPositionMode?(hedged: boolean, symbol?: string): Promise<void>;
  setMarginMode?(marginMode: MarginMode, symbol: string): Promise<void>;
}

export type ClientState = "UNINITIALIZED" | "MARKETS_LOADED" | "ACTIVE" | "CLOSED";

export interface CallOptions {
  /** Cancels the call while it waits for rate limit budget */
  signal?: AbortSignal;
  /** Budget was already taken from a shared limiter; skip the client's own acquire */
  preacquired?: boolean;
}

export interface FundingRatesOptions extends CallOptions {
  /** Keep only active USDT-settled perpetuals (default: true) */
  active?: boolean;
}

export interface LoadMarketsOptions extends CallOptions {
  /** Refetch even when markets are cached */
  reload?: boolean;
}

/**
 * Normalized exchange client.
 *
 * Data operations require loaded markets. Remote failures reject with
 * `ExchangeError`; state violations with `ClientStateError`.
 */
export interface ExchangeClient {
  readonly exchange: string;
  getState(): ClientState;

  loadMarkets(options?: LoadMarketsOptions): Promise<readonly Market[]>;

  // Market data
  getTicker(symbol: string, options?: CallOptions): Promise<Ticker>;
  getFundingRate(symbol: string, options?: CallOptions): Promise<FundingRate>;
  /** USDT funding rates whose funding time has not passed yet */
  getFundingRates(options?: FundingRatesOptions): Promise<FundingRate[]>;
  getMarket(symbol: string): Market;
  getMarketSymbols(): string[];
  priceToPrecision(symbol: string, price: number): number;

  // Account
  getBalance(asset: string, options?: CallOptions): Promise<Balance>;
  getBalances(options?: CallOptions): Promise<Balance[]>;
  getPositions(symbols?: readonly string[], options?: CallOptions): Promise<Position[]>;
  getClosedPositionReport(
    symbol: string,
    since?: Date,
    options?: CallOptions,
  ): Promise<ClosedPositionReport | null>;

  // Orders
  placeOrder(params: CreateOrderParams, options?: CallOptions): Promise<Order>;
  cancelOrder(id: string, symbol: string, options?: CallOptions): Promise<Order>;
  setLeverage(leverage: number, symbol: string, options?: CallOptions): Promise<void>;
  setPositionMode(hedged: boolean, symbol?: string, options?: CallOptions): Promise<void>;
  setMarginMode(marginMode: MarginMode, symbol: string, options?: CallOptions): Promise<void>;

  // Conditional orders
  createTpslPosition(params: CreateTpslParams, options?: CallOptions): Promise<Order>;
  getTriggerOrders(symbol: string, options?: CallOptions): Promise<TriggerOrder[]>;
  cancelTriggerOrders(
    symbol: string,
    ids: readonly string[],
    options?: CallOptions,
  ): Promise<void>;
  setTakeProfit(params: ProtectiveOrderParams, options?: CallOptions): Promise<Order>;
  setStopLoss(params: ProtectiveOrderParams, options?: CallOptions): Promise<Order>;

  close(): Promise<void>;
}
