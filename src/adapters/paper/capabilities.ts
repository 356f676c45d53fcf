/**
 * Paper trading capabilities: an in-memory exchange.
 *
 * Fills marketable orders at the current price, keeps spot balances and
 * margin for contract positions, rests non-marketable limit orders until
 * `setPrice` makes them marketable, and derives closed-position reports
 * from its own fills. Take-profit and stop-loss triggers fire on `setPrice`
 * as reduce-only market orders. Serves as the exchange stand-in for tests and
 * dry runs.
 */

import * as v from "valibot";

import { ExchangeError, type ExchangeErrorCode } from "../errors";
import { type ReportFill, summarizeClosedPosition } from "../position-report";
import { roundToStep } from "../precision";
import {
  type Balance,
  type ClosedPositionReport,
  type CreateOrderParams,
  type CreateTpslParams,
  type ExchangeCapabilities,
  type FundingRate,
  type MarginMode,
  type Market,
  marketSchema,
  type Order,
  type OrderSide,
  type Position,
  type PositionSide,
  type ProtectiveOrderParams,
  type Ticker,
  type TriggerOrder,
} from "../types";

export const PAPER_EXCHANGE_ID = "paper";

const FUNDING_INTERVAL_MS = 8 * 60 * 60 * 1000;
const DEFAULT_FUNDING_RATE = 0.0001;
const MAX_LEVERAGE = 125;
const EPSILON = 1e-9;

const perpetual = (base: string, amountStep: number, priceStep: number): Market => ({
  symbol: `${base}/USDT:USDT`,
  base,
  quote: "USDT",
  settle: "USDT",
  type: "swap",
  active: true,
  contractSize: 1,
  amountPrecision: amountStep,
  pricePrecision: priceStep,
  minAmount: amountStep,
  maxAmount: null,
  minCost: 5,
  minPrice: null,
  maxPrice: null,
});

const spot = (base: string, amountStep: number, priceStep: number): Market => ({
  ...perpetual(base, amountStep, priceStep),
  symbol: `${base}/USDT`,
  settle: null,
  type: "spot",
  contractSize: null,
});

export const DEFAULT_PAPER_MARKETS: readonly Market[] = [
  perpetual("BTC", 0.001, 0.1),
  perpetual("ETH", 0.01, 0.01),
  spot("BTC", 0.00001, 0.01),
  spot("ETH", 0.0001, 0.01),
];

export const DEFAULT_PAPER_PRICES: Readonly<Record<string, number>> = {
  "BTC/USDT:USDT": 60_000,
  "ETH/USDT:USDT": 3_000,
  "BTC/USDT": 60_000,
  "ETH/USDT": 3_000,
};

const nonNegativeSchema = v.pipe(v.number(), v.finite(), v.minValue(0));
const positiveSchema = v.pipe(v.number(), v.finite(), v.gtValue(0));

export const PaperOptionsSchema = v.object({
  /** Free balances per asset (default: 10 000 USDT) */
  initialBalances: v.optional(v.record(v.string(), nonNegativeSchema)),
  /** Last prices per symbol, merged over the defaults */
  prices: v.optional(v.record(v.string(), positiveSchema)),
  /** Funding rate per symbol (default: 0.01%) */
  fundingRates: v.optional(v.record(v.string(), v.pipe(v.number(), v.finite()))),
  /** Replaces the default market list */
  markets: v.optional(v.array(marketSchema)),
  /** Leverage for symbols without setLeverage (default: 1) */
  defaultLeverage: v.optional(
    v.pipe(v.number(), v.integer(), v.minValue(1), v.maxValue(MAX_LEVERAGE)),
  ),
});

export type PaperOptions = v.InferInput<typeof PaperOptionsSchema>;

export const parsePaperOptions = (options: unknown): PaperOptions =>
  v.parse(PaperOptionsSchema, options);

export interface PaperCapabilities extends Required<ExchangeCapabilities> {
  /** Moves the last price, fills resting limit orders and fires triggers it crosses */
  setPrice(symbol: string, price: number): void;
  isClosed(): boolean;
}

interface Holding {
  free: number;
  used: number;
}

interface PaperPosition {
  side: PositionSide;
  contracts: number;
  entryPrice: number;
  margin: number;
  marginMode: MarginMode;
}

/**
 * Create paper trading capabilities.
 *
 * @example
 * ```typescript
 * const paper = createPaperCapabilities({ initialBalances: { USDT: 1_000 } });
 * const client = createExchangeClient(paper, parseClientConfig({ exchange: "paper" }));
 * ```
 */
export const createPaperCapabilities = (
  options: PaperOptions = {},
  id: string = PAPER_EXCHANGE_ID,
): PaperCapabilities => {
  const parsed = parsePaperOptions(options);
  const defaultLeverage = parsed.defaultLeverage ?? 1;

  const markets = new Map<string, Market>();
  for (const market of parsed.markets ?? DEFAULT_PAPER_MARKETS) {
    markets.set(market.symbol, market);
  }

  const prices = new Map(Object.entries({ ...DEFAULT_PAPER_PRICES, ...parsed.prices }));
  const fundingRates = new Map(Object.entries(parsed.fundingRates ?? {}));

  const balances = new Map<string, Holding>();
  for (const [asset, amount] of Object.entries(parsed.initialBalances ?? { USDT: 10_000 })) {
    balances.set(asset, { free: amount, used: 0 });
  }

  const positions = new Map<string, PaperPosition>();
  const leverages = new Map<string, number>();
  const marginModes = new Map<string, MarginMode>();
  const orders = new Map<string, Order>();
  const triggers = new Map<string, TriggerOrder>();
  const fills = new Map<string, ReportFill[]>();
  let sequence = 0;
  let closed = false;

  const fail = (message: string, code: ExchangeErrorCode, symbol?: string): ExchangeError =>
    new ExchangeError(message, code, { exchange: id, symbol });

  const ensureOpen = (): void => {
    if (closed) {
      throw fail("Paper exchange is closed", "EXCHANGE_UNAVAILABLE");
    }
  };

  const requireMarket = (symbol: string): Market => {
    const market = markets.get(symbol);
    if (!market) {
      throw fail(`Unknown market ${symbol}`, "INVALID_ORDER", symbol);
    }
    return market;
  };

  const requireContractMarket = (symbol: string): Market => {
    const market = requireMarket(symbol);
    if (market.type === "spot") {
      throw fail(`${symbol} is a spot market`, "INVALID_ORDER", symbol);
    }
    return market;
  };

  const requirePrice = (symbol: string): number => {
    const price = prices.get(symbol);
    if (price === undefined) {
      throw fail(`No price for ${symbol}`, "EXCHANGE_UNAVAILABLE", symbol);
    }
    return price;
  };

  const holding = (asset: string): Holding => {
    let entry = balances.get(asset);
    if (!entry) {
      entry = { free: 0, used: 0 };
      balances.set(asset, entry);
    }
    return entry;
  };

  const requireFree = (asset: string, amount: number, symbol: string): void => {
    const available = balances.get(asset)?.free ?? 0;
    if (available + EPSILON < amount) {
      throw fail(
        `Insufficient ${asset} balance: need ${amount}, have ${available}`,
        "INSUFFICIENT_FUNDS",
        symbol,
      );
    }
  };

  const leverageOf = (symbol: string): number => leverages.get(symbol) ?? defaultLeverage;

  const fillSpot = (market: Market, side: OrderSide, amount: number, price: number): void => {
    const cost = amount * price;
    if (side === "BUY") {
      requireFree(market.quote, cost, market.symbol);
      holding(market.quote).free -= cost;
      holding(market.base).free += amount;
    } else {
      requireFree(market.base, amount, market.symbol);
      holding(market.base).free -= amount;
      holding(market.quote).free += cost;
    }
  };

  const fillContracts = (market: Market, params: CreateOrderParams, price: number): void => {
    const { symbol } = market;
    const settle = market.settle ?? market.quote;
    const size = market.contractSize ?? 1;
    const direction = params.side === "BUY" ? 1 : -1;
    const position = positions.get(symbol);
    const current = position && position.contracts > 0 ? position : undefined;
    const opposing = current !== undefined && (current.side === "LONG" ? 1 : -1) !== direction;

    if (params.reduceOnly && (!opposing || params.amount > current.contracts + EPSILON)) {
      throw fail("Reduce-only order would increase the position", "INVALID_ORDER", symbol);
    }

    // Work out the whole fill before touching any balance
    const closing = opposing ? Math.min(params.amount, current.contracts) : 0;
    const opening = params.amount - closing;
    const released = opposing ? current.margin * (closing / current.contracts) : 0;
    const pnl = opposing
      ? closing * size * (price - current.entryPrice) * (current.side === "LONG" ? 1 : -1)
      : 0;
    const margin = opening > EPSILON ? (opening * size * price) / leverageOf(symbol) : 0;

    const available = (balances.get(settle)?.free ?? 0) + released + pnl;
    if (available + EPSILON < margin) {
      throw fail(
        `Insufficient ${settle} margin: need ${margin}, have ${available}`,
        "INSUFFICIENT_FUNDS",
        symbol,
      );
    }

    const account = holding(settle);
    if (opposing) {
      account.used -= released;
      account.free += released + pnl;
      current.margin -= released;
      current.contracts -= closing;
      if (current.contracts < EPSILON) {
        current.contracts = 0;
        current.margin = 0;
      }
    }

    if (opening > EPSILON) {
      account.free -= margin;
      account.used += margin;
      const side: PositionSide = direction === 1 ? "LONG" : "SHORT";
      const marginMode = params.marginMode ?? marginModes.get(symbol) ?? "cross";
      const existing = positions.get(symbol);
      if (existing && existing.contracts > 0) {
        const contracts = existing.contracts + opening;
        existing.entryPrice =
          (existing.entryPrice * existing.contracts + price * opening) / contracts;
        existing.contracts = contracts;
        existing.margin += margin;
      } else {
        positions.set(symbol, { side, contracts: opening, entryPrice: price, margin, marginMode });
      }
    }
  };

  const execute = (order: Order, params: CreateOrderParams, price: number): void => {
    const market = requireMarket(order.symbol);
    if (market.type === "spot") {
      fillSpot(market, order.side, order.amount, price);
    } else {
      fillContracts(market, params, price);
    }

    order.status = "CLOSED";
    order.filled = order.amount;
    order.average = price;

    const history = fills.get(order.symbol) ?? [];
    history.push({ side: order.side, amount: order.amount, price, timestamp: new Date() });
    fills.set(order.symbol, history);
  };

  const isMarketable = (order: Order, last: number): boolean =>
    order.type === "MARKET" ||
    (order.price !== null && (order.side === "BUY" ? order.price >= last : order.price <= last));

  // Resting orders keep their params for execution
  const resting = new Map<string, CreateOrderParams>();

  const validateOrder = (market: Market, params: CreateOrderParams, last: number): void => {
    if (market.minAmount !== null && params.amount + EPSILON < market.minAmount) {
      throw fail(
        `Amount ${params.amount} is below the minimum ${market.minAmount}`,
        "INVALID_ORDER",
        market.symbol,
      );
    }
    if (market.maxAmount !== null && params.amount > market.maxAmount + EPSILON) {
      throw fail(
        `Amount ${params.amount} is above the maximum ${market.maxAmount}`,
        "INVALID_ORDER",
        market.symbol,
      );
    }
    const cost = params.amount * (params.price ?? last) * (market.contractSize ?? 1);
    if (market.minCost !== null && cost + EPSILON < market.minCost) {
      throw fail(
        `Order cost ${cost} is below the minimum ${market.minCost}`,
        "INVALID_ORDER",
        market.symbol,
      );
    }
    if (params.type === "LIMIT" && params.price === undefined) {
      throw fail("LIMIT orders require a price", "INVALID_ORDER", market.symbol);
    }
  };

  const newOrder = (params: CreateOrderParams): Order => {
    sequence += 1;
    return {
      id: `${id}-${sequence}`,
      clientOrderId: params.clientOrderId ?? null,
      symbol: params.symbol,
      side: params.side,
      type: params.type,
      status: "OPEN",
      amount: params.amount,
      filled: 0,
      price: params.type === "LIMIT" ? (params.price ?? null) : null,
      average: null,
      reduceOnly: params.reduceOnly ?? false,
      timestamp: new Date(),
    };
  };

  const submitOrder = (params: CreateOrderParams): Order => {
    const market = requireMarket(params.symbol);
    const last = requirePrice(params.symbol);
    validateOrder(market, params, last);

    const order = newOrder(params);
    if (isMarketable(order, last)) {
      execute(order, params, last);
    } else {
      resting.set(order.id, params);
    }

    orders.set(order.id, order);
    return { ...order };
  };

  const fundingRateOf = (market: Market): FundingRate => {
    if (market.type !== "swap") {
      throw fail(`${market.symbol} has no funding rate`, "INVALID_ORDER", market.symbol);
    }
    const now = Date.now();
    return {
      symbol: market.symbol,
      exchange: id,
      rate: fundingRates.get(market.symbol) ?? DEFAULT_FUNDING_RATE,
      fundingTime: new Date((Math.floor(now / FUNDING_INTERVAL_MS) + 1) * FUNDING_INTERVAL_MS),
    };
  };

  // A trigger's side is the side of the order that closes the position
  const closesPosition = (side: OrderSide, position: PaperPosition | undefined): boolean =>
    position !== undefined &&
    position.contracts > 0 &&
    (position.side === "LONG") === (side === "SELL");

  const addTrigger = (
    fields: Pick<
      TriggerOrder,
      "symbol" | "side" | "amount" | "triggerPrice" | "takeProfitPrice" | "stopLossPrice"
    >,
  ): TriggerOrder => {
    sequence += 1;
    const trigger: TriggerOrder = {
      ...fields,
      id: `${id}-${sequence}`,
      clientOrderId: null,
      type: "MARKET",
      reduceOnly: true,
    };
    triggers.set(trigger.id, trigger);
    return trigger;
  };

  const isTriggered = (trigger: TriggerOrder, price: number): boolean => {
    const closesLong = trigger.side === "SELL";
    const { takeProfitPrice: takeProfit, stopLossPrice: stopLoss } = trigger;
    return (
      (takeProfit !== null && (closesLong ? price >= takeProfit : price <= takeProfit)) ||
      (stopLoss !== null && (closesLong ? price <= stopLoss : price >= stopLoss))
    );
  };

  /** Closes up to the trigger amount; triggers for flat positions are dropped */
  const fireTrigger = (trigger: TriggerOrder, price: number): void => {
    triggers.delete(trigger.id);
    const position = positions.get(trigger.symbol);
    if (!position || !closesPosition(trigger.side, position)) {
      return;
    }

    const params: CreateOrderParams = {
      symbol: trigger.symbol,
      side: trigger.side,
      type: "MARKET",
      amount: Math.min(trigger.amount, position.contracts),
      reduceOnly: true,
    };
    const order = newOrder(params);
    try {
      execute(order, params, price);
    } catch (error) {
      if (!(error instanceof ExchangeError)) {
        throw error;
      }
      order.status = "REJECTED";
    }
    orders.set(order.id, order);
  };

  const createProtectiveOrder = (
    params: ProtectiveOrderParams,
    leg: "takeProfitPrice" | "stopLossPrice",
  ): Order => {
    ensureOpen();
    requireContractMarket(params.symbol);
    if (!closesPosition(params.side, positions.get(params.symbol))) {
      throw fail(
        `No open position on ${params.symbol} for a ${params.side} trigger`,
        "INVALID_ORDER",
        params.symbol,
      );
    }

    const trigger = addTrigger({
      symbol: params.symbol,
      side: params.side,
      amount: params.amount,
      triggerPrice: params.triggerPrice,
      takeProfitPrice: leg === "takeProfitPrice" ? params.triggerPrice : null,
      stopLossPrice: leg === "stopLossPrice" ? params.triggerPrice : null,
    });
    return {
      id: trigger.id,
      clientOrderId: null,
      symbol: trigger.symbol,
      side: trigger.side,
      type: "MARKET",
      status: "OPEN",
      amount: trigger.amount,
      filled: 0,
      price: null,
      average: null,
      reduceOnly: true,
      timestamp: new Date(),
    };
  };

  return {
    id,

    loadMarkets: async (_reload: boolean): Promise<Market[]> => {
      ensureOpen();
      return Array.from(markets.values(), (market) => ({ ...market }));
    },

    fetchTicker: async (symbol: string): Promise<Ticker> => {
      ensureOpen();
      requireMarket(symbol);
      const price = requirePrice(symbol);
      return {
        symbol,
        lastPrice: price,
        bidPrice: price,
        askPrice: price,
        baseVolume: null,
        timestamp: new Date(),
      };
    },

    fetchBalances: async (): Promise<Balance[]> => {
      ensureOpen();
      return Array.from(balances, ([asset, { free, used }]) => ({
        asset,
        free,
        used,
        total: free + used,
      }));
    },

    fetchPositions: async (symbols?: readonly string[]): Promise<Position[]> => {
      ensureOpen();
      const result: Position[] = [];
      for (const [symbol, position] of positions) {
        if (symbols && !symbols.includes(symbol)) {
          continue;
        }
        const markPrice = requirePrice(symbol);
        const size = markets.get(symbol)?.contractSize ?? 1;
        const direction = position.side === "LONG" ? 1 : -1;
        // Flat positions stay listed with zero contracts, as many venues report them
        result.push({
          symbol,
          side: position.side,
          contracts: position.contracts,
          entryPrice: position.entryPrice,
          markPrice,
          liquidationPrice: null,
          notional: position.contracts * size * markPrice,
          leverage: leverageOf(symbol),
          collateral: position.margin,
          unrealizedPnl: position.contracts * size * (markPrice - position.entryPrice) * direction,
          marginMode: position.marginMode,
          hedged: false,
          id: null,
          timestamp: new Date(),
        });
      }
      return result;
    },

    createOrder: async (params: CreateOrderParams): Promise<Order> => {
      ensureOpen();
      return submitOrder(params);
    },

    cancelOrder: async (orderId: string, symbol: string): Promise<Order> => {
      ensureOpen();
      const order = orders.get(orderId);
      if (!order || order.symbol !== symbol) {
        throw fail(`Order ${orderId} not found`, "INVALID_ORDER", symbol);
      }
      if (order.status !== "OPEN") {
        throw fail(`Order ${orderId} is already ${order.status}`, "INVALID_ORDER", symbol);
      }
      order.status = "CANCELED";
      resting.delete(orderId);
      return { ...order };
    },

    close: async (): Promise<void> => {
      closed = true;
    },

    fetchFundingRate: async (symbol: string): Promise<FundingRate> => {
      ensureOpen();
      return fundingRateOf(requireMarket(symbol));
    },

    fetchFundingRates: async (): Promise<FundingRate[]> => {
      ensureOpen();
      return Array.from(markets.values())
        .filter((market) => market.type === "swap")
        .map(fundingRateOf);
    },

    setLeverage: async (leverage: number, symbol: string): Promise<void> => {
      ensureOpen();
      requireContractMarket(symbol);
      if (!Number.isInteger(leverage) || leverage < 1 || leverage > MAX_LEVERAGE) {
        throw fail(
          `Leverage must be an integer from 1 to ${MAX_LEVERAGE}`,
          "INVALID_ORDER",
          symbol,
        );
      }
      leverages.set(symbol, leverage);
    },

    setPositionMode: async (hedged: boolean, symbol?: string): Promise<void> => {
      ensureOpen();
      if (symbol !== undefined) {
        requireMarket(symbol);
      }
      if (hedged) {
        throw fail("Paper positions are one-way only", "INVALID_ORDER", symbol);
      }
    },

    setMarginMode: async (marginMode: MarginMode, symbol: string): Promise<void> => {
      ensureOpen();
      requireContractMarket(symbol);
      const position = positions.get(symbol);
      if (position && position.contracts > 0 && position.marginMode !== marginMode) {
        throw fail(
          `Cannot switch ${symbol} to ${marginMode} margin with an open position`,
          "INVALID_ORDER",
          symbol,
        );
      }
      marginModes.set(symbol, marginMode);
    },

    createTpslOrder: async (params: CreateTpslParams): Promise<Order> => {
      ensureOpen();
      requireContractMarket(params.symbol);
      const entry = submitOrder({
        symbol: params.symbol,
        side: params.side,
        type: params.type,
        amount: params.amount,
        price: params.price,
        clientOrderId: params.clientOrderId,
        marginMode: params.marginMode ?? "isolated",
      });
      addTrigger({
        symbol: params.symbol,
        side: params.side === "BUY" ? "SELL" : "BUY",
        amount: params.amount,
        triggerPrice: null,
        takeProfitPrice: params.takeProfit,
        stopLossPrice: params.stopLoss,
      });
      return entry;
    },

    fetchTriggerOrders: async (symbol: string): Promise<TriggerOrder[]> => {
      ensureOpen();
      requireMarket(symbol);
      return Array.from(triggers.values())
        .filter((trigger) => trigger.symbol === symbol)
        .map((trigger) => ({ ...trigger }));
    },

    cancelTriggerOrders: async (symbol: string, ids: readonly string[]): Promise<void> => {
      ensureOpen();
      // All or nothing
      for (const triggerId of ids) {
        if (triggers.get(triggerId)?.symbol !== symbol) {
          throw fail(`Trigger order ${triggerId} not found`, "INVALID_ORDER", symbol);
        }
      }
      for (const triggerId of ids) {
        triggers.delete(triggerId);
      }
    },

    createTakeProfitOrder: async (params: ProtectiveOrderParams): Promise<Order> =>
      createProtectiveOrder(params, "takeProfitPrice"),

    createStopLossOrder: async (params: ProtectiveOrderParams): Promise<Order> =>
      createProtectiveOrder(params, "stopLossPrice"),

    priceToPrecision: (symbol: string, price: number): number =>
      roundToStep(price, requireMarket(symbol).pricePrecision),

    fetchClosedPositionReport: async (
      symbol: string,
      since?: Date,
    ): Promise<ClosedPositionReport | null> => {
      ensureOpen();
      const market = requireMarket(symbol);
      const history = (fills.get(symbol) ?? []).filter(
        (fill) => since === undefined || fill.timestamp.getTime() >= since.getTime(),
      );
      return summarizeClosedPosition({
        exchange: id,
        symbol,
        fills: history,
        leverage: market.type === "spot" ? null : leverageOf(symbol),
        contractSize: market.contractSize,
      });
    },

    setPrice: (symbol: string, price: number): void => {
      requireMarket(symbol);
      if (!Number.isFinite(price) || price <= 0) {
        throw new RangeError(`Invalid price ${price} for ${symbol}`);
      }
      prices.set(symbol, price);

      for (const [orderId, params] of resting) {
        const order = orders.get(orderId);
        if (!order || order.symbol !== symbol || !isMarketable(order, price)) {
          continue;
        }
        resting.delete(orderId);
        try {
          execute(order, params, price);
        } catch (error) {
          if (!(error instanceof ExchangeError)) {
            throw error;
          }
          order.status = "REJECTED";
        }
      }

      for (const trigger of Array.from(triggers.values())) {
        if (trigger.symbol === symbol && isTriggered(trigger, price)) {
          fireTrigger(trigger, price);
        }
      }
    },

    isClosed: (): boolean => closed,
  };
};
