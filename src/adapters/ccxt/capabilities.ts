/**
 * Exchange capabilities backed by ccxt.
 *
 * Optional capabilities are present only when the exchange advertises them
 * in `has`. Rate limiting and error mapping are applied by the client.
 */

import type { ClientConfig } from "../config";
import { summarizeClosedPosition } from "../position-report";
import type { ExchangeCapabilities, Market } from "../types";
import { type CcxtExchange, createCcxtExchange } from "./exchange";
import {
  hasOrderSide,
  normalizeBalances,
  normalizeFundingHistory,
  normalizeFundingRate,
  normalizeFundingRates,
  normalizeMarkets,
  normalizeOrder,
  normalizePositions,
  normalizeTicker,
  normalizeTrades,
  normalizeTriggerOrders,
} from "./normalizers";

// Unified ccxt flag for conditional orders in fetchOpenOrders and cancelOrders
const TRIGGER_PARAMS = { trigger: true } as const;

export interface CcxtCapabilitiesOptions {
  /** Prebuilt exchange; defaults to the ccxt class named by `config.exchange` */
  exchange?: CcxtExchange;
  now?: () => Date;
}

export const createCcxtCapabilities = (
  config: ClientConfig,
  options: CcxtCapabilitiesOptions = {},
): ExchangeCapabilities => {
  const exchange = options.exchange ?? createCcxtExchange(config);
  const now = options.now ?? (() => new Date());
  const markets = new Map<string, Market>();

  const supports = (feature: string): boolean => Boolean(exchange.has[feature]);

  const capabilities: ExchangeCapabilities = {
    id: exchange.id,

    loadMarkets: async (reload) => {
      const loaded = normalizeMarkets(await exchange.loadMarkets(reload), exchange.precisionMode);
      markets.clear();
      for (const market of loaded) {
        markets.set(market.symbol, market);
      }
      return loaded;
    },

    fetchTicker: async (symbol) => normalizeTicker(await exchange.fetchTicker(symbol), now),

    fetchBalances: async () => normalizeBalances(await exchange.fetchBalance()),

    fetchPositions: async (symbols) =>
      normalizePositions(await exchange.fetchPositions(symbols ? [...symbols] : undefined), now),

    createOrder: async (params) => {
      const raw = await exchange.createOrder(
        params.symbol,
        params.type === "LIMIT" ? "limit" : "market",
        params.side === "BUY" ? "buy" : "sell",
        params.amount,
        params.type === "LIMIT" ? params.price : undefined,
        {
          ...(params.reduceOnly ? { reduceOnly: true } : {}),
          ...(params.clientOrderId ? { clientOrderId: params.clientOrderId } : {}),
          ...(params.marginMode ? { marginMode: params.marginMode } : {}),
        },
      );

      return normalizeOrder(
        raw,
        {
          symbol: params.symbol,
          status: "OPEN",
          side: params.side,
          type: params.type,
          amount: params.amount,
          ...(params.price === undefined ? {} : { price: params.price }),
          reduceOnly: params.reduceOnly ?? false,
        },
        now,
      );
    },

    cancelOrder: async (id, symbol) => {
      const acknowledgement = await exchange.cancelOrder(id, symbol);
      // Some venues acknowledge a cancel with little more than the id
      const raw =
        !hasOrderSide(acknowledgement) && supports("fetchOrder")
          ? await exchange.fetchOrder(id, symbol)
          : acknowledgement;
      return normalizeOrder(raw, { symbol, status: "CANCELED" }, now);
    },

    // ccxt formats to a string; markets must be loaded
    priceToPrecision: (symbol, price) => Number(exchange.priceToPrecision(symbol, price)),

    close: async () => {
      await exchange.close();
    },
  };

  if (supports("fetchFundingRate")) {
    capabilities.fetchFundingRate = async (symbol) =>
      normalizeFundingRate(await exchange.fetchFundingRate(symbol), exchange.id);
  }

  if (supports("fetchFundingRates")) {
    capabilities.fetchFundingRates = async () =>
      normalizeFundingRates(await exchange.fetchFundingRates(), exchange.id);
  }

  if (supports("createOrderWithTakeProfitAndStopLoss")) {
    capabilities.createTpslOrder = async (params) => {
      const raw = await exchange.createOrder(
        params.symbol,
        params.type === "LIMIT" ? "limit" : "market",
        params.side === "BUY" ? "buy" : "sell",
        params.amount,
        params.type === "LIMIT" ? params.price : undefined,
        {
          takeProfit: { triggerPrice: params.takeProfit },
          stopLoss: { triggerPrice: params.stopLoss },
          marginMode: params.marginMode ?? "isolated",
          ...(params.clientOrderId ? { clientOrderId: params.clientOrderId } : {}),
        },
      );

      return normalizeOrder(
        raw,
        {
          symbol: params.symbol,
          status: "OPEN",
          side: params.side,
          type: params.type,
          amount: params.amount,
          ...(params.price === undefined ? {} : { price: params.price }),
        },
        now,
      );
    };
  }

  if (supports("fetchOpenOrders")) {
    capabilities.fetchTriggerOrders = async (symbol) =>
      normalizeTriggerOrders(
        await exchange.fetchOpenOrders(symbol, undefined, undefined, { ...TRIGGER_PARAMS }),
        symbol,
      );
  }

  if (supports("cancelOrders")) {
    capabilities.cancelTriggerOrders = async (symbol, ids) => {
      await exchange.cancelOrders([...ids], symbol, { ...TRIGGER_PARAMS });
    };
  }

  if (supports("setPositionMode")) {
    capabilities.setPositionMode = async (hedged, symbol) => {
      await exchange.setPositionMode(hedged, symbol);
    };
  }

  if (supports("setMarginMode")) {
    capabilities.setMarginMode = async (marginMode, symbol) => {
      await exchange.setMarginMode(marginMode, symbol);
    };
  }

  if (supports("setLeverage")) {
    capabilities.setLeverage = async (leverage, symbol) => {
      await exchange.setLeverage(leverage, symbol);
    };
  }

  if (supports("fetchMyTrades")) {
    capabilities.fetchClosedPositionReport = async (symbol, since) => {
      const sinceMs = since?.getTime();
      const fills = normalizeTrades(await exchange.fetchMyTrades(symbol, sinceMs));
      const funding = supports("fetchFundingHistory")
        ? normalizeFundingHistory(await exchange.fetchFundingHistory(symbol, sinceMs))
        : [];

      return summarizeClosedPosition({
        exchange: exchange.id,
        symbol,
        fills,
        funding,
        contractSize: markets.get(symbol)?.contractSize ?? null,
      });
    };
  }

  return capabilities;
};
