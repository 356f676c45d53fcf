/**
 * ccxt exchange construction.
 *
 * The client owns rate limiting, so ccxt's built-in throttle is disabled.
 */

import ccxt, { Exchange } from "ccxt";

import type { ClientConfig } from "../config";

/**
 * The part of a ccxt exchange the capabilities call.
 *
 * Responses are `unknown`: normalizers validate them.
 */
export interface CcxtExchange {
  readonly id: string;
  readonly has: Record<string, unknown>;
  readonly precisionMode?: number;

  loadMarkets(reload?: boolean): Promise<unknown>;
  fetchTicker(symbol: string): Promise<unknown>;
  fetchBalance(): Promise<unknown>;
  fetchPositions(symbols?: string[]): Promise<unknown>;
  createOrder(
    symbol: string,
    type: "market" | "limit",
    side: "buy" | "sell",
    amount: number,
    price?: number,
    params?: Record<string, unknown>,
  ): Promise<unknown>;
  cancelOrder(id: string, symbol?: string): Promise<unknown>;
  fetchOrder(id: string, symbol?: string): Promise<unknown>;
  fetchFundingRate(symbol: string): Promise<unknown>;
  fetchFundingRates(symbols?: string[]): Promise<unknown>;
  fetchOpenOrders(
    symbol?: string,
    since?: number,
    limit?: number,
    params?: Record<string, unknown>,
  ): Promise<unknown>;
  cancelOrders(ids: string[], symbol?: string, params?: Record<string, unknown>): Promise<unknown>;
  setLeverage(leverage: number, symbol?: string): Promise<unknown>;
  setPositionMode(hedged: boolean, symbol?: string): Promise<unknown>;
  setMarginMode(marginMode: string, symbol?: string): Promise<unknown>;
  priceToPrecision(symbol: string, price: number): string;
  fetchMyTrades(symbol?: string, since?: number): Promise<unknown>;
  fetchFundingHistory(symbol?: string, since?: number): Promise<unknown>;
  close(): Promise<unknown>;
}

type ExchangeConstructor = new (config: Record<string, unknown>) => Exchange;

const isExchangeConstructor = (value: unknown): value is ExchangeConstructor =>
  typeof value === "function" && value.prototype instanceof Exchange;

/** Whether ccxt ships an exchange with this id */
export const isCcxtExchangeId = (id: string): boolean =>
  ccxt.exchanges.includes(id) && isExchangeConstructor(Reflect.get(ccxt, id));

/**
 * Instantiates the ccxt exchange named by `config.exchange`.
 *
 * `config.options` is merged into ccxt's options; `defaultType` always
 * follows `config.accountType`.
 *
 * @throws Error for an id ccxt does not know
 */
export const createCcxtExchange = (config: ClientConfig): Exchange => {
  const ExchangeClass: unknown = Reflect.get(ccxt, config.exchange);
  if (!ccxt.exchanges.includes(config.exchange) || !isExchangeConstructor(ExchangeClass)) {
    throw new Error(`Unknown ccxt exchange "${config.exchange}"`);
  }

  const exchange = new ExchangeClass({
    ...(config.apiKey ? { apiKey: config.apiKey } : {}),
    ...(config.apiSecret ? { secret: config.apiSecret } : {}),
    ...(config.password ? { password: config.password } : {}),
    ...(config.uid ? { uid: config.uid } : {}),
    enableRateLimit: false,
    options: { ...config.options, defaultType: config.accountType },
  });

  if (config.testnet) {
    exchange.setSandboxMode(true);
  }

  return exchange;
};
