/**
 * Remote operations of the exchange client and their rate limit cost.
 */

import type { DefaultRateLimitCategory } from "@/lib/rate-limiter";

export interface OperationDescriptor {
  operation: string;
  category: DefaultRateLimitCategory;
  /** Budget units taken from the category per call */
  weight: number;
}

export const OPERATIONS = {
  loadMarkets: { operation: "loadMarkets", category: "market-data", weight: 1 },
  getTicker: { operation: "getTicker", category: "market-data", weight: 1 },
  getFundingRate: { operation: "getFundingRate", category: "market-data", weight: 1 },
  // One request for every listed perpetual
  getFundingRates: { operation: "getFundingRates", category: "market-data", weight: 10 },
  getBalance: { operation: "getBalance", category: "account", weight: 1 },
  getBalances: { operation: "getBalances", category: "account", weight: 1 },
  getPositions: { operation: "getPositions", category: "account", weight: 1 },
  // Trades plus funding history
  getClosedPositionReport: { operation: "getClosedPositionReport", category: "account", weight: 2 },
  getTriggerOrders: { operation: "getTriggerOrders", category: "account", weight: 1 },
  placeOrder: { operation: "placeOrder", category: "orders", weight: 1 },
  cancelOrder: { operation: "cancelOrder", category: "orders", weight: 1 },
  setLeverage: { operation: "setLeverage", category: "orders", weight: 1 },
  setPositionMode: { operation: "setPositionMode", category: "orders", weight: 1 },
  setMarginMode: { operation: "setMarginMode", category: "orders", weight: 1 },
  createTpslPosition: { operation: "createTpslPosition", category: "orders", weight: 1 },
  cancelTriggerOrders: { operation: "cancelTriggerOrders", category: "orders", weight: 1 },
  setTakeProfit: { operation: "setTakeProfit", category: "orders", weight: 1 },
  setStopLoss: { operation: "setStopLoss", category: "orders", weight: 1 },
} as const satisfies Record<string, OperationDescriptor>;

export type OperationName = keyof typeof OPERATIONS;
