/**
 * Exchange client exports.
 */

export type {
  AccountType,
  Balance,
  CallOptions,
  ClientState,
  ClosedPositionReport,
  CreateOrderParams,
  CreateTpslParams,
  ExchangeCapabilities,
  ExchangeClient,
  FeeEntry,
  FundingRate,
  FundingRatesOptions,
  LoadMarketsOptions,
  MarginMode,
  Market,
  MarketType,
  Order,
  OrderSide,
  OrderStatus,
  OrderType,
  Position,
  PositionSide,
  ProtectiveOrderParams,
  Ticker,
  TriggerOrder,
} from "./types";

export {
  balanceSchema,
  closedPositionReportSchema,
  createOrderParamsSchema,
  createTpslParamsSchema,
  fundingRateSchema,
  isBalance,
  isCreateOrderParams,
  isFundingRate,
  isMarket,
  isOrder,
  isPosition,
  isTicker,
  isTriggerOrder,
  marketSchema,
  orderSchema,
  parseBalance,
  parseClosedPositionReport,
  parseCreateOrderParams,
  parseFundingRate,
  parseMarket,
  parseOrder,
  parsePosition,
  parseTicker,
  parseTriggerOrder,
  positionSchema,
  protectiveOrderParamsSchema,
  SYMBOL_PATTERN,
  symbolSchema,
  tickerSchema,
  triggerOrderSchema,
} from "./types";

// Errors
export {
  ClientStateError,
  EXCHANGE_ERROR_CODES,
  ExchangeError,
  InvalidArgumentError,
  isExchangeError,
  isRetryableCode,
  UnsupportedOperationError,
} from "./errors";
export type { ExchangeErrorCode, ExchangeErrorContext } from "./errors";
export {
  createErrorMapper,
  defaultErrorMapper,
  type ErrorMapper,
  type ErrorMapperConfig,
  type ErrorMappingRule,
} from "./error-mapper";

// Client
export { createExchangeClient, type ExchangeClientOptions } from "./client";
export { OPERATIONS, type OperationDescriptor, type OperationName } from "./operations";
export { createClient, type CreateClientOptions } from "./factory";
export {
  type AdapterRegistry,
  type CapabilitiesFactory,
  createAdapterRegistry,
  createPaperFromConfig,
  defaultAdapterRegistry,
} from "./registry";

// Config validation
export {
  clientConfigFromEnv,
  ClientConfigSchema,
  isClientConfig,
  parseClientConfig,
} from "./config";
export type { ClientConfig, ClientConfigInput } from "./config";

// Default rate limit rules per exchange
export { CCXT_RATE_LIMITS, DEFAULT_RATE_LIMITS, getDefaultRateLimitRules } from "./rate-limits";

// Capabilities
export {
  type CcxtCapabilitiesOptions,
  type CcxtExchange,
  createCcxtCapabilities,
  createCcxtExchange,
  isCcxtExchangeId,
} from "./ccxt";
export {
  createPaperCapabilities,
  PAPER_EXCHANGE_ID,
  type PaperCapabilities,
  type PaperOptions,
} from "./paper";
export { roundToStep } from "./precision";
export {
  summarizeClosedPosition,
  type FundingPayment,
  type PositionReportInput,
  type ReportFill,
} from "./position-report";
