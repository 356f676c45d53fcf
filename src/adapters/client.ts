/**
 * Normalized exchange client.
 *
 * Wraps an `ExchangeCapabilities` implementation in one middleware chain:
 * state guard, in-flight tracking, error mapping, rate limiting, the
 * capability call and DTO validation. Exchange differences live in the
 * capabilities; the chain is the same for every exchange.
 *
 * State machine:
 * ```
 * UNINITIALIZED --loadMarkets--> MARKETS_LOADED --first call--> ACTIVE
 *        \______________________________\______________________\__close--> CLOSED
 * ```
 */

import PQueue from "p-queue";
import * as v from "valibot";

import { type Logger, logger as rootLogger } from "@/lib/logger";
import {
  createRateLimiter,
  type RateLimitRule,
  RateLimiterClosedError,
} from "@/lib/rate-limiter";

import type { ClientConfig } from "./config";
import { defaultErrorMapper, type ErrorMapper } from "./error-mapper";
import {
  ClientStateError,
  type ExchangeError,
  type ExchangeErrorContext,
  InvalidArgumentError,
  UnsupportedOperationError,
} from "./errors";
import { OPERATIONS, type OperationDescriptor } from "./operations";
import { roundToStep } from "./precision";
import { getDefaultRateLimitRules } from "./rate-limits";
import {
  type Balance,
  type CallOptions,
  type ClientState,
  type ExchangeCapabilities,
  type ExchangeClient,
  type Market,
  createOrderParamsSchema,
  createTpslParamsSchema,
  marginModeSchema,
  parseBalance,
  parseClosedPositionReport,
  parseFundingRate,
  parseMarket,
  parseOrder,
  parsePosition,
  parseTicker,
  parseTriggerOrder,
  protectiveOrderParamsSchema,
} from "./types";

const triggerOrderIdsSchema = v.pipe(
  v.array(v.pipe(v.string(), v.minLength(1))),
  v.minLength(1, "Expected at least one id"),
);

export interface ExchangeClientOptions {
  logger?: Logger;
  mapper?: ErrorMapper;
  /** Clock for discarding past funding rates */
  now?: () => Date;
  /** Rules for the client's own limiter; unused when `config.rateLimiter` is set */
  rateLimitRules?: readonly RateLimitRule[];
}

interface RunOptions extends CallOptions {
  symbol?: string;
}

const emptyBalance = (asset: string): Balance => ({ asset, free: 0, used: 0, total: 0 });

// USDT spot pairs and USDT-settled perpetuals
const USDT_FUNDING_SYMBOL = /^\w+\/USDT(?::USDT)?$/;

/**
 * Creates a client over the given capabilities.
 *
 * The client owns `capabilities` and, unless `config.rateLimiter` is set,
 * the limiter it builds; both are closed by `close()`.
 *
 * @example
 * ```typescript
 * const client = createExchangeClient(createPaperCapabilities(), parseClientConfig({ exchange: "paper" }));
 * await client.loadMarkets();
 * const ticker = await client.getTicker("BTC/USDT:USDT");
 * await client.close();
 * ```
 */
export const createExchangeClient = (
  capabilities: ExchangeCapabilities,
  config: ClientConfig,
  options: ExchangeClientOptions = {},
): ExchangeClient => {
  const exchange = config.exchange;
  const log = (options.logger ?? rootLogger).child({ exchange });
  const mapper = options.mapper ?? defaultErrorMapper;
  const now = options.now ?? (() => new Date());
  const ownsLimiter = config.rateLimiter === undefined;
  const limiter =
    config.rateLimiter ??
    createRateLimiter({
      rules: options.rateLimitRules ?? getDefaultRateLimitRules(exchange),
      logger: log,
    });

  // No concurrency cap: the queue only tracks in-flight calls for close()
  const inFlight = new PQueue();
  const closing = new AbortController();

  let state: ClientState = "UNINITIALIZED";
  let markets: readonly Market[] | null = null;
  let marketsBySymbol = new Map<string, Market>();
  let loading: Promise<readonly Market[]> | null = null;
  let closed: Promise<void> | null = null;

  const transition = (next: ClientState): void => {
    if (state === next) {
      return;
    }
    log.info("Client state changed", { from: state, to: next });
    state = next;
  };

  const stateError = (operation: string): ClientStateError =>
    state === "CLOSED"
      ? new ClientStateError(`Cannot call ${operation}: client is closed`, state, operation)
      : new ClientStateError(`Cannot call ${operation}: markets are not loaded`, state, operation);

  const assertReady = (operation: string): void => {
    if (state !== "MARKETS_LOADED" && state !== "ACTIVE") {
      throw stateError(operation);
    }
  };

  const contextOf = (operation: string, symbol?: string): ExchangeErrorContext => ({
    exchange,
    operation,
    ...(symbol === undefined ? {} : { symbol }),
  });

  const mapFailure = (error: unknown, context: ExchangeErrorContext): ExchangeError => {
    const mapped = mapper.map(error, context);
    log.warn("Exchange call failed", {
      operation: mapped.operation,
      symbol: mapped.symbol,
      code: mapped.code,
      retryable: mapped.retryable,
      message: mapped.message,
    });
    return mapped;
  };

  /**
   * Rejects invalid caller arguments through the mapper, so custom rules see
   * them like any other failure.
   */
  const validate = <TSchema extends v.GenericSchema>(
    schema: TSchema,
    input: unknown,
    label: string,
    context: ExchangeErrorContext,
  ): v.InferOutput<TSchema> => {
    const result = v.safeParse(schema, input);
    if (!result.success) {
      const issue = result.issues[0];
      const path = v.getDotPath(issue);
      throw mapFailure(
        new InvalidArgumentError(`${label}: ${path ? `${path}: ` : ""}${issue.message}`, {
          cause: new v.ValiError(result.issues),
        }),
        context,
      );
    }
    return result.output;
  };

  /**
   * Runs one remote call through tracking, error mapping and rate limiting.
   * Cancellation by the caller surfaces as the signal's reason; cancellation
   * by close() as ClientStateError.
   */
  const execute = <T>(
    descriptor: OperationDescriptor,
    call: () => Promise<T>,
    { symbol, signal, preacquired = false }: RunOptions = {},
  ): Promise<T> => {
    const { operation, category, weight } = descriptor;
    const acquireSignal = signal ? AbortSignal.any([closing.signal, signal]) : closing.signal;

    return inFlight.add(
      async () => {
        try {
          if (!preacquired) {
            await limiter.acquire(category, { weight, signal: acquireSignal });
          }
          return await call();
        } catch (error) {
          if (signal?.aborted && error === signal.reason) {
            throw error;
          }
          if (error instanceof RateLimiterClosedError || error === closing.signal.reason) {
            throw new ClientStateError(
              `${operation} was cancelled: client is closed`,
              "CLOSED",
              operation,
            );
          }
          throw mapFailure(error, contextOf(operation, symbol));
        }
      },
      { throwOnTimeout: true },
    );
  };

  /** Data operation: requires loaded markets and activates the client on success */
  const run = async <T>(
    descriptor: OperationDescriptor,
    call: () => Promise<T>,
    runOptions?: RunOptions,
  ): Promise<T> => {
    assertReady(descriptor.operation);
    const result = await execute(descriptor, call, runOptions);
    if (state === "MARKETS_LOADED") {
      transition("ACTIVE");
    }
    return result;
  };

  const requireCapability = <K extends keyof ExchangeCapabilities>(
    name: K,
    operation: string,
  ): NonNullable<ExchangeCapabilities[K]> => {
    const capability = capabilities[name];
    if (capability === undefined) {
      throw new UnsupportedOperationError(operation, exchange);
    }
    return capability;
  };

  const getMarket = (symbol: string): Market => {
    assertReady("getMarket");
    const market = marketsBySymbol.get(symbol);
    if (!market) {
      throw mapFailure(
        new InvalidArgumentError(`Unknown market ${symbol}`),
        contextOf("getMarket", symbol),
      );
    }
    return market;
  };

  return {
    exchange,

    getState: () => state,

    loadMarkets: (loadOptions = {}) => {
      if (state === "CLOSED") {
        return Promise.reject(stateError("loadMarkets"));
      }
      if (markets && !loadOptions.reload) {
        return Promise.resolve(markets);
      }

      // Concurrent callers share one request
      loading ??= execute(
        OPERATIONS.loadMarkets,
        async () =>
          Object.freeze(
            (await capabilities.loadMarkets(loadOptions.reload ?? false)).map(parseMarket),
          ),
        loadOptions,
      )
        .then((loaded) => {
          if (state !== "CLOSED") {
            markets = loaded;
            marketsBySymbol = new Map(loaded.map((market) => [market.symbol, market]));
            if (state === "UNINITIALIZED") {
              transition("MARKETS_LOADED");
            }
            log.info("Markets loaded", { count: loaded.length });
          }
          return loaded;
        })
        .finally(() => {
          loading = null;
        });

      return loading;
    },

    getTicker: (symbol, callOptions) =>
      run(OPERATIONS.getTicker, async () => parseTicker(await capabilities.fetchTicker(symbol)), {
        ...callOptions,
        symbol,
      }),

    getFundingRate: async (symbol, callOptions) => {
      assertReady(OPERATIONS.getFundingRate.operation);
      const fetchFundingRate = requireCapability("fetchFundingRate", "getFundingRate");
      return run(
        OPERATIONS.getFundingRate,
        async () => parseFundingRate(await fetchFundingRate(symbol)),
        { ...callOptions, symbol },
      );
    },

    getFundingRates: async (fundingOptions = {}) => {
      const { active = true, ...callOptions } = fundingOptions;
      assertReady(OPERATIONS.getFundingRates.operation);
      const fetchFundingRates = requireCapability("fetchFundingRates", "getFundingRates");

      const isActivePerpetual = (symbol: string): boolean => {
        const market = marketsBySymbol.get(symbol);
        return (
          market !== undefined &&
          market.type === "swap" &&
          market.active &&
          symbol.endsWith(":USDT")
        );
      };

      return run(
        OPERATIONS.getFundingRates,
        async () => {
          const cutoff = now().getTime();
          return (await fetchFundingRates())
            .filter((rate) => USDT_FUNDING_SYMBOL.test(rate.symbol))
            .map(parseFundingRate)
            .filter((rate) => rate.fundingTime.getTime() >= cutoff)
            .filter((rate) => !active || isActivePerpetual(rate.symbol));
        },
        callOptions,
      );
    },

    getMarket,

    getMarketSymbols: () => {
      assertReady("getMarketSymbols");
      return (markets ?? [])
        .filter((market) => market.type === config.accountType)
        .map((market) => market.symbol);
    },

    priceToPrecision: (symbol, price) => {
      const market = getMarket(symbol);
      if (!capabilities.priceToPrecision) {
        return roundToStep(price, market.pricePrecision);
      }
      try {
        return capabilities.priceToPrecision(symbol, price);
      } catch (error) {
        throw mapFailure(error, contextOf("priceToPrecision", symbol));
      }
    },

    getBalance: (asset, callOptions) =>
      run(
        OPERATIONS.getBalance,
        async () => {
          const balance = (await capabilities.fetchBalances()).find(
            (candidate) => candidate.asset === asset,
          );
          return parseBalance(balance ?? emptyBalance(asset));
        },
        callOptions,
      ),

    getBalances: (callOptions) =>
      run(
        OPERATIONS.getBalances,
        async () => (await capabilities.fetchBalances()).map(parseBalance),
        callOptions,
      ),

    getPositions: (symbols, callOptions) =>
      run(
        OPERATIONS.getPositions,
        async () => {
          const wanted = symbols ? new Set(symbols) : null;
          // Some exchanges report flat positions with zero contracts
          return (await capabilities.fetchPositions(symbols))
            .filter((position) => position.contracts !== 0)
            .filter((position) => wanted === null || wanted.has(position.symbol))
            .map(parsePosition);
        },
        callOptions,
      ),

    getClosedPositionReport: async (symbol, since, callOptions) => {
      assertReady(OPERATIONS.getClosedPositionReport.operation);
      const fetchReport = requireCapability("fetchClosedPositionReport", "getClosedPositionReport");
      return run(
        OPERATIONS.getClosedPositionReport,
        async () => {
          const report = await fetchReport(symbol, since);
          return report === null ? null : parseClosedPositionReport(report);
        },
        { ...callOptions, symbol },
      );
    },

    placeOrder: async (params, callOptions) => {
      const { operation } = OPERATIONS.placeOrder;
      assertReady(operation);

      const validated = validate(
        createOrderParamsSchema,
        params,
        "Invalid order parameters",
        contextOf(operation, params.symbol),
      );
      getMarket(validated.symbol);

      return run(
        OPERATIONS.placeOrder,
        async () => parseOrder(await capabilities.createOrder(validated)),
        { ...callOptions, symbol: validated.symbol },
      );
    },

    cancelOrder: (id, symbol, callOptions) =>
      run(
        OPERATIONS.cancelOrder,
        async () => parseOrder(await capabilities.cancelOrder(id, symbol)),
        { ...callOptions, symbol },
      ),

    setLeverage: async (leverage, symbol, callOptions) => {
      const { operation } = OPERATIONS.setLeverage;
      assertReady(operation);
      const setLeverage = requireCapability("setLeverage", operation);
      if (!Number.isInteger(leverage) || leverage < 1) {
        throw mapFailure(
          new InvalidArgumentError(`Invalid leverage ${leverage}`),
          contextOf(operation, symbol),
        );
      }
      return run(OPERATIONS.setLeverage, () => setLeverage(leverage, symbol), {
        ...callOptions,
        symbol,
      });
    },

    setPositionMode: async (hedged, symbol, callOptions) => {
      const { operation } = OPERATIONS.setPositionMode;
      assertReady(operation);
      const setPositionMode = requireCapability("setPositionMode", operation);
      if (symbol !== undefined) {
        getMarket(symbol);
      }
      return run(OPERATIONS.setPositionMode, () => setPositionMode(hedged, symbol), {
        ...callOptions,
        ...(symbol === undefined ? {} : { symbol }),
      });
    },

    setMarginMode: async (marginMode, symbol, callOptions) => {
      const { operation } = OPERATIONS.setMarginMode;
      assertReady(operation);
      const setMarginMode = requireCapability("setMarginMode", operation);
      const mode = validate(
        marginModeSchema,
        marginMode,
        "Invalid margin mode",
        contextOf(operation, symbol),
      );
      getMarket(symbol);
      return run(OPERATIONS.setMarginMode, () => setMarginMode(mode, symbol), {
        ...callOptions,
        symbol,
      });
    },

    createTpslPosition: async (params, callOptions) => {
      const { operation } = OPERATIONS.createTpslPosition;
      assertReady(operation);
      const createTpslOrder = requireCapability("createTpslOrder", operation);
      const validated = validate(
        createTpslParamsSchema,
        params,
        "Invalid TP/SL parameters",
        contextOf(operation, params.symbol),
      );
      getMarket(validated.symbol);
      return run(
        OPERATIONS.createTpslPosition,
        async () => parseOrder(await createTpslOrder(validated)),
        { ...callOptions, symbol: validated.symbol },
      );
    },

    getTriggerOrders: async (symbol, callOptions) => {
      const { operation } = OPERATIONS.getTriggerOrders;
      assertReady(operation);
      const fetchTriggerOrders = requireCapability("fetchTriggerOrders", operation);
      return run(
        OPERATIONS.getTriggerOrders,
        async () => (await fetchTriggerOrders(symbol)).map(parseTriggerOrder),
        { ...callOptions, symbol },
      );
    },

    cancelTriggerOrders: async (symbol, ids, callOptions) => {
      const { operation } = OPERATIONS.cancelTriggerOrders;
      assertReady(operation);
      const cancelTriggerOrders = requireCapability("cancelTriggerOrders", operation);
      const validated = validate(
        triggerOrderIdsSchema,
        ids,
        "Invalid trigger order ids",
        contextOf(operation, symbol),
      );
      return run(OPERATIONS.cancelTriggerOrders, () => cancelTriggerOrders(symbol, validated), {
        ...callOptions,
        symbol,
      });
    },

    setTakeProfit: async (params, callOptions) => {
      const { operation } = OPERATIONS.setTakeProfit;
      assertReady(operation);
      const createTakeProfitOrder = requireCapability("createTakeProfitOrder", operation);
      const validated = validate(
        protectiveOrderParamsSchema,
        params,
        "Invalid take-profit parameters",
        contextOf(operation, params.symbol),
      );
      getMarket(validated.symbol);
      return run(
        OPERATIONS.setTakeProfit,
        async () => parseOrder(await createTakeProfitOrder(validated)),
        { ...callOptions, symbol: validated.symbol },
      );
    },

    setStopLoss: async (params, callOptions) => {
      const { operation } = OPERATIONS.setStopLoss;
      assertReady(operation);
      const createStopLossOrder = requireCapability("createStopLossOrder", operation);
      const validated = validate(
        protectiveOrderParamsSchema,
        params,
        "Invalid stop-loss parameters",
        contextOf(operation, params.symbol),
      );
      getMarket(validated.symbol);
      return run(
        OPERATIONS.setStopLoss,
        async () => parseOrder(await createStopLossOrder(validated)),
        { ...callOptions, symbol: validated.symbol },
      );
    },

    close: () => {
      closed ??= (async () => {
        transition("CLOSED");
        closing.abort(new ClientStateError("Client is closed", "CLOSED", "close"));
        await inFlight.onIdle();
        try {
          await capabilities.close();
        } catch (error) {
          throw mapFailure(error, contextOf("close"));
        } finally {
          if (ownsLimiter) {
            limiter.close();
          }
          log.info("Client closed");
        }
      })();
      return closed;
    },
  };
};
