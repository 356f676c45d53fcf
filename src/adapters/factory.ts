/**
 * Factory function for creating exchange clients.
 */

import type { Logger } from "@/lib/logger";
import type { RateLimitRule } from "@/lib/rate-limiter";

import { createExchangeClient } from "./client";
import { type ClientConfigInput, parseClientConfig } from "./config";
import type { ErrorMapper } from "./error-mapper";
import { type AdapterRegistry, defaultAdapterRegistry } from "./registry";
import type { ExchangeClient } from "./types";

export interface CreateClientOptions {
  /** Defaults to `paper` plus the ccxt exchanges */
  registry?: AdapterRegistry;
  logger?: Logger;
  mapper?: ErrorMapper;
  rateLimitRules?: readonly RateLimitRule[];
}

/**
 * Create an exchange client from configuration.
 *
 * @throws ValiError when the configuration is malformed
 * @throws Error when the registry has no exchange by that name
 *
 * @example
 * ```typescript
 * const client = createClient({ exchange: "bybit", apiKey, apiSecret, testnet: true });
 * await client.loadMarkets();
 * ```
 */
export const createClient = (
  input: ClientConfigInput,
  options: CreateClientOptions = {},
): ExchangeClient => {
  const config = parseClientConfig(input);
  const registry = options.registry ?? defaultAdapterRegistry;
  const createCapabilities = registry.get(config.exchange);
  if (!createCapabilities) {
    throw new Error(`Unknown exchange "${config.exchange}"`);
  }

  return createExchangeClient(createCapabilities(config), config, options);
};
