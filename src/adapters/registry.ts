/**
 * Exchange name to capabilities constructor lookup.
 */

import ccxt from "ccxt";

import { createCcxtCapabilities } from "./ccxt";
import type { ClientConfig } from "./config";
import { createPaperCapabilities, PAPER_EXCHANGE_ID, parsePaperOptions } from "./paper";
import type { ExchangeCapabilities } from "./types";

export type CapabilitiesFactory = (config: ClientConfig) => ExchangeCapabilities;

/** Read-only after construction */
export interface AdapterRegistry {
  get(name: string): CapabilitiesFactory | undefined;
  has(name: string): boolean;
  names(): string[];
}

export const createAdapterRegistry = (
  entries: Readonly<Record<string, CapabilitiesFactory>>,
): AdapterRegistry => {
  const factories = new Map(Object.entries(entries));

  return {
    get: (name) => factories.get(name),
    has: (name) => factories.has(name),
    names: () => [...factories.keys()],
  };
};

/** Paper exchange configured from `config.options` */
export const createPaperFromConfig: CapabilitiesFactory = (config) =>
  createPaperCapabilities(parsePaperOptions(config.options ?? {}), config.exchange);

/** `paper` plus every exchange ccxt ships */
export const defaultAdapterRegistry: AdapterRegistry = createAdapterRegistry({
  ...Object.fromEntries(
    ccxt.exchanges.map((id): [string, CapabilitiesFactory] => [
      id,
      (config) => createCcxtCapabilities(config),
    ]),
  ),
  [PAPER_EXCHANGE_ID]: createPaperFromConfig,
});
