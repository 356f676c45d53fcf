/**
 * ccxt-backed exchange capabilities.
 */

export {
  type CcxtCapabilitiesOptions,
  createCcxtCapabilities,
} from "./capabilities";
export { type CcxtExchange, createCcxtExchange, isCcxtExchangeId } from "./exchange";
