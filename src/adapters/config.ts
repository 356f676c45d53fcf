/**
 * Client configuration validation schemas.
 */

import * as v from "valibot";

import { type Env, getEnv } from "@/lib/env/env";
import type { RateLimiter } from "@/lib/rate-limiter";

import { accountTypeSchema } from "./types";

const credentialSchema = v.optional(v.pipe(v.string(), v.minLength(1)));

const isRateLimiter = (input: unknown): input is RateLimiter =>
  input !== null &&
  typeof input === "object" &&
  typeof Reflect.get(input, "acquire") === "function" &&
  typeof Reflect.get(input, "tryAcquire") === "function" &&
  typeof Reflect.get(input, "close") === "function";

export const ClientConfigSchema = v.object({
  /** Registry name: "paper" or a ccxt exchange id */
  exchange: v.pipe(v.string(), v.trim(), v.minLength(1)),
  apiKey: credentialSchema,
  apiSecret: credentialSchema,
  password: credentialSchema,
  uid: credentialSchema,
  accountType: v.optional(accountTypeSchema, "swap"),
  testnet: v.optional(v.boolean(), false),
  /** Shared limiter; the client builds its own from exchange defaults when absent */
  rateLimiter: v.optional(v.custom<RateLimiter>(isRateLimiter, "Expected a RateLimiter")),
  /** Passed through to the underlying exchange library */
  options: v.optional(v.record(v.string(), v.unknown())),
});

export type ClientConfig = v.InferOutput<typeof ClientConfigSchema>;

export type ClientConfigInput = v.InferInput<typeof ClientConfigSchema>;

/**
 * Validates a client configuration and freezes the result.
 *
 * @throws ValiError when the configuration is malformed
 */
export const parseClientConfig = (config: unknown): Readonly<ClientConfig> => {
  const parsed = v.parse(ClientConfigSchema, config);
  return Object.freeze({
    ...parsed,
    ...(parsed.options ? { options: Object.freeze({ ...parsed.options }) } : {}),
  });
};

export const isClientConfig = (value: unknown): value is ClientConfig =>
  v.is(ClientConfigSchema, value);

/**
 * Builds a client configuration from `EXCHANGE_*` environment variables.
 * Empty credentials count as absent.
 *
 * @throws Error when EXCHANGE_NAME is not set
 */
export const clientConfigFromEnv = (env: Env = getEnv()): Readonly<ClientConfig> => {
  if (!env.EXCHANGE_NAME) {
    throw new Error("EXCHANGE_NAME is not set");
  }

  return parseClientConfig({
    exchange: env.EXCHANGE_NAME,
    apiKey: env.EXCHANGE_API_KEY || undefined,
    apiSecret: env.EXCHANGE_API_SECRET || undefined,
    password: env.EXCHANGE_PASSWORD || undefined,
    uid: env.EXCHANGE_UID || undefined,
    accountType: env.EXCHANGE_ACCOUNT_TYPE,
    testnet: env.EXCHANGE_TESTNET,
  });
};
