import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

const booleanFlagSchema = v.pipe(
  v.picklist(["true", "false", "1", "0"]),
  v.transform((value) => value === "true" || value === "1"),
);

export const envSchema = v.object({
  // Unknown environments run with production defaults
  NODE_ENV: v.fallback(
    v.optional(v.picklist(["development", "production", "test"]), "production"),
    "production",
  ),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

  // Default exchange connection
  EXCHANGE_NAME: v.optional(v.pipe(v.string(), v.minLength(1))),
  EXCHANGE_API_KEY: v.optional(v.string()),
  EXCHANGE_API_SECRET: v.optional(v.string()),
  EXCHANGE_PASSWORD: v.optional(v.string()),
  EXCHANGE_UID: v.optional(v.string()),
  EXCHANGE_ACCOUNT_TYPE: v.optional(v.picklist(["spot", "swap", "future"])),
  EXCHANGE_TESTNET: v.optional(booleanFlagSchema),
});

export type Env = v.InferOutput<typeof envSchema>;
