import * as v from "valibot";

import { type LogLevel, logLevelSchema } from "./logger/schema";

// Unknown values fall back so that loading the package never throws
const loggingEnvSchema = v.object({
  NODE_ENV: v.fallback(
    v.optional(v.picklist(["development", "production", "test"]), "production"),
    "production",
  ),
  LOG_LEVEL: v.fallback(v.optional(logLevelSchema), undefined),
});

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
}

let cachedLogging: LoggingConfig | undefined;

/** Logging defaults, read from `process.env` on first use */
export const getLoggingConfig = (): LoggingConfig => {
  if (!cachedLogging) {
    const env = v.parse(loggingEnvSchema, process.env);
    cachedLogging = {
      level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
      pretty: env.NODE_ENV === "development",
    };
  }
  return cachedLogging;
};

export const resetLoggingConfig = (): void => {
  cachedLogging = undefined;
};
