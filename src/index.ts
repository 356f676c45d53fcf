/**
 * cex-sdk
 *
 * Uniform contracts and a rate-limited, error-normalizing client for
 * centralized crypto exchanges.
 */

export * from "./adapters";
export * from "./lib/rate-limiter";

export {
  consoleSink,
  createLogger,
  logger,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type LogSink,
} from "./lib/logger";
export { type Env, EnvValidationError, parseEnv } from "./lib/env/env";
