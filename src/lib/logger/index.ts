export {
  consoleSink,
  createLogger,
  logger,
  type Logger,
  type LoggerConfig,
  type LogSink,
} from "./logger";

export type { LogLevel } from "./schema";
