/**
 * Structured logger.
 *
 * Entries are JSON lines, or single-line text when `pretty` is set. Output
 * goes to a sink, the console by default, so host applications can route SDK
 * logs into their own pipeline.
 */

import { getLoggingConfig } from "../config";

import type { LogLevel } from "./schema";

type LogContext = Record<string, unknown>;

/** Receives every formatted entry that passes the level filter */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerConfig {
  level: LogLevel;
  /** Single-line text instead of JSON (default: from environment) */
  pretty?: boolean;
  /** Bound context merged into every entry */
  context?: LogContext;
  sink?: LogSink;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, error?: Error, context?: LogContext) => void;
  /** Returns a logger that adds `context` to every entry */
  child: (context: LogContext) => Logger;
}

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

const mergeContext = (
  bound: LogContext | undefined,
  context: LogContext | undefined,
): LogContext | undefined => {
  if (!bound) {
    return context;
  }
  return context ? { ...bound, ...context } : bound;
};

// ExchangeError and Node system errors carry a string code
const errorCode = (error: Error): string | undefined =>
  "code" in error && typeof error.code === "string" ? error.code : undefined;

const serializeError = (error: Error): NonNullable<LogEntry["error"]> => {
  const code = errorCode(error);
  return {
    name: error.name,
    message: error.message,
    ...(code && { code }),
    ...(error.stack && { stack: error.stack }),
  };
};

const formatPretty = (entry: LogEntry): string => {
  const context = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
  const error = entry.error ? ` (${entry.error.name}: ${entry.error.message})` : "";
  return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${context}${error}`;
};

export const createLogger = (
  loggerConfig: LoggerConfig = { level: getLoggingConfig().level },
): Logger => {
  const {
    level: minLevel,
    pretty = getLoggingConfig().pretty,
    context: bound,
    sink = consoleSink,
  } = loggerConfig;

  const emit = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (LOG_LEVEL_RANK[level] < LOG_LEVEL_RANK[minLevel]) {
      return;
    }
    const merged = mergeContext(bound, context);
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(merged && { context: merged }),
      ...(error && { error: serializeError(error) }),
    };
    sink(level, pretty ? formatPretty(entry) : JSON.stringify(entry));
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, error, context) => emit("error", message, context, error),
    child: (context) =>
      createLogger({ level: minLevel, pretty, sink, context: mergeContext(bound, context) }),
  };
};

let root: Logger | undefined;

const rootLogger = (): Logger => {
  root ??= createLogger();
  return root;
};

/** Shared logger; its level and format come from the environment on first use */
export const logger: Logger = {
  debug: (message, context) => rootLogger().debug(message, context),
  info: (message, context) => rootLogger().info(message, context),
  warn: (message, context) => rootLogger().warn(message, context),
  error: (message, error, context) => rootLogger().error(message, error, context),
  child: (context) => rootLogger().child(context),
};
