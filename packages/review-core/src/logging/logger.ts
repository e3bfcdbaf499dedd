/**
 * Pino Logger Factory
 *
 * Structured logging via pino. Logs go to stderr so command output on
 * stdout stays machine-readable.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Log level */
  level?: LogLevel;
  /** Enable pretty printing (for development) */
  pretty?: boolean;
  /** Base bindings (always included in logs) */
  base?: Record<string, unknown>;
}

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function levelFromEnv(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: levelFromEnv(process.env.LOG_LEVEL),
  pretty: process.env.GLOSS_LOG_PRETTY === "1",
  base: {
    service: "gloss",
  },
};

/**
 * Create a pino logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  const mergedConfig = { ...DEFAULT_CONFIG, ...config };

  const options: LoggerOptions = {
    level: mergedConfig.level,
    base: mergedConfig.base,
  };

  if (mergedConfig.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
        destination: 2,
      },
    };
    return pino(options);
  }

  return pino(options, pino.destination(2));
}

/**
 * Review-side logger with a small, typed surface
 */
export interface ReviewLogger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: unknown): void;
  child(bindings: Record<string, unknown>): ReviewLogger;
}

export function wrapLogger(logger: Logger): ReviewLogger {
  return {
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err) => {
      if (err instanceof Error) {
        logger.error({ err }, msg);
      } else if (err) {
        logger.error({ detail: err }, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

let defaultLogger: ReviewLogger | null = null;

/**
 * Get or create the default logger, optionally scoped to a module
 */
export function getLogger(module?: string): ReviewLogger {
  if (!defaultLogger) {
    defaultLogger = wrapLogger(createLogger());
  }
  return module ? defaultLogger.child({ module }) : defaultLogger;
}

/**
 * Logger that drops everything; for tests and embedding hosts that log elsewhere
 */
export function createSilentLogger(): ReviewLogger {
  return wrapLogger(createLogger({ level: "silent" }));
}
