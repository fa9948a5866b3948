import { pino } from "pino";
import type { Logger } from "pino";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Resolve the log level from `LOG_LEVEL`, falling back to "info". */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const level = value?.trim().toLowerCase();
  return level && isLogLevel(level) ? level : "info";
}

function createLogger(): Logger {
  return pino({
    level: resolveLogLevel(process.env["LOG_LEVEL"]),
    base: {
      service: "article-etl",
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
