/**
 * Micro-logger wrapper: minimal logging with level filtering
 * No external dependencies, wraps console.*
 */

import type { LogLevel, Logger, LoggerOptions } from "@/types";
import { LOG_LEVELS, DEFAULT_LOG_LEVEL } from "@/constants";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Narrow an arbitrary string to a LogLevel
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : null;
}

// Read from environment, default to 'info'
let currentLevelValue = LOG_LEVELS[parseLogLevel(process.env.LOG_LEVEL) ?? DEFAULT_LOG_LEVEL];

// When true, every level goes to stderr (keeps stdout clean for piped output)
let stderrOnly = false;

/**
 * Adjust level and output stream at runtime
 */
export function configureLogger(options: LoggerOptions): void {
  if (options.level !== undefined) {
    currentLevelValue = LOG_LEVELS[options.level];
  }
  if (options.stderrOnly !== undefined) {
    stderrOnly = options.stderrOnly;
  }
}

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

/**
 * Log message if level is enabled
 */
function log(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
): void {
  if (LOG_LEVELS[level] < currentLevelValue) {
    return;
  }

  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

  if (stderrOnly) {
    console.error(logMessage);
    return;
  }

  switch (level) {
    case "debug":
    case "info":
      console.log(logMessage);
      break;
    case "warn":
      console.warn(logMessage);
      break;
    case "error":
      console.error(logMessage);
      break;
  }
}

export function debug(message: string, meta?: Record<string, unknown>): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: Record<string, unknown>): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: Record<string, unknown>): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: Record<string, unknown>): void {
  log("error", message, meta);
}

/**
 * Create a logger with bound context (meta merged into all calls)
 */
export function withContext(context: Record<string, unknown>): Logger {
  return {
    debug: (message, meta) => debug(message, { ...context, ...meta }),
    info: (message, meta) => info(message, { ...context, ...meta }),
    warn: (message, meta) => warn(message, { ...context, ...meta }),
    error: (message, meta) => error(message, { ...context, ...meta }),
  };
}
