/**
 * Micro-logger: console output with level filtering and bound context
 * Wraps console.*; LOG_LEVEL picks the minimum level.
 */

import type { LogLevel, LogMeta, Logger } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "@/constants";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Resolve the active level from LOG_LEVEL, falling back to the default
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

let currentLevelValue = LOG_LEVELS[resolveLogLevel(process.env.LOG_LEVEL)];

/**
 * Override the level read from the environment at load time
 */
export function setLogLevel(level: LogLevel): void {
  currentLevelValue = LOG_LEVELS[level];
}

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < currentLevelValue) {
    return;
  }

  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

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

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/**
 * The module itself as a Logger value, for injection into components
 */
export const rootLogger: Logger = { debug, info, warn, error };

/**
 * Create a logger with bound context (meta merged into all calls)
 */
export function withContext(context: LogMeta, base: Logger = rootLogger): Logger {
  return {
    debug: (message, meta) => base.debug(message, { ...context, ...meta }),
    info: (message, meta) => base.info(message, { ...context, ...meta }),
    warn: (message, meta) => base.warn(message, { ...context, ...meta }),
    error: (message, meta) => base.error(message, { ...context, ...meta }),
  };
}
