/**
 * Micro-logger wrapper: minimal logging with level filtering
 * No external dependencies, wraps console.*
 *
 * All output goes to stderr so that stdout stays reserved for
 * machine-readable CLI output (the JSON record/report).
 */

import type { LogLevel, Logger } from "@/types";
import { LOG_LEVELS } from "@/constants/logger";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

/**
 * Resolve the active level from LOG_LEVEL (read per call so tests and
 * the CLI can change it after import), default 'info'
 */
function currentLevelValue(): number {
  const env = process.env.LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS[isLogLevel(env) ? env : "info"];
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
  if (LOG_LEVELS[level] >= currentLevelValue()) {
    const timestamp = new Date().toISOString();
    const formattedMeta = formatMeta(meta);
    const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${formattedMeta}`;

    switch (level) {
      case "debug":
      case "info":
      case "error":
        console.error(logMessage);
        break;
      case "warn":
        console.warn(logMessage);
        break;
    }
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
    debug: (message: string, meta?: Record<string, unknown>) =>
      debug(message, { ...context, ...meta }),
    info: (message: string, meta?: Record<string, unknown>) =>
      info(message, { ...context, ...meta }),
    warn: (message: string, meta?: Record<string, unknown>) =>
      warn(message, { ...context, ...meta }),
    error: (message: string, meta?: Record<string, unknown>) =>
      error(message, { ...context, ...meta }),
  };
}
