import { getLogger, type LogContext, type LogLevel } from "./enhanced-logger";

// Errors always reach the console; the rest only with DEBUG=true
const CONSOLE: Record<LogLevel, { always: boolean; print: (...args: unknown[]) => void }> = {
  debug: { always: false, print: console.log },
  info: { always: false, print: console.log },
  warn: { always: false, print: console.warn },
  error: { always: true, print: console.error },
};

/**
 * Module-level entry points; they look the logger up on every call so
 * `configureLogger` can replace it after the config is loaded.
 */
export function log(level: LogLevel, message: string, data?: unknown, context?: LogContext): void {
  getLogger()[level](message, data, context);
  const target = CONSOLE[level];
  if (target.always || process.env.DEBUG === "true") {
    target.print(`[${level.toUpperCase()}] ${message}`, data ?? "");
  }
}

export const logDebug = (message: string, data?: unknown, context?: LogContext): void =>
  log("debug", message, data, context);

export const logInfo = (message: string, data?: unknown, context?: LogContext): void =>
  log("info", message, data, context);

export const logWarn = (message: string, data?: unknown, context?: LogContext): void =>
  log("warn", message, data, context);

export const logError = (message: string, error?: unknown, context?: LogContext): void =>
  log("error", message, error, context);
