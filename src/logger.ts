/**
 * Global Logger Module
 * Provides centralized logging with database persistence
 */

import { saveLog } from "./database/log";
import type { LogLevel } from "./database/types";

interface LogOptions {
  source?: string;
  context?: Record<string, unknown>;
  skipConsole?: boolean;
  skipDatabase?: boolean;
}

/**
 * Database persistence is off in tests and when LOG_TO_DATABASE=false
 */
function shouldPersist(options?: LogOptions): boolean {
  if (options?.skipDatabase) return false;
  if (process.env.NODE_ENV === "test") return false;
  return process.env.LOG_TO_DATABASE !== "false";
}

/**
 * Get the calling file name from the stack trace
 */
function getCallerInfo(): string {
  const stack = new Error().stack;
  if (!stack) return "unknown";

  const lines = stack.split("\n");
  // Skip first 4 lines: Error, getCallerInfo, log function, logger method
  const callerLine = lines[4] || "";

  const match = callerLine.match(/at\s+(?:.*\s+)?\(?(.*):(\d+):(\d+)\)?/);
  if (match) {
    const fullPath = match[1];
    const fileName = fullPath.split("/").pop() || fullPath;
    return fileName.replace(".ts", "").replace(".js", "");
  }

  return "unknown";
}

export function formatLogLine(
  level: LogLevel,
  message: string,
  source?: string,
  context?: Record<string, unknown>
): string {
  const prefix = `[${level.toUpperCase()}]`;
  const sourceInfo = source ? ` [${source}]` : "";
  const contextInfo = context ? ` ${JSON.stringify(context)}` : "";
  return `${prefix}${sourceInfo} ${message}${contextInfo}`;
}

function persist(
  level: LogLevel,
  message: string,
  source: string,
  context: Record<string, unknown> | undefined,
  stackTrace: string | undefined
): void {
  try {
    saveLog(level, message, { source, context, stackTrace });
  } catch (err) {
    // If database logging fails, only log to console
    console.error("[LOGGER] Failed to save log to database:", err);
  }
}

/**
 * Core logging function
 */
function log(level: LogLevel, message: string, options?: LogOptions): void {
  const source = options?.source || getCallerInfo();
  const context = options?.context;

  let stackTrace: string | undefined;
  if (level === "error") {
    const stack = new Error().stack;
    if (stack) {
      // Remove first 2 lines (Error and this function)
      stackTrace = stack.split("\n").slice(2).join("\n");
    }
  }

  if (!options?.skipConsole) {
    const line = formatLogLine(level, message, source, context);

    switch (level) {
      case "error":
        console.error(line);
        break;
      case "warning":
        console.warn(line);
        break;
      case "info":
        console.info(line);
        break;
      case "debug":
        console.debug(line);
        break;
    }
  }

  if (shouldPersist(options)) {
    persist(level, message, source, context, stackTrace);
  }
}

/**
 * Global logger instance with convenience methods
 */
export const logger = {
  error(message: string, options?: LogOptions): void {
    log("error", message, options);
  },

  warning(message: string, options?: LogOptions): void {
    log("warning", message, options);
  },

  info(message: string, options?: LogOptions): void {
    log("info", message, options);
  },

  debug(message: string, options?: LogOptions): void {
    log("debug", message, options);
  },

  /**
   * Log an error from an Error object
   */
  errorFromException(error: unknown, options?: LogOptions): void {
    const message = error instanceof Error ? error.message : String(error);
    const stackTrace = error instanceof Error ? error.stack : undefined;
    const source = options?.source || getCallerInfo();

    if (!options?.skipConsole) {
      console.error(formatLogLine("error", message, source, options?.context));
      if (stackTrace) {
        console.error(stackTrace);
      }
    }

    if (shouldPersist(options)) {
      persist("error", message, source, options?.context, stackTrace);
    }
  },
};

export default logger;
