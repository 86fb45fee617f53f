/**
 * Structured Logger
 *
 * A lightweight structured logging utility for the lint action.
 * Writes to stderr: stdout carries the linter's own output.
 *
 * Features:
 * - Log levels: debug, info, warn, error
 * - Structured context support
 * - Environment-based level filtering
 * - Timestamps in ISO format
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_PREFIXES: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARN",
  error: "ERROR",
};

// ============================================================================
// Configuration
// ============================================================================

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getLogLevel(): LogLevel {
  const envLevel = process.env["LOG_LEVEL"]?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

function shouldOutputJson(): boolean {
  return process.env["LOG_FORMAT"] === "json";
}

// ============================================================================
// Core Logger
// ============================================================================

/**
 * Log a message with the specified level and optional context.
 */
export function log(level: LogLevel, message: string, context?: LogContext): void {
  const currentLevel = getLogLevel();

  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
    return;
  }

  const timestamp = new Date().toISOString();

  if (shouldOutputJson()) {
    const entry: LogEntry = {
      level,
      message,
      timestamp,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };
    console.error(JSON.stringify(entry));
  } else {
    const prefix = `[${timestamp}] [${LEVEL_PREFIXES[level]}]`;
    if (context && Object.keys(context).length > 0) {
      console.error(`${prefix} ${message}`, context);
    } else {
      console.error(`${prefix} ${message}`);
    }
  }
}

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Structured logger with convenience methods for each log level.
 *
 * @example
 * ```ts
 * import { logger } from "./utils/logger.js";
 *
 * logger.info("Linting targets", { targets: ["site.yml"] });
 * logger.error("Comment could not be posted", { status: 403 });
 * ```
 */
export const logger = {
  /**
   * Only shown when LOG_LEVEL=debug.
   */
  debug(message: string, context?: LogContext): void {
    log("debug", message, context);
  },

  info(message: string, context?: LogContext): void {
    log("info", message, context);
  },

  warn(message: string, context?: LogContext): void {
    log("warn", message, context);
  },

  error(message: string, context?: LogContext): void {
    log("error", message, context);
  },

  /**
   * Create a child logger with preset context.
   *
   * @example
   * ```ts
   * const runnerLogger = logger.child({ component: "lint-runner" });
   * runnerLogger.info("Running aggregate lint"); // includes { component: "lint-runner" }
   * ```
   */
  child(baseContext: LogContext): Logger {
    return {
      debug: (message: string, context?: LogContext) =>
        log("debug", message, { ...baseContext, ...context }),
      info: (message: string, context?: LogContext) =>
        log("info", message, { ...baseContext, ...context }),
      warn: (message: string, context?: LogContext) =>
        log("warn", message, { ...baseContext, ...context }),
      error: (message: string, context?: LogContext) =>
        log("error", message, { ...baseContext, ...context }),
    };
  },

  /**
   * Time an async operation and log its duration.
   *
   * @example
   * ```ts
   * const outcome = await logger.time("aggregate-lint", () => runner.runAggregate(targets, args));
   * ```
   */
  async time<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      log("debug", `${label} completed`, { durationMs: Date.now() - start });
      return result;
    } catch (error) {
      log("error", `${label} failed`, {
        durationMs: Date.now() - start,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  },
};
