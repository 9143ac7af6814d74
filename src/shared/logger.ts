/**
 * Component logger writing JSON lines to .trafficlens/trafficlens.log.
 *
 * Nothing is ever written to stdout: the MCP server owns stdout for its
 * JSON-RPC stream, and the proxy may be run with stdout piped elsewhere.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { getTrafficLensPaths } from "./project.js";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "trace"];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export type LogContext = Record<string, unknown>;

export interface Logger {
  readonly level: LogLevel;
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Map the number of -v flags to a log level.
 * 0 → warn, 1 → info, 2 → debug, 3+ → trace.
 */
export function parseVerbosity(verbosity: number): LogLevel {
  if (verbosity <= 0) return DEFAULT_LOG_LEVEL;
  if (verbosity === 1) return "info";
  if (verbosity === 2) return "debug";
  return "trace";
}

function serialiseContext(context: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    result[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return result;
}

/**
 * Build a logger that appends to an explicit file. Used directly by tests;
 * everything else goes through createLogger.
 */
export function createFileLogger(
  component: string,
  logFile: string,
  level: LogLevel = DEFAULT_LOG_LEVEL
): Logger {
  const threshold = LEVEL_PRIORITY[level];
  let dirReady = false;

  const write = (entryLevel: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_PRIORITY[entryLevel] > threshold) {
      return;
    }

    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level: entryLevel,
      component,
      msg: message,
      ...(context ? serialiseContext(context) : {}),
    });

    try {
      if (!dirReady) {
        fs.mkdirSync(path.dirname(logFile), { recursive: true });
        dirReady = true;
      }
      fs.appendFileSync(logFile, line + "\n", "utf-8");
    } catch {
      // Logging is best-effort.
    }
  };

  return {
    level,
    error: (message, context) => write("error", message, context),
    warn: (message, context) => write("warn", message, context),
    info: (message, context) => write("info", message, context),
    debug: (message, context) => write("debug", message, context),
    trace: (message, context) => write("trace", message, context),
  };
}

/**
 * Create a logger for a component, writing to the project's log file.
 */
export function createLogger(component: string, projectRoot: string, level?: LogLevel): Logger {
  return createFileLogger(component, getTrafficLensPaths(projectRoot).logFile, level);
}

/**
 * Logger that drops everything. Handy default for library callers that do
 * not care about diagnostics.
 */
export const silentLogger: Logger = {
  level: "error",
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
  trace: () => {},
};
