/**
 * Lightweight levelled logger.
 * Writes one line per entry to the console and, optionally, a log file.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  /** Minimum level written */
  level?: LogLevel;
  /** Write to the console */
  console?: boolean;
  /** Append to this file as well */
  file?: string;
  /** Clock, for tests */
  now?: () => Date;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/** Format `[time] [LEVEL] message {context}`. */
export function formatLogEntry(
  time: Date,
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
): string {
  const levelStr = level.toUpperCase().padEnd(5);
  let entry = `[${time.toISOString()}] [${levelStr}] ${message}`;
  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }
  return entry;
}

function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const toConsole = options.console ?? true;
  const file = options.file;
  const now = options.now ?? (() => new Date());

  if (file) {
    mkdirSync(dirname(file), { recursive: true });
  }

  function log(entryLevel: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) return;

    const entry = formatLogEntry(now(), entryLevel, message, context);

    if (toConsole) {
      getConsoleMethod(entryLevel)(entry);
    }

    if (file) {
      try {
        appendFileSync(file, entry + "\n");
      } catch (err) {
        // Log file failures never propagate to the caller.
        console.error(`Failed to write to log file: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger({ console: false });
