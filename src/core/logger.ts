/**
 * Tickframe Logger
 *
 * Structured logger that prefixes output with its scope (a plugin name or
 * "runtime"). Entries below the configured level are dropped. A sink can
 * replace console output so a host can route entries to its own surface.
 * Keeps the core dependency-free (no external logging library).
 */

import type { Logger } from "../plugins/api.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogEntry {
  readonly level: Exclude<LogLevel, "silent">;
  readonly scope: string;
  readonly message: string;
  readonly data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Minimum level that is emitted (default "info") */
  level?: LogLevel;
  /** Replaces console output */
  sink?: LogSink;
}

export function consoleSink(entry: LogEntry): void {
  const prefix = `[${entry.scope}]`;
  const write =
    entry.level === "debug"
      ? console.debug
      : entry.level === "info"
        ? console.info
        : entry.level === "warn"
          ? console.warn
          : console.error;

  if (entry.data) write(prefix, entry.message, entry.data);
  else write(prefix, entry.message);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;

  const emit = (level: LogEntry["level"], message: string, data?: Record<string, unknown>) => {
    if (LEVEL_RANK[level] < threshold) return;
    sink(data ? { level, scope, message, data } : { level, scope, message });
  };

  return {
    debug(message, data) {
      emit("debug", message, data);
    },
    info(message, data) {
      emit("info", message, data);
    },
    warn(message, data) {
      emit("warn", message, data);
    },
    error(message, data) {
      emit("error", message, data);
    },
  };
}
