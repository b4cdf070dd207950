/**
 * Console-backed logger shared by the client and the runner.
 *
 * Lines look like `[crawlerverse:runner] Rate limited. Sleeping 5 seconds. game=g1 turn=3`.
 */

import { LOG_LEVEL_ENV, getEnvValue } from "./env.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const value = (raw ?? "").trim().toLowerCase();
  return isLogLevel(value) ? value : fallback;
}

export function formatContext(context?: LogContext): string {
  if (!context) return "";
  const parts: string[] = [];
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    parts.push(`${key}=${value}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export function createLogger(
  scope?: string,
  options: { level?: LogLevel; sink?: LogSink } = {},
): Logger {
  const level = options.level ?? parseLogLevel(getEnvValue(LOG_LEVEL_ENV));
  const sink = options.sink ?? consoleSink;
  const prefix = scope ? `[crawlerverse:${scope}]` : "[crawlerverse]";

  const emit = (target: Exclude<LogLevel, "silent">, message: string, context?: LogContext) => {
    if (LEVEL_RANK[target] < LEVEL_RANK[level]) return;
    sink(target, `${prefix} ${message}${formatContext(context)}`);
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
  };
}
