/**
 * Diagnostic logger. Everything goes to stderr so command output on stdout
 * stays clean.
 *
 *   LOG_LEVEL   debug | warn | error (default warn)
 *   LOG_FORMAT  json for one JSON object per line, text otherwise
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  warn: 1,
  error: 2,
};

export type LogData = Record<string, unknown>;

/** Which program and command a message belongs to. */
export interface LogContext {
  program?: string;
  command?: string;
}

export interface Logger {
  debug(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  /** Logger named `<parent>:<name>` with the parent's level and context. */
  child(name: string): Logger;
  setContext(ctx: LogContext): void;
  /** Start a timer. The returned function logs the elapsed ms at debug level and returns it. */
  time(label: string): () => number;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  context: LogContext;
  message: string;
  data?: LogData;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

function levelFromEnv(): LogLevel {
  const value = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(value) ? value : "warn";
}

function hasData(data: LogData | undefined): data is LogData {
  return data !== undefined && Object.keys(data).length > 0;
}

function formatText(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}]`, `[${entry.level.toUpperCase()}]`, `[${entry.module}]`];
  const scope = [entry.context.program, entry.context.command].filter(Boolean).join(" ");
  if (scope) parts.push(`(${scope})`);
  parts.push(entry.message);
  if (hasData(entry.data)) parts.push(JSON.stringify(entry.data));
  return parts.join(" ");
}

function formatJson(entry: LogEntry): string {
  const { context, data, ...head } = entry;
  return JSON.stringify({ ...head, ...context, ...(hasData(data) ? data : {}) });
}

export function createLogger(
  name: string,
  minLevel: LogLevel = levelFromEnv(),
  parentContext: LogContext = {},
): Logger {
  const threshold = LEVEL_PRIORITY[minLevel];
  const format = process.env.LOG_FORMAT?.toLowerCase() === "json" ? formatJson : formatText;
  let context: LogContext = { ...parentContext };

  function log(level: LogLevel, message: string, data?: LogData): void {
    if (LEVEL_PRIORITY[level] < threshold) return;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: name,
      context,
      message,
      data,
    };
    console.error(format(entry));
  }

  return {
    debug: (message, data) => log("debug", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),
    child: (childName) => createLogger(`${name}:${childName}`, minLevel, context),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { durationMs });
        return durationMs;
      };
    },
  };
}
