/**
 * Structured logger with JSON output support.
 *
 * - LOG_LEVEL selects the minimum level (debug, info, warn, error, silent)
 * - LOG_FORMAT=json switches to one JSON object per line
 * - store_id, trace_id and session_id tie entries to one history store
 * - Child loggers inherit the parent's context and level
 *
 * Entries go to stderr unless a sink is installed with `setLogSink`.
 */

import { performance } from "node:perf_hooks";
import { shortId } from "../utils/uuid.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type EntryLevel = Exclude<LogLevel, "silent">;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LogContext {
  storeId?: string;
  traceId?: string;
  sessionId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Merge persistent context fields (storeId, traceId, ...). */
  setContext(ctx: LogContext): void;
  /** Start a timer; the returned function logs and returns the elapsed ms. */
  time(label: string): () => number;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  console.error(line);
};

let sink: LogSink = stderrSink;

/** Redirect every logger's output. Pass nothing to restore stderr. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? stderrSink;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = process.env.LOG_LEVEL?.toLowerCase() ?? "";
  return isLogLevel(env) ? env : "info";
}

function isJsonFormat(): boolean {
  return process.env.LOG_FORMAT?.toLowerCase() === "json";
}

function hasData(data?: Record<string, unknown>): data is Record<string, unknown> {
  return data !== undefined && Object.keys(data).length > 0;
}

function formatJson(
  level: EntryLevel,
  scope: string,
  context: LogContext,
  message: string,
  data?: Record<string, unknown>,
): string {
  const entry: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    module: scope,
    message,
  };
  if (context.storeId) entry.store_id = context.storeId;
  if (context.traceId) entry.trace_id = context.traceId;
  if (context.sessionId) entry.session_id = context.sessionId;
  if (hasData(data)) Object.assign(entry, data);
  return JSON.stringify(entry);
}

function formatText(
  level: EntryLevel,
  scope: string,
  context: LogContext,
  message: string,
  data?: Record<string, unknown>,
): string {
  const tag = context.storeId ? `${scope}#${shortId(context.storeId)}` : scope;
  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${tag}] ${message}`;
  return hasData(data) ? `${line} ${JSON.stringify(data)}` : line;
}

export function createLogger(
  name: string,
  minLevel?: LogLevel,
  parentContext?: LogContext,
): Logger {
  const level = resolveMinLevel(minLevel);
  const minPriority = LEVEL_PRIORITY[level];
  const format = isJsonFormat() ? formatJson : formatText;
  let context: LogContext = { ...parentContext };

  function log(entryLevel: EntryLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[entryLevel] < minPriority) return;
    sink(format(entryLevel, name, context, message, data));
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) => createLogger(`${name}:${childName}`, level, { ...context }),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
