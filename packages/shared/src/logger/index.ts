/**
 * Structured logger writing to stderr, so stdout stays free for command output.
 *
 * - JSON lines when LOG_FORMAT=json, text lines otherwise
 * - Level filtering via LOG_LEVEL or an explicit level
 * - command and invocation_id fields for correlating one dispatch
 * - Child loggers inherit context
 */

import { performance } from "node:perf_hooks";

export const logLevels = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof logLevels)[number];
export const logFormats = ["text", "json"] as const;
export type LogFormat = (typeof logFormats)[number];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  command?: string;
  invocationId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Set persistent context fields (command, invocationId, etc.) */
  setContext(ctx: LogContext): void;
  /** Start a timer. Returns a stop function that logs elapsed time and returns duration in ms. */
  time(label: string): () => number;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: LogContext;
}

export function isLogLevel(value: string): value is LogLevel {
  return logLevels.some((level) => level === value);
}

function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "info";
}

function resolveFormat(explicit?: LogFormat): LogFormat {
  if (explicit) return explicit;
  return process.env.LOG_FORMAT?.toLowerCase() === "json" ? "json" : "text";
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const minLevel = resolveMinLevel(options.level);
  const format = resolveFormat(options.format);
  const minPriority = LEVEL_PRIORITY[minLevel];
  let context: LogContext = { ...options.context };

  function log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const timestamp = new Date().toISOString();

    if (format === "json") {
      const entry: Record<string, unknown> = {
        timestamp,
        level,
        module: name,
        message,
      };
      if (context.command) entry.command = context.command;
      if (context.invocationId) entry.invocation_id = context.invocationId;
      if (data && Object.keys(data).length > 0) {
        Object.assign(entry, data);
      }
      console.error(JSON.stringify(entry));
    } else {
      const scope = context.command ? `[${name}] [${context.command}]` : `[${name}]`;
      const prefix = `[${timestamp}] [${level.toUpperCase()}] ${scope}`;
      if (data && Object.keys(data).length > 0) {
        console.error(`${prefix} ${message} ${JSON.stringify(data)}`);
      } else {
        console.error(`${prefix} ${message}`);
      }
    }
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) =>
      createLogger(`${name}:${childName}`, {
        level: minLevel,
        format,
        context: { ...context },
      }),
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
