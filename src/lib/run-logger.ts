/**
 * Per-run logging for discovery.
 *
 * Every entry goes to the console immediately and into an in-memory buffer.
 * When a sink is attached (Redis in production), flush() appends the pending
 * entries to the run's log list.
 *
 * Usage:
 *   const logs = redisRunLogs(redis);
 *   const logger = createRunLogger(runId, { sink: logs.sink });
 *   logger.info('Stream finished', { pages: 12 });
 *   await logger.flush();
 */

import { resultString, type UpstashClient } from "./upstash.js";

export interface LogEntry {
  ts: number;
  level: "debug" | "info" | "warn" | "error";
  msg: string;
  data?: unknown;
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

export interface RunLogger extends Logger {
  readonly runId: string;
  /** Everything logged during the run, capped at the last MAX_LOG_ENTRIES */
  readonly entries: readonly LogEntry[];
  child(tag: string): Logger;
  flush(): Promise<void>;
}

export type LogSink = (runId: string, entries: LogEntry[]) => Promise<void>;
export type LogReader = (runId: string) => Promise<LogEntry[]>;

/** Where run logs are written and read back from */
export type RunLogStore = {
  sink: LogSink;
  read: LogReader;
};

export type RunLoggerOptions = {
  prefix?: string;
  sink?: LogSink;
  /** Skip console output (tests) */
  quiet?: boolean;
  now?: () => number;
};

// TTL for logs - 48 hours
export const LOG_TTL_SECONDS = 48 * 60 * 60;
export const MAX_LOG_ENTRIES = 500;

export function logKey(runId: string): string {
  return `logs:run:${runId}`;
}

function writeConsole(level: LogEntry["level"], msg: string, data?: unknown) {
  const line = `[${level.toUpperCase()}] ${msg}`;
  const method = level === "debug" ? "log" : level;
  if (data !== undefined) {
    console[method](line, data);
  } else {
    console[method](line);
  }
}

/**
 * Console-only logger with a fixed tag, for code that runs outside a discovery run.
 */
export function createConsoleLogger(tag: string): Logger {
  const log = (level: LogEntry["level"]) => (msg: string, data?: unknown) =>
    writeConsole(level, `[${tag}] ${msg}`, data);
  return { debug: log("debug"), info: log("info"), warn: log("warn"), error: log("error") };
}

export function createRunLogger(runId: string, options: RunLoggerOptions = {}): RunLogger {
  const prefix = options.prefix || "";
  const now = options.now ?? Date.now;
  const entries: LogEntry[] = [];
  let pending: LogEntry[] = [];

  function record(level: LogEntry["level"], msg: string, data?: unknown) {
    const entry: LogEntry = {
      ts: now(),
      level,
      msg,
      data: data !== undefined ? sanitizeData(data) : undefined,
    };
    entries.push(entry);
    if (entries.length > MAX_LOG_ENTRIES) entries.shift();
    if (options.sink) pending.push(entry);
    if (!options.quiet) writeConsole(level, msg, data);
  }

  function tagged(tag: string): Logger {
    const fmt = (msg: string) => (tag ? `[${tag}] ${msg}` : msg);
    return {
      debug: (msg, data) => record("debug", fmt(msg), data),
      info: (msg, data) => record("info", fmt(msg), data),
      warn: (msg, data) => record("warn", fmt(msg), data),
      error: (msg, data) => record("error", fmt(msg), data),
    };
  }

  const root = tagged(prefix);

  return {
    runId,
    entries,
    ...root,
    child: (tag: string) => tagged(prefix ? `${prefix}:${tag}` : tag),
    flush: async () => {
      if (!options.sink || pending.length === 0) return;
      const toFlush = pending;
      pending = [];
      try {
        await options.sink(runId, toFlush);
      } catch (err) {
        // keep them for the next flush
        pending = toFlush.concat(pending);
        throw err;
      }
    },
  };
}

function parseEntries(raw: string | null): LogEntry[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter(isLogEntry) : [];
  } catch {
    return [];
  }
}

function isLogEntry(value: unknown): value is LogEntry {
  if (!value || typeof value !== "object") return false;
  return "ts" in value && typeof value.ts === "number" && "msg" in value && typeof value.msg === "string";
}

/**
 * Sink that appends entries to `logs:run:{runId}`, keeping the newest 500 for 48 hours.
 */
function redisLogSink(redis: UpstashClient, ttlSeconds = LOG_TTL_SECONDS): LogSink {
  return async (runId, toFlush) => {
    const key = logKey(runId);
    const logs = parseEntries(resultString(await redis.call("GET", key)));
    logs.push(...toFlush);
    const kept = logs.length > MAX_LOG_ENTRIES ? logs.slice(-MAX_LOG_ENTRIES) : logs;
    await redis.call("SET", key, JSON.stringify(kept), "EX", ttlSeconds.toString());
  };
}

export function redisRunLogs(redis: UpstashClient, ttlSeconds = LOG_TTL_SECONDS): RunLogStore {
  return {
    sink: redisLogSink(redis, ttlSeconds),
    read: async (runId) => parseEntries(resultString(await redis.call("GET", logKey(runId)))),
  };
}

/**
 * In-process run logs for when Redis is not configured. Only the newest
 * `maxRuns` runs are kept.
 */
export function memoryRunLogs(maxRuns = 50): RunLogStore {
  const runs = new Map<string, LogEntry[]>();

  return {
    sink: async (runId, toFlush) => {
      const logs = runs.get(runId) ?? [];
      logs.push(...toFlush);
      runs.delete(runId);
      runs.set(runId, logs.length > MAX_LOG_ENTRIES ? logs.slice(-MAX_LOG_ENTRIES) : logs);

      for (const oldest of runs.keys()) {
        if (runs.size <= maxRuns) break;
        runs.delete(oldest);
      }
    },
    read: async (runId) => [...(runs.get(runId) ?? [])],
  };
}

/**
 * Keep log payloads small: long strings are clipped, arrays summarized,
 * nesting cut off at depth 4.
 */
export function sanitizeData(data: unknown, depth = 0): unknown {
  if (depth > 3) return "[depth limit]";
  if (data === null || data === undefined) return data;

  if (typeof data === "string") {
    return data.length > 500 ? data.slice(0, 500) + "...[truncated]" : data;
  }

  if (typeof data === "number" || typeof data === "boolean") return data;

  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }

  if (Array.isArray(data)) {
    if (data.length > 20) {
      return [...data.slice(0, 20).map((d) => sanitizeData(d, depth + 1)), `...(${data.length - 20} more)`];
    }
    return data.map((d) => sanitizeData(d, depth + 1));
  }

  if (typeof data === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(data)) {
      out[k] = sanitizeData(v, depth + 1);
    }
    return out;
  }

  return String(data);
}
