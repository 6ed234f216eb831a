/**
 * Application logging: structured JSONL file logger and console interceptor.
 *
 * 1. createAppLogger writes structured JSONL entries to daily files under
 *    <data_dir>/logs/YYYY-MM-DD.jsonl, one JSON object per line with
 *    timestamp, level, message and optional args. Entries below the
 *    configured minimum level are dropped.
 *
 * 2. installConsoleFileLogging replaces console.log/info/warn/error/debug so
 *    every call writes a timestamped line to stdio and mirrors it to the
 *    JSONL logger. Modules log through console.* with a bracketed tag
 *    ("[pages] ...", "[transfer] ...") and never import the logger directly.
 *
 * installLogging does both from a loaded Config, applying logging.level to
 * the file and to stdio. Call it once at process start.
 */

import fs from "node:fs";
import path from "node:path";
import util from "node:util";
import { stdout, stderr } from "node:process";
import type { Config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  args?: unknown[];
}

export interface AppLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface AppLoggerOptions {
  /** Minimum level written to the file. Default: "debug". */
  level?: LogLevel;
}

// Prevents double-wrapping console methods when installed more than once.
let consoleFileLoggingInstalled = false;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

function toDateString(date: Date): string {
  return date.toISOString().split("T")[0];
}

function toSerializable(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
  }
  return value;
}

export function createAppLogger(dataDir: string, options: AppLoggerOptions = {}): AppLogger {
  const logsDir = path.join(dataDir, "logs");
  fs.mkdirSync(logsDir, { recursive: true });
  const minRank = LOG_LEVELS.indexOf(options.level ?? "debug");

  function append(level: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS.indexOf(level) < minRank) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(args.length > 0 ? { args: args.map(toSerializable) } : {}),
    } satisfies LogEntry);

    const filePath = path.join(logsDir, `${toDateString(new Date())}.jsonl`);
    fs.appendFileSync(filePath, `${line}\n`, "utf-8");
  }

  return {
    debug(message: string, ...args: unknown[]): void {
      append("debug", message, args);
    },
    info(message: string, ...args: unknown[]): void {
      append("info", message, args);
    },
    warn(message: string, ...args: unknown[]): void {
      append("warn", message, args);
    },
    error(message: string, ...args: unknown[]): void {
      append("error", message, args);
    },
  };
}

/**
 * Log page HTML or command JSON at debug level, only when
 * `logging.log_content` is on.
 */
export function logContent(enabled: boolean, label: string, content: string): void {
  if (!enabled) return;
  console.debug(`[content] ${label} (${content.length} chars)\n${content}`);
}

// ---------------------------------------------------------------------------
// Stdio formatting
// ---------------------------------------------------------------------------

/** ANSI color codes, used only when the stream is a TTY. */
const ANSI = {
  reset:  "\x1b[0m",
  dim:    "\x1b[2m",
  yellow: "\x1b[33m",
  red:    "\x1b[31m",
  cyan:   "\x1b[36m",
} as const;

const LEVEL_PREFIX: Record<LogLevel, string> = {
  debug: "DBG",
  info:  "INF",
  warn:  "WRN",
  error: "ERR",
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: ANSI.dim,
  info:  ANSI.cyan,
  warn:  ANSI.yellow,
  error: ANSI.red,
};

/**
 * Format a log line for stdio. Escape sequences are only emitted when the
 * target stream is a TTY, so piped output stays plain text.
 */
export function formatLine(level: LogLevel, message: string, isTty: boolean, now = new Date()): string {
  const ts = now.toISOString().slice(0, 19).replace("T", " ");
  const prefix = LEVEL_PREFIX[level];

  if (!isTty) {
    return `${ts} [${prefix}] ${message}`;
  }

  return `${ANSI.dim}${ts}${ANSI.reset} ${LEVEL_COLOR[level]}[${prefix}]${ANSI.reset} ${message}`;
}

// ---------------------------------------------------------------------------
// Console intercept
// ---------------------------------------------------------------------------

/**
 * Intercept console.* calls to write timestamped lines to stdio and mirror
 * them to the JSONL file logger. Replaces the raw methods permanently.
 * Lines below `level` are not written to stdio.
 */
export function installConsoleFileLogging(logger: AppLogger, level: LogLevel = "debug"): void {
  if (consoleFileLoggingInstalled) {
    return;
  }
  consoleFileLoggingInstalled = true;

  const stdoutTty = stdout.isTTY ?? false;
  const stderrTty = stderr.isTTY ?? false;
  const minRank = LOG_LEVELS.indexOf(level);

  function makeInterceptor(entryLevel: LogLevel, stream: NodeJS.WriteStream, isTty: boolean) {
    return (...args: unknown[]): void => {
      const message = util.format(...args);
      if (LOG_LEVELS.indexOf(entryLevel) >= minRank) {
        stream.write(formatLine(entryLevel, message, isTty) + "\n");
      }
      logger[entryLevel](message);
    };
  }

  console.log   = makeInterceptor("info",  stdout, stdoutTty);
  console.info  = makeInterceptor("info",  stdout, stdoutTty);
  console.debug = makeInterceptor("debug", stdout, stdoutTty);
  console.warn  = makeInterceptor("warn",  stderr, stderrTty);
  console.error = makeInterceptor("error", stderr, stderrTty);
}

export function installLogging(config: Pick<Config, "data_dir" | "logging">): AppLogger {
  const logger = createAppLogger(config.data_dir, { level: config.logging.level });
  installConsoleFileLogging(logger, config.logging.level);
  return logger;
}
