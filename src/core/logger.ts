/**
 * @file src/core/logger.ts
 * @summary Centralised logging abstraction. Every message is prefixed with "[flashcards]" and
 * its level. Supports four severity levels (debug, info, warn, error) plus a "silent" mode,
 * and a `swallow` helper for best-effort paths that logs at debug level. All output goes to
 * stderr: stdout carries the protocol stream.
 *
 * @exports
 *   - LogLevel — type union of log severity levels
 *   - LOG_LEVELS — every accepted level, lowest first
 *   - isLogLevel — type guard for LogLevel strings
 *   - log — singleton logger object with debug/info/warn/error/swallow methods
 */

const PREFIX = "[flashcards]";

// Bind once so call-sites don't trigger the no-console rule.
const _write = globalThis.console.error.bind(globalThis.console);

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = "info";

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && (LOG_LEVELS as readonly string[]).includes(v);
}

export const log = {
  /** Set the minimum log level.  "silent" suppresses everything. */
  setLevel(level: LogLevel) {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /** Verbose detail — silenced unless level is "debug". */
  debug(...args: unknown[]) {
    if (shouldLog("debug")) _write(PREFIX, "DEBUG", ...args);
  },

  /** General informational messages. */
  info(...args: unknown[]) {
    if (shouldLog("info")) _write(PREFIX, "INFO", ...args);
  },

  /** Unexpected-but-recoverable situations. */
  warn(...args: unknown[]) {
    if (shouldLog("warn")) _write(PREFIX, "WARN", ...args);
  },

  /** Genuine errors that need attention. */
  error(...args: unknown[]) {
    if (shouldLog("error")) _write(PREFIX, "ERROR", ...args);
  },

  /**
   * For best-effort cleanup whose failure must not mask the original error.
   * Logs at **debug** level so the error is not silently lost.
   *
   * ```ts
   * try { await rm(tmpPath); } catch (e) { log.swallow("remove temp file", e); }
   * ```
   */
  swallow(context: string, err?: unknown) {
    if (shouldLog("debug")) {
      _write(PREFIX, "DEBUG", `[swallowed] ${context}:`, err);
    }
  },
};
