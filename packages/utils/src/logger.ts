/**
 * Levelled console logger
 *
 * Controlled by the `LOG_LEVEL` environment variable
 * (ERROR | WARN | LOG | INFO | DEBUG, default INFO).
 * Only records at or above the current level are written.
 *
 * Usage:
 * ```ts
 * logger.info("feed connected", { label: "btcusdt@aggTrade" });
 * const log = logger.child("hub");
 * log.warn("send failed", { subscriberId });
 * ```
 */

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
  LOG = "LOG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  scope?: string;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

type LogFn = (...args: unknown[]) => void;

export interface ScopedLogger {
  log: LogFn;
  info: LogFn;
  debug: LogFn;
  warn: LogFn;
  error: LogFn;
}

// Lower number = higher priority
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

const isLogLevel = (value: string): value is LogLevel => Object.values<string>(LogLevel).includes(value);

const getCurrentLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel !== undefined && isLogLevel(envLevel)) {
    return envLevel;
  }
  return LogLevel.INFO;
};

const shouldLog = (level: LogLevel): boolean => {
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[getCurrentLogLevel()];
};

const colorize = (message: string, level: LogLevel): string => {
  if (process.env.NO_COLOR !== undefined) return message;

  const colors = {
    [LogLevel.ERROR]: "\x1b[31m", // Red
    [LogLevel.WARN]: "\x1b[33m", // Yellow
    [LogLevel.INFO]: "\x1b[36m", // Cyan
    [LogLevel.DEBUG]: "\x1b[32m", // Green
    [LogLevel.LOG]: null,
  };

  const color = colors[level];
  return color === null ? message : `${color}${message}\x1b[0m`;
};

const formatHeader = (level: LogLevel, scope: string | undefined): string => {
  const scopeTag = scope === undefined ? "" : ` [${scope}]`;
  return colorize(`[${new Date().toISOString()}] [${level}]${scopeTag}`, level);
};

const stringify = (value: unknown): string => {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value);
};

const isFieldsObject = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !(value instanceof Error) && !Array.isArray(value);

// Common case: logger.info("msg", { ...fields })
function toFields(args: unknown[]): Record<string, string> | undefined {
  const maybeFields = args[1];
  if (!isFieldsObject(maybeFields)) return undefined;

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(maybeFields)) {
    out[k] = v instanceof Error ? v.message : stringify(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function toMessage(args: unknown[]): string {
  if (args.length === 0) return "";
  const [first, ...rest] = args;
  const tail = isFieldsObject(rest[0]) ? rest.slice(1) : rest;
  return [stringify(first), ...tail.map(stringify)].join(" ").trim();
}

let sink: LogSink | null = null;

function emit(level: LogLevel, scope: string | undefined, args: unknown[], consoleFn: LogFn): void {
  if (!shouldLog(level)) return;

  if (sink) {
    sink.write({
      tsMs: Date.now(),
      level,
      scope,
      message: toMessage(args),
      fields: toFields(args),
    });
    return;
  }

  consoleFn(formatHeader(level, scope), ...args);
}

const scoped = (scope: string | undefined): ScopedLogger => ({
  log: (...args) => emit(LogLevel.LOG, scope, args, console.log),
  info: (...args) => emit(LogLevel.INFO, scope, args, console.info),
  debug: (...args) => emit(LogLevel.DEBUG, scope, args, console.log),
  warn: (...args) => emit(LogLevel.WARN, scope, args, console.warn),
  error: (...args) => emit(LogLevel.ERROR, scope, args, console.error),
});

export const logger = {
  ...scoped(undefined),
  /**
   * Logger whose records carry a fixed scope (e.g. "hub", "feed:btcusdt@markPrice")
   */
  child: (scope: string): ScopedLogger => scoped(scope),
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  getLevels: (): LogLevel[] => Object.values(LogLevel),
  /**
   * Route records to a custom sink instead of the console.
   */
  setSink: (next: LogSink): void => {
    sink = next;
  },
  clearSink: (): void => {
    sink = null;
  },
};
