/**
 * @module exchange-logger
 * @description Type definitions for the structured logger that carries exchange records.
 */

// ─── Log Levels ──────────────────────────────────────────────────

export const LogLevel = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
  SILENT: Infinity,
} as const;

export type LogLevelName = keyof typeof LogLevel;

/** Numeric log level value */
export type LogLevelValue = (typeof LogLevel)[LogLevelName];

/** Map from level name (lowercase) to numeric value */
export const LogLevelNameMap: Record<string, number> = Object.fromEntries(
  Object.entries(LogLevel).map(([k, v]) => [k.toLowerCase(), v]),
);

/** Map from numeric value to level name */
export const LogLevelValueMap: Record<number, LogLevelName> =
  Object.fromEntries(
    Object.entries(LogLevel)
      .filter(([, v]) => Number.isFinite(v))
      .map(([k, v]) => [v, k as LogLevelName]),
  ) as Record<number, LogLevelName>;

// ─── Log Entry ───────────────────────────────────────────────────

export interface LogEntry<TMeta = Record<string, unknown>> {
  /** Unique log ID */
  id: string;
  /** Numeric log level */
  level: number;
  /** Human-readable level name */
  levelName: LogLevelName;
  /** Log message */
  message: string;
  /** Unix epoch timestamp (ms) */
  timestamp: number;
  /** User-defined structured metadata */
  meta: Partial<TMeta>;
  /** Bound context from child logger (e.g. logger name, service) */
  context?: Record<string, unknown>;
  /** Error information */
  error?: LogError;
}

export interface LogError {
  message: string;
  stack?: string;
  code?: string;
  name?: string;
  /** Nested cause chain (ES2022 Error.cause support) */
  cause?: LogError;
}

// ─── Transformer ─────────────────────────────────────────────────

/**
 * A Transformer receives finished log entries and renders them
 * to a destination (console, JSON line, Datadog intake, etc.).
 *
 * `transform()` can return a Promise; the pipeline never awaits it.
 */
export interface Transformer<TMeta = Record<string, unknown>> {
  /** Unique name for this transformer */
  name: string;
  /** Optional per-transformer level filter */
  level?: LogLevelName;
  /** Process a log entry */
  transform(entry: LogEntry<TMeta>): void | Promise<void>;
  /** Flush any buffered entries */
  flush?(): void | Promise<void>;
  /** Graceful shutdown */
  close?(): void | Promise<void>;
}

// ─── Middleware ───────────────────────────────────────────────────

/**
 * Middleware intercepts log entries before they reach transformers.
 * Used for masking, edge filtering, enrichment, etc.
 *
 * Call `next(entry)` to continue the pipeline.
 * Omit `next()` to drop the entry.
 */
export type LogMiddleware<TMeta = Record<string, unknown>> = (
  entry: LogEntry<TMeta>,
  next: (entry: LogEntry<TMeta>) => void,
) => void;

// ─── Timer Result ────────────────────────────────────────────────

export interface TimerResult<TMeta = Record<string, unknown>> {
  /** End the timer and log the duration */
  done(message: string, meta?: Partial<TMeta>): void;
  /** Get elapsed time in ms without logging */
  elapsed(): number;
}

// ─── Logger Options ──────────────────────────────────────────────

export interface LoggerOptions<TMeta = Record<string, unknown>> {
  /** Minimum log level (default: INFO) */
  level?: LogLevelName;
  /** Transformers for log output */
  transports?: Transformer<TMeta>[];
  /** Middleware pipeline */
  middleware?: LogMiddleware<TMeta>[];
  /** Default bound context for all log entries */
  context?: Record<string, unknown>;
  /**
   * When to include error stack traces:
   * - `true` — always include
   * - `false` — never include
   * - `LogLevelName` — include at this level and above
   * Default: 'ERROR'
   */
  includeStack?: boolean | LogLevelName;
  /** Custom timestamp function (default: Date.now) */
  timestamp?: () => number;
  /**
   * Custom ID generator function.
   * Default: `crypto.randomUUID()`.
   * Set to `false` to disable ID generation entirely.
   */
  idGenerator?: (() => string) | false;
}

// ─── Logger Interface ────────────────────────────────────────────

export interface Logger<TMeta = Record<string, unknown>> {
  trace(message: string, meta?: Partial<TMeta>): void;
  debug(message: string, meta?: Partial<TMeta>): void;
  info(message: string, meta?: Partial<TMeta>): void;
  warn(message: string, meta?: Partial<TMeta>): void;
  error(
    message: string,
    metaOrError?: Partial<TMeta> | Error,
    error?: Error,
  ): void;
  fatal(
    message: string,
    metaOrError?: Partial<TMeta> | Error,
    error?: Error,
  ): void;

  /** Create a child logger with additional bound context */
  child(context: Record<string, unknown>): Logger<TMeta>;

  /** Add a transformer at runtime */
  addTransport(transport: Transformer<TMeta>): void;
  /** Remove a transformer by name */
  removeTransport(name: string): void;
  /** Add middleware at runtime */
  addMiddleware(middleware: LogMiddleware<TMeta>): void;
  /** Remove middleware by reference */
  removeMiddleware(middleware: LogMiddleware<TMeta>): void;

  /** Change the minimum log level at runtime */
  setLevel(level: LogLevelName): void;
  /** Get the current minimum log level */
  getLevel(): LogLevelName;
  /** Check if a given level would produce output */
  isLevelEnabled(level: LogLevelName): boolean;

  /** Start a timer — call `.done(msg)` to log elapsed duration */
  startTimer(level?: LogLevelName): TimerResult<TMeta>;

  /** Flush all transformers */
  flush(): Promise<void>;
  /** Close all transformers gracefully */
  close(): Promise<void>;
}
