/**
 * @module exchange-logger
 * @description Core Logger class — the sink every exchange record flows through.
 *
 * @example Basic usage
 * ```ts
 * import { createLogger, consoleTransport } from 'exchange-logger';
 *
 * const logger = createLogger({
 *   level: 'INFO',
 *   transports: [consoleTransport()],
 * });
 *
 * logger.info('Server started', { port: 9000 });
 * ```
 *
 * @example Child logger with bound context
 * ```ts
 * const httpLog = logger.child({ logger: 'exchange-logger' });
 * httpLog.info('INCOMING (start): GET /');
 * ```
 */

import { randomUUID } from "node:crypto";
import { serializeError } from "./errors.js";
import { resolveLevel, shouldIncludeStack, shouldLog } from "./levels.js";
import { composeMiddleware, fanOutToTransformers } from "./pipeline.js";
import {
  type LogEntry,
  type Logger,
  type LoggerOptions,
  LogLevel,
  type LogLevelName,
  LogLevelValueMap,
  type LogMiddleware,
  type TimerResult,
  type Transformer,
} from "./types.js";

type EmittingLevel = Exclude<LogLevelName, "SILENT">;

// ─── Logger Implementation ──────────────────────────────────────

class LoggerImpl<TMeta = Record<string, unknown>> implements Logger<TMeta> {
  private _level: number;
  private _transformers: Transformer<TMeta>[];
  private _middlewareList: LogMiddleware<TMeta>[];
  private _pipeline: (entry: LogEntry<TMeta>) => void;
  private _context: Record<string, unknown>;
  private _includeStack: boolean | LogLevelName;
  private _timestampFn: () => number;
  private _idFn: (() => string) | false;

  constructor(options: LoggerOptions<TMeta> = {}) {
    this._level = resolveLevel(options.level ?? "INFO");
    this._transformers = [...(options.transports ?? [])];
    this._middlewareList = [...(options.middleware ?? [])];
    this._context = options.context ? { ...options.context } : {};
    this._includeStack = options.includeStack ?? "ERROR";
    this._timestampFn = options.timestamp ?? Date.now;
    this._idFn =
      options.idGenerator !== undefined ? options.idGenerator : randomUUID;
    this._pipeline = this._buildPipeline();
  }

  // ─── Log Methods ────────────────────────────────────────────

  trace(message: string, meta?: Partial<TMeta>): void {
    this._logWithContext("TRACE", message, this._context, meta);
  }

  debug(message: string, meta?: Partial<TMeta>): void {
    this._logWithContext("DEBUG", message, this._context, meta);
  }

  info(message: string, meta?: Partial<TMeta>): void {
    this._logWithContext("INFO", message, this._context, meta);
  }

  warn(message: string, meta?: Partial<TMeta>): void {
    this._logWithContext("WARN", message, this._context, meta);
  }

  error(
    message: string,
    metaOrError?: Partial<TMeta> | Error,
    error?: Error,
  ): void {
    this._logErrorLevel("ERROR", message, this._context, metaOrError, error);
  }

  fatal(
    message: string,
    metaOrError?: Partial<TMeta> | Error,
    error?: Error,
  ): void {
    this._logErrorLevel("FATAL", message, this._context, metaOrError, error);
  }

  // ─── Child Logger ───────────────────────────────────────────

  child(context: Record<string, unknown>): Logger<TMeta> {
    return new ChildLoggerImpl<TMeta>(this, { ...this._context, ...context });
  }

  // ─── Dynamic Configuration ─────────────────────────────────

  addTransport(transport: Transformer<TMeta>): void {
    this._transformers.push(transport);
  }

  removeTransport(name: string): void {
    this._transformers = this._transformers.filter((t) => t.name !== name);
  }

  addMiddleware(middleware: LogMiddleware<TMeta>): void {
    this._middlewareList.push(middleware);
    this._pipeline = this._buildPipeline();
  }

  removeMiddleware(middleware: LogMiddleware<TMeta>): void {
    this._middlewareList = this._middlewareList.filter((m) => m !== middleware);
    this._pipeline = this._buildPipeline();
  }

  // ─── Level Control ─────────────────────────────────────────

  setLevel(level: LogLevelName): void {
    this._level = resolveLevel(level);
  }

  getLevel(): LogLevelName {
    return LogLevelValueMap[this._level] ?? "INFO";
  }

  isLevelEnabled(level: LogLevelName): boolean {
    return resolveLevel(level) >= this._level;
  }

  // ─── Timer ─────────────────────────────────────────────────

  startTimer(level: LogLevelName = "INFO"): TimerResult<TMeta> {
    const start = performance.now();
    return {
      done: (message: string, meta?: Partial<TMeta>) => {
        const durationMs = Math.round(performance.now() - start);
        const emitting = level === "SILENT" ? "INFO" : level;
        this._logWithContext(
          emitting,
          `${message} (${durationMs}ms)`,
          this._context,
          meta,
        );
      },
      elapsed: () => Math.round(performance.now() - start),
    };
  }

  // ─── Lifecycle ──────────────────────────────────────────────

  async flush(): Promise<void> {
    await Promise.all(this._transformers.map((t) => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this._transformers.map((t) => t.close?.()));
  }

  // ─── Internal ───────────────────────────────────────────────

  /** @internal */
  _logErrorLevel(
    levelName: EmittingLevel,
    message: string,
    context: Record<string, unknown>,
    metaOrError?: Partial<TMeta> | Error,
    error?: Error,
  ): void {
    if (metaOrError instanceof Error) {
      this._logWithContext(levelName, message, context, undefined, metaOrError);
    } else {
      this._logWithContext(levelName, message, context, metaOrError, error);
    }
  }

  /** @internal — used by child loggers to inject bound context */
  _logWithContext(
    levelName: EmittingLevel,
    message: string,
    context: Record<string, unknown>,
    meta?: Partial<TMeta>,
    error?: Error,
  ): void {
    const level = LogLevel[levelName];
    if (!shouldLog(level, this._level)) return;

    const entry: LogEntry<TMeta> = {
      id: this._idFn ? this._idFn() : "",
      level,
      levelName,
      message,
      timestamp: this._timestampFn(),
      meta: meta ?? {},
      context: Object.keys(context).length > 0 ? context : undefined,
    };

    if (error) {
      entry.error = serializeError(
        error,
        shouldIncludeStack(level, this._includeStack),
      );
    }

    this._pipeline(entry);
  }

  private _buildPipeline(): (entry: LogEntry<TMeta>) => void {
    return composeMiddleware(this._middlewareList, (entry) => {
      fanOutToTransformers(entry, this._transformers, this._level);
    });
  }
}

// ─── Child Logger ────────────────────────────────────────────────

class ChildLoggerImpl<TMeta = Record<string, unknown>>
  implements Logger<TMeta>
{
  constructor(
    private _parent: LoggerImpl<TMeta>,
    private _context: Record<string, unknown>,
  ) {}

  trace(message: string, meta?: Partial<TMeta>): void {
    this._parent._logWithContext("TRACE", message, this._context, meta);
  }
  debug(message: string, meta?: Partial<TMeta>): void {
    this._parent._logWithContext("DEBUG", message, this._context, meta);
  }
  info(message: string, meta?: Partial<TMeta>): void {
    this._parent._logWithContext("INFO", message, this._context, meta);
  }
  warn(message: string, meta?: Partial<TMeta>): void {
    this._parent._logWithContext("WARN", message, this._context, meta);
  }
  error(
    message: string,
    metaOrError?: Partial<TMeta> | Error,
    error?: Error,
  ): void {
    this._parent._logErrorLevel(
      "ERROR",
      message,
      this._context,
      metaOrError,
      error,
    );
  }
  fatal(
    message: string,
    metaOrError?: Partial<TMeta> | Error,
    error?: Error,
  ): void {
    this._parent._logErrorLevel(
      "FATAL",
      message,
      this._context,
      metaOrError,
      error,
    );
  }

  child(context: Record<string, unknown>): Logger<TMeta> {
    return new ChildLoggerImpl<TMeta>(this._parent, {
      ...this._context,
      ...context,
    });
  }

  addTransport(transport: Transformer<TMeta>): void {
    this._parent.addTransport(transport);
  }
  removeTransport(name: string): void {
    this._parent.removeTransport(name);
  }
  addMiddleware(middleware: LogMiddleware<TMeta>): void {
    this._parent.addMiddleware(middleware);
  }
  removeMiddleware(middleware: LogMiddleware<TMeta>): void {
    this._parent.removeMiddleware(middleware);
  }
  setLevel(level: LogLevelName): void {
    this._parent.setLevel(level);
  }
  getLevel(): LogLevelName {
    return this._parent.getLevel();
  }
  isLevelEnabled(level: LogLevelName): boolean {
    return this._parent.isLevelEnabled(level);
  }
  startTimer(level?: LogLevelName): TimerResult<TMeta> {
    return this._parent.startTimer(level);
  }
  flush(): Promise<void> {
    return this._parent.flush();
  }
  close(): Promise<void> {
    return this._parent.close();
  }
}

// ─── Factory ─────────────────────────────────────────────────────

/**
 * Create a new logger instance.
 *
 * @example Exchange records rendered as JSON lines, START edges dropped
 * ```ts
 * import { createLogger, edgeEndFilterMiddleware, jsonTransport } from 'exchange-logger';
 *
 * const logger = createLogger({
 *   level: 'INFO',
 *   middleware: [edgeEndFilterMiddleware()],
 *   transports: [jsonTransport({ maxJsonDataToLog: 4096 })],
 * });
 * ```
 */
export function createLogger<TMeta = Record<string, unknown>>(
  options?: LoggerOptions<TMeta>,
): Logger<TMeta> {
  return new LoggerImpl<TMeta>(options);
}
