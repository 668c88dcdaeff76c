/**
 * @module exchange-logger
 * @description JSON transformer: one JSON document per entry, the shape log
 * shippers index. Exchange records are flattened to their top-level fields;
 * oversized payloads get their response data cut.
 *
 * @example
 * ```ts
 * import { createLogger, endEdgeOnly, jsonTransport } from 'exchange-logger';
 *
 * const logger = createLogger({
 *   transports: [
 *     endEdgeOnly(jsonTransport({ defaultExtra: { service: 'billing' }, maxJsonDataToLog: 8000 })),
 *   ],
 * });
 * ```
 */

import type { LogEntry, LogLevelName, Transformer } from "../core/types.js";
import { isPlainObject } from "../masking/sensitive-paths.js";

export interface JsonFormatterOptions {
  /** Fields added to every document; entry fields win on conflict */
  defaultExtra?: Record<string, unknown>;
  /** Length limit of the document; 0 disables truncation (default: 0) */
  maxJsonDataToLog?: number;
}

export interface JsonTransportOptions extends JsonFormatterOptions {
  /** Per-transport level filter */
  level?: LogLevelName;
  /** Output sink (default: console.log) */
  write?: (line: string) => void;
}

/** Room kept for the rest of the document when response data is cut */
export const TRUNCATION_MARGIN = 50;
export const TRUNCATION_MARKER = " **TRUNCATED**";

const EXCHANGE_FIELDS = new Set([
  "start_time",
  "end_time",
  "response_time_ms",
  "request",
  "response",
  "notes",
  "smart",
]);

// ─── Typed values ────────────────────────────────────────────────

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Values JSON has no type for become `{ value, type }` objects.
 */
export function encodeTypedValues(value: unknown): unknown {
  if (value instanceof Set) {
    return {
      value: [...value].sort(compareValues).map(encodeTypedValues),
      type: "set",
    };
  }
  if (value instanceof Date) {
    return { value: value.toISOString(), type: "datetime" };
  }
  if (typeof value === "bigint") {
    return { value: value.toString(), type: "bigint" };
  }
  if (Array.isArray(value)) return value.map(encodeTypedValues);
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]): [string, unknown] => [
        key,
        encodeTypedValues(item),
      ]),
    );
  }
  return value;
}

// ─── Formatter ───────────────────────────────────────────────────

function extraOf(entry: LogEntry, skip: Set<string>): Record<string, unknown> {
  const extra: Record<string, unknown> = { ...entry.context };
  for (const [key, value] of Object.entries(entry.meta)) {
    if (!skip.has(key)) extra[key] = value;
  }
  return extra;
}

function documentOf(
  entry: LogEntry,
  defaultExtra: Record<string, unknown>,
): Record<string, unknown> {
  const { meta } = entry;

  if (meta.smart !== true) {
    return {
      ...defaultExtra,
      msg: entry.message,
      ...extraOf(entry, new Set(["smart"])),
    };
  }

  return {
    ...defaultExtra,
    msg: entry.message,
    start_time: meta.start_time ?? "",
    end_time: meta.end_time ?? "",
    response_time_ms: meta.response_time_ms ?? "",
    request: meta.request,
    response: meta.response ?? null,
    notes: meta.notes ?? null,
    ...extraOf(entry, EXCHANGE_FIELDS),
  };
}

function stringOf(value: unknown): string {
  if (typeof value === "string") return value;
  return JSON.stringify(encodeTypedValues(value)) ?? String(value);
}

/**
 * Cut `response.data` so the document fits; mutates `document`.
 * Limits at or below the margin only set the flag.
 */
function truncate(document: Record<string, unknown>, max: number): void {
  document.max_data_exceeded = true;

  const length = max - TRUNCATION_MARGIN;
  const response = document.response;
  if (length <= 0 || !isPlainObject(response)) return;
  if (Object.keys(response).length === 0) return;

  const data = stringOf(response.data ?? "");
  if (data.length > length) {
    document.response = {
      ...response,
      data: data.slice(0, length) + TRUNCATION_MARKER,
    };
  }
}

/**
 * Render an entry as a single JSON line.
 */
export function jsonFormatter(
  options: JsonFormatterOptions = {},
): (entry: LogEntry) => string {
  const defaultExtra = options.defaultExtra ?? {};
  const max = options.maxJsonDataToLog ?? 0;

  return (entry) => {
    const document = documentOf(entry, defaultExtra);
    const line = JSON.stringify(encodeTypedValues(document));
    if (max <= 0 || line.length <= max) return line;

    truncate(document, max);
    return JSON.stringify(encodeTypedValues(document));
  };
}

export function jsonTransport(options: JsonTransportOptions = {}): Transformer {
  const format = jsonFormatter(options);
  const write = options.write ?? ((line: string) => console.log(line));

  return {
    name: "json",
    level: options.level,
    transform(entry: LogEntry): void {
      write(format(entry));
    },
  };
}
