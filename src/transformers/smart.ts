/**
 * @module exchange-logger
 * @description Smart transformer — human-readable output for development.
 * Exchange records get their request and response data printed under the
 * message, each value cut to `maxVerboseOutputLength`.
 *
 * @example
 * ```ts
 * import { createLogger, smartTransport } from 'exchange-logger';
 *
 * const logger = createLogger({ transports: [smartTransport()] });
 * // → ℹ 2024-01-15T10:30:00.000Z  INFO  INCOMING (end): POST /login (200)
 * //     Request Data: {"user":"ada","password":"*** masked ***"}
 * //     Request Headers: {"host":"localhost"}
 * //     Response Data: (empty)
 * ```
 */

import {
  type LogEntry,
  LogLevel,
  type LogLevelName,
  type Transformer,
} from "../core/types.js";
import {
  isExchangeMeta,
  RequestDirection,
  RequestEdge,
} from "../exchange/types.js";

export interface SmartFormatterOptions {
  /** Longest rendering of one data value (default: 500) */
  maxVerboseOutputLength?: number;
}

export interface SmartTransportOptions extends SmartFormatterOptions {
  /** Per-transport level filter */
  level?: LogLevelName;
  /** Show timestamps (default: true) */
  timestamps?: boolean;
  /** Use colors in output (default: true) */
  colors?: boolean;
}

// ─── ANSI Color Codes ────────────────────────────────────────────

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";

const COLORS: Record<string, string> = {
  TRACE: "\x1b[90m", // gray
  DEBUG: "\x1b[36m", // cyan
  INFO: "\x1b[32m", // green
  WARN: "\x1b[33m", // yellow
  ERROR: "\x1b[31m", // red
  FATAL: "\x1b[35;1m", // bold magenta
};

const ICONS: Record<string, string> = {
  TRACE: "🔍",
  DEBUG: "🐛",
  INFO: "ℹ",
  WARN: "⚠",
  ERROR: "✖",
  FATAL: "💀",
};

// ─── Formatter ───────────────────────────────────────────────────

function limitedRepr(value: unknown, length: number): string {
  const text = JSON.stringify(value) ?? String(value);
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

/**
 * Render an entry as text. Plain entries and outgoing START records are
 * the message alone.
 */
export function smartFormatter(
  options: SmartFormatterOptions = {},
): (entry: LogEntry) => string {
  const length = options.maxVerboseOutputLength ?? 500;

  return (entry) => {
    const { meta } = entry;
    if (!isExchangeMeta(meta)) return entry.message;
    if (
      meta.edge === RequestEdge.START &&
      meta.direction === RequestDirection.OUTGOING
    ) {
      return entry.message;
    }

    const lines = [entry.message];
    const { data, headers } = meta.request;
    if (data !== undefined && data !== null) {
      lines.push(`  Request Data: ${limitedRepr(data, length)}`);
    }
    if (headers !== undefined && headers !== null) {
      lines.push(`  Request Headers: ${limitedRepr(headers, length)}`);
    }

    const responseData = meta.response.data;
    lines.push(
      `  Response Data: ${
        responseData === undefined || responseData === null
          ? "(empty)"
          : limitedRepr(responseData, length)
      }`,
    );
    lines.push("\n");

    return lines.join("\n");
  };
}

/**
 * Create a smart-print transformer for dev/debug use.
 */
export function smartTransport(
  options: SmartTransportOptions = {},
): Transformer {
  const showTimestamps = options.timestamps ?? true;
  const useColors = options.colors ?? true;
  const format = smartFormatter(options);

  function colorize(text: string, color: string): string {
    return useColors ? `${color}${text}${RESET}` : text;
  }

  function render(entry: LogEntry): string {
    const icon = ICONS[entry.levelName] ?? "•";
    const levelColor = COLORS[entry.levelName] ?? "";
    const level = colorize(entry.levelName.padEnd(5), levelColor);
    const ts = showTimestamps
      ? `${colorize(new Date(entry.timestamp).toISOString(), DIM)}  `
      : "";

    let line = `${icon} ${ts}${level}  ${format(entry)}`;

    if (entry.error) {
      line += `\n  ${colorize(
        `${entry.error.name ?? "Error"}: ${entry.error.message}`,
        COLORS.ERROR ?? "",
      )}`;
      if (entry.error.stack) {
        line += `\n${colorize(entry.error.stack, DIM)}`;
      }
    }

    return line;
  }

  return {
    name: "smart",
    level: options.level,
    transform(entry: LogEntry): void {
      const output = render(entry);

      if (entry.level >= LogLevel.ERROR) {
        console.error(output);
      } else if (entry.level >= LogLevel.WARN) {
        console.warn(output);
      } else {
        console.log(output);
      }
    },
  };
}
