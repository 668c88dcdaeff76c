/**
 * @module exchange-logger
 * @description Console transformer. Exchange records and plain entries go to
 * the console method matching their level, so a failed END record lands on
 * stderr through `console.error`.
 *
 * @example JSON lines with the payload limit taken from the masker config
 * ```ts
 * import { consoleTransport, createLogger } from 'exchange-logger';
 *
 * const logger = createLogger({
 *   transports: [
 *     consoleTransport({ maxJsonDataToLog: masker.config.maxJsonDataToLog }),
 *   ],
 * });
 * ```
 *
 * @example Verbose request/response lines while developing
 * ```ts
 * consoleTransport({ formatter: smartFormatter() });
 * ```
 */

import {
  type LogEntry,
  LogLevel,
  type LogLevelName,
  type Transformer,
} from "../core/types.js";
import { type JsonFormatterOptions, jsonFormatter } from "./json.js";

export interface ConsoleTransportOptions extends JsonFormatterOptions {
  level?: LogLevelName;
  /**
   * Route by level (`console.error` for ERROR and FATAL, `console.warn`,
   * `console.info`, `console.debug`). Off: everything goes to `console.log`.
   * Default: true
   */
  useConsoleLevels?: boolean;
  /**
   * Render the entry. Replaces the JSON document, so `defaultExtra` and
   * `maxJsonDataToLog` only apply without it.
   */
  formatter?: (entry: LogEntry) => unknown;
}

function consoleMethodFor(level: number): (...data: unknown[]) => void {
  if (level >= LogLevel.ERROR) return console.error;
  if (level >= LogLevel.WARN) return console.warn;
  if (level >= LogLevel.INFO) return console.info;
  if (level >= LogLevel.DEBUG) return console.debug;
  return console.log;
}

export function consoleTransport(
  options: ConsoleTransportOptions = {},
): Transformer {
  const useConsoleLevels = options.useConsoleLevels ?? true;
  const formatter =
    options.formatter ??
    jsonFormatter({
      defaultExtra: options.defaultExtra,
      maxJsonDataToLog: options.maxJsonDataToLog,
    });

  return {
    name: "console",
    level: options.level,
    transform(entry: LogEntry): void {
      const output = formatter(entry);
      if (useConsoleLevels) {
        consoleMethodFor(entry.level)(output);
      } else {
        console.log(output);
      }
    },
  };
}
