/**
 * @module exchange-logger
 * @description END-edge filter. Exchange records exist twice (START and END);
 * final sinks usually want only the complete END record, while a live tail
 * may want START records too. Plain log entries always pass.
 *
 * @example Drop START records for one sink only
 * ```ts
 * const logger = createLogger({
 *   transports: [smartTransport(), endEdgeOnly(jsonTransport())],
 * });
 * ```
 */

import type { LogEntry, LogMiddleware, Transformer } from "../core/types.js";
import { RequestEdge } from "../exchange/types.js";

/** Whether `entry` is an exchange record */
export function isSmartEntry(entry: LogEntry): boolean {
  return entry.meta.smart === true;
}

export function passesEdgeEndFilter(entry: LogEntry): boolean {
  if (!isSmartEntry(entry)) return true;
  return entry.meta.edge === RequestEdge.END;
}

/**
 * Pipeline-wide filter: no transformer sees START records.
 */
export function edgeEndFilterMiddleware(): LogMiddleware {
  return (entry, next) => {
    if (passesEdgeEndFilter(entry)) next(entry);
  };
}

/**
 * Sink-level filter: wrap one transformer so it skips START records.
 */
export function endEdgeOnly(transformer: Transformer): Transformer {
  return {
    ...transformer,
    transform(entry) {
      if (!passesEdgeEndFilter(entry)) return;
      return transformer.transform(entry);
    },
  };
}
