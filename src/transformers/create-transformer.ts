/**
 * @module exchange-logger
 * @description Helper to create custom transformers easily.
 */

import type { LogEntry, Transformer } from "../core/types.js";

/**
 * Build a transformer without spelling out the object.
 *
 * @example Ship END records to an in-house collector
 * ```ts
 * const collector = createTransformer('collector', (entry) => {
 *   queue.push(jsonFormatter()(entry));
 * }, { level: 'INFO' });
 *
 * logger.addTransport(endEdgeOnly(collector));
 * ```
 *
 * @param name - Unique name; `removeTransport(name)` uses it
 * @param options - level, flush and close
 */
export function createTransformer(
  name: string,
  transform: (entry: LogEntry) => void | Promise<void>,
  options: Partial<Omit<Transformer, "name" | "transform">> = {},
): Transformer {
  return {
    ...options,
    name,
    transform,
  };
}
