/**
 * @module exchange-logger
 * @description Pipeline — middleware composition and transformer fan-out.
 */

import { resolveLevel, shouldLog } from "./levels.js";
import type { LogEntry, LogMiddleware, Transformer } from "./types.js";

/**
 * Build a composed middleware function from an array of middleware.
 * Each middleware calls `next()` to pass the entry forward.
 * Omit `next()` to drop the entry (e.g. the END-edge filter).
 */
export function composeMiddleware<TMeta = Record<string, unknown>>(
  middleware: LogMiddleware<TMeta>[],
  final: (entry: LogEntry<TMeta>) => void,
): (entry: LogEntry<TMeta>) => void {
  if (middleware.length === 0) return final;

  return (entry: LogEntry<TMeta>) => {
    let index = 0;

    const next = (e: LogEntry<TMeta>): void => {
      const mw = middleware[index++];
      if (mw) {
        mw(e, next);
      } else {
        final(e);
      }
    };

    next(entry);
  };
}

/**
 * Fan out a log entry to all transformers, respecting per-transformer level filters.
 * Transformers are fire-and-forget so a slow sink never blocks the request path.
 */
export function fanOutToTransformers<TMeta = Record<string, unknown>>(
  entry: LogEntry<TMeta>,
  transformers: Transformer<TMeta>[],
  loggerLevel: number,
): void {
  for (const t of transformers) {
    const tLevel = t.level ? resolveLevel(t.level) : loggerLevel;

    if (!shouldLog(entry.level, tLevel)) continue;

    try {
      const result = t.transform(entry);
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          reportTransformerFailure(t.name, err);
        });
      }
    } catch (err) {
      reportTransformerFailure(t.name, err);
    }
  }
}

function reportTransformerFailure(name: string, err: unknown): void {
  console.error(`[exchange-logger] transformer "${name}" failed`, err);
}
