/**
 * @module exchange-logger
 * @description Masking middleware. Runs plain log entries' meta and context
 * through a Masker, so ad-hoc `logger.info('...', payload)` calls get the
 * same path rules as exchange records.
 *
 * @example
 * ```ts
 * const logger = createLogger({
 *   transports: [consoleTransport()],
 *   middleware: [maskingMiddleware({ masker, names: ['credentials'] })],
 * });
 *
 * logger.info('Login', { credentials: { password: 'pw' } });
 * ```
 */

import type { LogEntry, LogMiddleware } from "../core/types.js";
import type { Masker } from "../masking/masker.js";
import { isSmartEntry } from "./edge-filter.js";

export interface MaskingMiddlewareOptions {
  masker: Masker;
  /** Rule sets applied on top of scope and global names */
  names?: string[];
  /** Also mask exchange records (already masked when built; default: false) */
  includeExchanges?: boolean;
}

export function maskingMiddleware(
  options: MaskingMiddlewareOptions,
): LogMiddleware {
  const { masker, names = [], includeExchanges = false } = options;

  return (entry: LogEntry, next) => {
    if (!includeExchanges && isSmartEntry(entry)) {
      next(entry);
      return;
    }

    const masked: LogEntry = {
      ...entry,
      meta: masker.sanitizeData(entry.meta, ...names),
    };
    if (entry.context) {
      masked.context = masker.sanitizeData(entry.context, ...names);
    }
    next(masked);
  };
}
