/**
 * @module exchange-logger
 * @description Datadog transformer — sends entries to the Datadog Logs
 * intake API. Exchange records are mapped onto Datadog's standard HTTP
 * attributes so the Log Explorer facets (method, status, duration) work.
 *
 * > Server-side only: the API key travels with every request.
 *
 * @example
 * ```ts
 * const logger = createLogger({
 *   transports: [
 *     endEdgeOnly(datadogTransport({ apiKey: process.env.DD_API_KEY ?? '', service: 'billing' })),
 *   ],
 * });
 * ```
 */

import type { LogEntry, LogLevelName, Transformer } from "../core/types.js";
import { isExchangeMeta } from "../exchange/types.js";

export interface DatadogTransportOptions {
  /** Datadog API Key */
  apiKey: string;
  /** Datadog Site (default: datadoghq.com) */
  site?: string; // e.g., datadoghq.eu
  /** Service name tag */
  service?: string;
  /** Source tag (default: nodejs) */
  ddSource?: string;
  /** Hostname override */
  hostname?: string;
  /** Tags (comma separated: env:prod,version:1.0) */
  tags?: string;
  /** Transport level filter */
  level?: LogLevelName;
  /** Default: global fetch */
  fetchFn?: typeof fetch;
}

const NS_PER_MS = 1_000_000;

/**
 * Datadog standard attributes for an exchange record; plain entries keep
 * their meta as is.
 */
export function toDatadogAttributes(
  entry: LogEntry,
): Record<string, unknown> {
  const { meta } = entry;
  if (!isExchangeMeta(meta)) return { ...entry.context, ...meta };

  const { request, response } = meta;
  const http: Record<string, unknown> = {
    method: request.method,
    url: request.url ?? request.path,
  };
  if (response.status_code !== undefined) {
    http.status_code = response.status_code;
  }

  const attributes: Record<string, unknown> = {
    ...entry.context,
    http,
    exchange: meta,
  };
  if (meta.response_time_ms >= 0) {
    attributes.duration = meta.response_time_ms * NS_PER_MS;
  }
  if (typeof request.remote_addr === "string") {
    attributes.network = { client: { ip: request.remote_addr } };
  }
  if (entry.error) {
    attributes.error = {
      kind: entry.error.name,
      message: entry.error.message,
      stack: entry.error.stack,
    };
  }
  return attributes;
}

/**
 * Sends each entry to Datadog via HTTP POST. Failures are reported on
 * stderr and never reach the caller.
 */
export function datadogTransport(
  options: DatadogTransportOptions,
): Transformer {
  const {
    apiKey,
    site = "datadoghq.com",
    service,
    ddSource = "nodejs",
    hostname,
    tags,
    level,
  } = options;
  const fetchFn = options.fetchFn ?? fetch;
  const url = `https://http-intake.logs.${site}/api/v2/logs`;

  return {
    name: "datadog",
    level,
    async transform(entry) {
      const payload = {
        ddsource: ddSource,
        ddtags: tags,
        hostname,
        service,
        message: entry.message,
        status: entry.levelName.toLowerCase(), // Datadog uses lowercase status
        ...toDatadogAttributes(entry),
        timestamp: entry.timestamp, // Datadog auto-parses this
      };

      try {
        const response = await fetchFn(url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "DD-API-KEY": apiKey,
          },
          body: JSON.stringify(payload),
        });
        if (!response.ok) {
          console.error(
            `[exchange-logger] Datadog push failed with status ${response.status}`,
          );
        }
      } catch (err) {
        console.error("[exchange-logger] Datadog push failed", err);
      }
    },
  };
}
