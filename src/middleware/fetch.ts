/**
 * @module exchange-logger
 * @description Outgoing exchange logging for `fetch`.
 *
 * Wraps a fetch implementation; the wrapper logs a START record before the
 * call and an END record with masked headers, body and response after it.
 *
 * @example
 * ```ts
 * import { createLoggedFetch } from 'exchange-logger';
 *
 * const loggedFetch = createLoggedFetch({ logger, masker });
 *
 * await loggedFetch('https://api.example.com/login', {
 *   method: 'POST',
 *   body: JSON.stringify({ user: 'ada', password: 'pw' }),
 *   maskNames: 'credentials',
 *   notes: { attempt: 1 },
 * });
 * ```
 */

import type { Logger } from "../core/types.js";
import { trackOutgoing } from "../exchange/scope.js";
import type { OutgoingRequestInfo } from "../exchange/types.js";
import type { Masker } from "../masking/masker.js";

export interface LoggedRequestInit extends RequestInit {
  /** Free-form notes for the END record */
  notes?: unknown;
  /** Mask rule sets for this call only */
  maskNames?: string | readonly string[];
}

export type LoggedFetch = (
  input: string | URL | Request,
  init?: LoggedRequestInit,
) => Promise<Response>;

export interface LoggedFetchOptions {
  logger: Logger;
  masker: Masker;
  /** Default: global fetch */
  fetchFn?: typeof fetch;
}

export function createLoggedFetch(options: LoggedFetchOptions): LoggedFetch {
  const { logger, masker } = options;
  const fetchFn = options.fetchFn ?? fetch;

  return async (input, init = {}) => {
    const { notes, maskNames, ...requestInit } = init;

    if (!masker.config.enableOutboundRequestLogging) {
      return fetchFn(input, requestInit);
    }

    const request = describeRequest(input, requestInit, maskNames);

    return trackOutgoing(
      {
        logger,
        masker,
        method: request.method,
        url: request.url,
        request,
        notes,
      },
      async (exchange) => {
        const response = await fetchFn(input, requestInit);
        exchange.response = {
          status: response.status,
          text: await readText(response),
        };
        return response;
      },
    );
  };
}

/** The request the way the server will see it */
export function describeRequest(
  input: string | URL | Request,
  init: RequestInit,
  maskNames?: string | readonly string[],
): OutgoingRequestInfo {
  const fromRequest = input instanceof Request ? input : undefined;
  const method = (init.method ?? fromRequest?.method ?? "GET").toUpperCase();
  const url = input instanceof Request ? input.url : new URL(input).href;
  const headers = new Headers(init.headers ?? fromRequest?.headers);

  return {
    method,
    url,
    headers: Object.fromEntries(headers.entries()),
    body: bodyOf(init.body),
    maskNames,
  };
}

function bodyOf(
  body: RequestInit["body"] | undefined,
): string | Uint8Array | null {
  if (typeof body === "string") return body;
  if (body instanceof URLSearchParams) return body.toString();
  if (body instanceof Uint8Array) return body;
  if (body instanceof ArrayBuffer) return new Uint8Array(body);
  // Streams, blobs and form data are not read twice
  return null;
}

async function readText(response: Response): Promise<string> {
  try {
    return await response.clone().text();
  } catch (err) {
    console.error("[exchange-logger] could not read response body", err);
    return "";
  }
}
