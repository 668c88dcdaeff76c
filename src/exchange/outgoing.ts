/**
 * @module exchange-logger
 * @description Outgoing exchange assembler (requests this process sends).
 *
 * START only knows method and URL; headers and body are read on END from
 * the request as it was actually sent.
 */

import {
  decodeBody,
  type ExchangeEventInput,
  emitExchange,
  sanitizeBody,
  withRequestMasks,
} from "./record.js";
import {
  type OutgoingRequestInfo,
  type OutgoingResponseInfo,
  RequestDirection,
  RequestEdge,
} from "./types.js";

export function logOutgoingEvent(
  input: ExchangeEventInput<OutgoingRequestInfo, OutgoingResponseInfo>,
): void {
  const { masker, request, response } = input;

  const parts = withRequestMasks(masker, request, () => {
    let requestInfo: Record<string, unknown> = {};
    let responseInfo: Record<string, unknown> = {};
    let message: string;

    if (input.edge === RequestEdge.START) {
      const method = (input.method ?? "").toUpperCase();
      const url = masker.sanitizeUrl(input.url ?? "");
      requestInfo = { method, url };
      message = `OUTGOING (start): ${method} ${url}`;
    } else if (request) {
      const url = masker.sanitizeUrl(request.url);
      requestInfo = {
        method: request.method,
        url,
        path: masker.sanitizeUrl(pathOf(request.url)),
        headers: masker.sanitizeData({ ...request.headers }),
      };
      if (request.body) {
        requestInfo.data = sanitizeBody(masker, decodeBody(request.body));
      }
      message = `OUTGOING (end): ${request.method} ${url}`;
    } else {
      const method = (input.method ?? "").toUpperCase();
      message = `OUTGOING (end): ${method} ${masker.sanitizeUrl(input.url ?? "")}`;
    }

    if (input.edge === RequestEdge.END && response) {
      message += ` (${response.status})`;
      responseInfo = {
        status_code: response.status,
        data: sanitizeBody(masker, response.text),
      };
    }

    return { message, request: requestInfo, response: responseInfo };
  });

  emitExchange(input, { direction: RequestDirection.OUTGOING, ...parts });
}

/** Path plus query of an absolute or relative URL */
export function pathOf(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.pathname}${parsed.search}`;
  } catch {
    return url;
  }
}
