/**
 * @module exchange-logger
 * @description Incoming exchange assembler (requests this server handles).
 */

import {
  decodeBody,
  type ExchangeEventInput,
  emitExchange,
  tryParseJson,
  withRequestMasks,
} from "./record.js";
import {
  type IncomingRequestInfo,
  type IncomingResponseInfo,
  NOT_LOGGED,
  RequestDirection,
  RequestEdge,
} from "./types.js";

const REFERER = "referer";

export function logIncomingEvent(
  input: ExchangeEventInput<IncomingRequestInfo, IncomingResponseInfo>,
): void {
  const { masker, request, response } = input;

  const parts = withRequestMasks(masker, request, () => {
    let requestInfo: Record<string, unknown> = {};
    let responseInfo: Record<string, unknown> = {};
    const path = request ? masker.sanitizeUrl(request.path) : "";

    if (request) {
      requestInfo = {
        method: request.method,
        remote_addr: request.remoteAddr ?? null,
        url_scheme: request.scheme,
        path,
        POST: masker.sanitizeData(request.post),
        GET: masker.sanitizeData(request.get),
        data: masker.sanitizeData(input.requestData ?? null),
        headers: masker.sanitizeData(
          Object.fromEntries(
            Object.entries(request.headers).map(([name, value]): [string, string] => [
              name,
              name === REFERER ? masker.sanitizeUrl(value) : value,
            ]),
          ),
        ),
      };
    }

    let message: string;
    if (input.edge === RequestEdge.START) {
      message = request
        ? `INCOMING (start): ${request.method} ${path}`
        : `INCOMING (start): ${input.method ?? ""} ${masker.sanitizeUrl(input.url ?? "")}`;
    } else {
      message = request
        ? `INCOMING (end): ${request.method} ${path}`
        : `INCOMING (end): ${input.method ?? ""} ${masker.sanitizeUrl(input.url ?? "")}`;

      if (response) {
        message += ` (${response.statusCode})`;
        responseInfo = { status_code: response.statusCode };

        if (response.logData === false) {
          responseInfo.data = { ...NOT_LOGGED };
        } else if (
          masker.config.logResponseContent &&
          response.contentType === "application/json" &&
          response.body !== undefined
        ) {
          const text = decodeBody(response.body);
          const parsed = tryParseJson(text);
          responseInfo.data = parsed.ok
            ? masker.sanitizeData(parsed.value)
            : masker.sanitizeRequestData(text);
        }
      }
    }

    return { message, request: requestInfo, response: responseInfo };
  });

  emitExchange(input, { direction: RequestDirection.INCOMING, ...parts });
}
