/**
 * @module exchange-logger
 * @description Exchange scopes: a START record when the exchange opens and
 * exactly one END record when it closes, on success and on failure.
 *
 * @example Wrapping an outgoing call by hand
 * ```ts
 * const response = await trackOutgoing(
 *   { logger, masker, method: 'POST', url },
 *   async (exchange) => {
 *     const res = await client.post(url, body);
 *     exchange.request = { method: 'POST', url, headers, body };
 *     exchange.response = { status: res.status, text: res.text };
 *     return res;
 *   },
 * );
 * ```
 */

import { createId } from "@paralleldrive/cuid2";
import type { Logger } from "../core/types.js";
import type { Masker } from "../masking/masker.js";
import { logIncomingEvent } from "./incoming.js";
import { logOutgoingEvent } from "./outgoing.js";
import type { ExchangeAssembler } from "./record.js";
import {
  type IncomingRequestInfo,
  type IncomingResponseInfo,
  type OutgoingRequestInfo,
  type OutgoingResponseInfo,
  RequestEdge,
} from "./types.js";

export interface ExchangeOptions<TReq> {
  logger: Logger;
  masker: Masker;
  request?: TReq;
  requestData?: unknown;
  notes?: unknown;
  /** Replaces the generated log message on both edges */
  msg?: string;
  method?: string;
  url?: string;
  /** Default: cuid2 */
  idGenerator?: () => string;
  /** Default: current time */
  now?: () => Date;
}

/**
 * An open exchange. Set `request`, `response` and `notes` before it
 * finishes; the END record reads them.
 */
export interface ExchangeHandle<TReq, TRes> {
  readonly exchangeId: string;
  readonly start: Date;
  readonly finished: boolean;
  request?: TReq;
  response?: TRes;
  requestData?: unknown;
  notes?: unknown;
  /** Log the END record. Only the first call logs. */
  finish(failure?: unknown): void;
}

/**
 * Log the START record and return the open exchange.
 */
export function openExchange<TReq, TRes>(
  assemble: ExchangeAssembler<TReq, TRes>,
  options: ExchangeOptions<TReq>,
): ExchangeHandle<TReq, TRes> {
  const now = options.now ?? (() => new Date());
  const logger = options.logger.child({
    logger: options.masker.config.loggerName,
  });
  const exchangeId = (options.idGenerator ?? createId)();
  const start = now();
  let finished = false;

  const handle: ExchangeHandle<TReq, TRes> = {
    exchangeId,
    start,
    get finished() {
      return finished;
    },
    request: options.request,
    requestData: options.requestData,
    notes: options.notes,
    finish(failure?: unknown) {
      if (finished) return;
      finished = true;
      assemble({
        logger,
        masker: options.masker,
        exchangeId,
        start,
        end: now(),
        edge: RequestEdge.END,
        request: handle.request,
        response: handle.response,
        requestData: handle.requestData,
        failure,
        notes: handle.notes,
        msg: options.msg,
        method: options.method,
        url: options.url,
      });
    },
  };

  assemble({
    logger,
    masker: options.masker,
    exchangeId,
    start,
    end: null,
    edge: RequestEdge.START,
    request: options.request,
    requestData: options.requestData,
    notes: options.notes,
    msg: options.msg,
    method: options.method,
    url: options.url,
  });

  return handle;
}

/**
 * Run `work` inside an exchange. A failure is logged on the END record and
 * re-thrown unchanged.
 */
export async function trackExchange<TReq, TRes, T>(
  assemble: ExchangeAssembler<TReq, TRes>,
  options: ExchangeOptions<TReq>,
  work: (exchange: ExchangeHandle<TReq, TRes>) => T | Promise<T>,
): Promise<T> {
  const exchange = openExchange(assemble, options);
  try {
    const result = await work(exchange);
    exchange.finish();
    return result;
  } catch (err) {
    exchange.finish(err);
    throw err;
  }
}

export function trackOutgoing<T>(
  options: ExchangeOptions<OutgoingRequestInfo>,
  work: (
    exchange: ExchangeHandle<OutgoingRequestInfo, OutgoingResponseInfo>,
  ) => T | Promise<T>,
): Promise<T> {
  return trackExchange(logOutgoingEvent, options, work);
}

export function trackIncoming<T>(
  options: ExchangeOptions<IncomingRequestInfo>,
  work: (
    exchange: ExchangeHandle<IncomingRequestInfo, IncomingResponseInfo>,
  ) => T | Promise<T>,
): Promise<T> {
  return trackExchange(logIncomingEvent, options, work);
}
