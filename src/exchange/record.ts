/**
 * @module exchange-logger
 * @description Shared pieces of the incoming and outgoing assemblers.
 */

import { serializeError, toError } from "../core/errors.js";
import type { Logger } from "../core/types.js";
import type { Masker } from "../masking/masker.js";
import { calculateResponseTimeMs, formatTimestamp } from "./timing.js";
import type {
  ExchangeMeta,
  MaskNameCarrier,
  RequestDirection,
  RequestEdge,
} from "./types.js";

/**
 * Everything an assembler needs for one edge of one exchange.
 */
export interface ExchangeEventInput<TReq, TRes> {
  logger: Logger;
  masker: Masker;
  exchangeId: string;
  start: Date;
  end: Date | null;
  edge: RequestEdge;
  request?: TReq;
  response?: TRes;
  /** Body data captured by the caller (incoming requests) */
  requestData?: unknown;
  /** Set when the wrapped work failed */
  failure?: unknown;
  notes?: unknown;
  /** Replaces the generated log message */
  msg?: string;
  /** Used while no request view exists yet */
  method?: string;
  url?: string;
}

export type ExchangeAssembler<TReq, TRes> = (
  input: ExchangeEventInput<TReq, TRes>,
) => void;

const utf8 = new TextDecoder("utf-8");

/** Bytes become UTF-8 text, invalid sequences replaced */
export function decodeBody(body: string | Uint8Array): string {
  return typeof body === "string" ? body : utf8.decode(body);
}

export type JsonParseResult =
  | { ok: true; value: unknown }
  | { ok: false };

export function tryParseJson(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Mask a body: JSON when it parses, otherwise the query-string rules.
 */
export function sanitizeBody(masker: Masker, text: string): unknown {
  const parsed = tryParseJson(text);
  if (parsed.ok) return masker.sanitizeData(parsed.value);
  return masker.sanitizeQueryString(text);
}

/**
 * Run `fn` with the request's own mask names active.
 */
export function withRequestMasks<T>(
  masker: Masker,
  request: MaskNameCarrier | undefined,
  fn: () => T,
): T {
  const names = request?.maskNames;
  if (names === undefined || names.length === 0) return fn();
  return masker.withMasks(names, fn);
}

export interface ExchangeRecordParts {
  direction: RequestDirection;
  message: string;
  request: Record<string, unknown>;
  response: Record<string, unknown>;
}

/**
 * Log one exchange edge: `error` with the failure attached, else `info`.
 */
export function emitExchange<TReq, TRes>(
  input: ExchangeEventInput<TReq, TRes>,
  parts: ExchangeRecordParts,
): void {
  const meta: ExchangeMeta = {
    exchangeId: input.exchangeId,
    start_time: formatTimestamp(input.start),
    end_time: input.end && formatTimestamp(input.end),
    response_time_ms: calculateResponseTimeMs(input.start, input.end),
    direction: parts.direction,
    edge: input.edge,
    request: parts.request,
    response: parts.response,
    notes: input.notes ?? null,
    smart: true,
  };
  const message = input.msg ?? parts.message;

  if (input.failure !== undefined) {
    const error = toError(input.failure);
    meta.failure = serializeError(error, false);
    input.logger.error(message, meta, error);
  } else {
    input.logger.info(message, meta);
  }
}
