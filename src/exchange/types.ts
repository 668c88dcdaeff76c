/**
 * @module exchange-logger
 * @description Exchange record shape and the request/response views the
 * assemblers read from.
 */

import type { LogError } from "../core/types.js";
import { isPlainObject } from "../masking/sensitive-paths.js";

export const RequestDirection = {
  INCOMING: "INCOMING",
  OUTGOING: "OUTGOING",
} as const;

export type RequestDirection =
  (typeof RequestDirection)[keyof typeof RequestDirection];

export const RequestEdge = {
  START: "START",
  END: "END",
} as const;

export type RequestEdge = (typeof RequestEdge)[keyof typeof RequestEdge];

/**
 * `meta` of every exchange log entry ("smart" record).
 */
export type ExchangeMeta = {
  /** Shared by the START and END record of one exchange */
  exchangeId: string;
  start_time: string;
  end_time: string | null;
  /** -1 while the exchange has no end */
  response_time_ms: number;
  direction: RequestDirection;
  edge: RequestEdge;
  request: Record<string, unknown>;
  response: Record<string, unknown>;
  notes: unknown;
  smart: true;
  failure?: LogError;
};

/**
 * Implemented by request views that carry their own mask names.
 * The names apply to that one exchange only.
 */
export interface MaskNameCarrier {
  maskNames?: string | readonly string[];
}

// ─── Outgoing ────────────────────────────────────────────────────

/** The request as it was sent */
export interface OutgoingRequestInfo extends MaskNameCarrier {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string | Uint8Array | null;
}

export interface OutgoingResponseInfo {
  status: number;
  /** Response body text */
  text: string;
}

// ─── Incoming ────────────────────────────────────────────────────

export interface IncomingRequestInfo extends MaskNameCarrier {
  method: string;
  path: string;
  scheme: string;
  remoteAddr?: string;
  /** Origin headers only (the mapper decides which) */
  headers: Record<string, string>;
  /** Parsed form fields of the body */
  post: Record<string, unknown>;
  /** Parsed query parameters */
  get: Record<string, unknown>;
}

export interface IncomingResponseInfo {
  statusCode: number;
  contentType?: string;
  /** Raw body, read only when response content logging is on */
  body?: string | Uint8Array;
  /** `false` keeps the body out of the log */
  logData?: boolean;
}

/** Substituted for bodies of responses that opted out of logging */
export const NOT_LOGGED = { NOT_LOGGED: "logData === false" } as const;

/** Whether a log entry's meta is a complete exchange record */
export function isExchangeMeta(
  meta: Partial<Record<string, unknown>>,
): meta is ExchangeMeta {
  return (
    meta.smart === true &&
    typeof meta.exchangeId === "string" &&
    isPlainObject(meta.request) &&
    isPlainObject(meta.response)
  );
}
