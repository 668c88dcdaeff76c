/**
 * @module exchange-logger
 * @description Incoming HTTP exchange logging. Framework-agnostic: mappers
 * read what the logger needs from the framework's request and response
 * objects, so Express, Fastify or plain node:http all plug in.
 *
 * @example
 * ```ts
 * import express from 'express';
 * import { createHttpLogger, createLogger, createMasker, nodeHttpMappers } from 'exchange-logger';
 *
 * const app = express();
 * const httpLogger = createHttpLogger({
 *   logger: createLogger(),
 *   masker: createMasker({ config: { enableSensitivePathsProcessor: true } }),
 *   reqMapper: nodeHttpMappers.req,
 *   resMapper: nodeHttpMappers.res,
 * });
 *
 * app.use(express.json());
 * app.use(httpLogger);
 * ```
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import type { Logger } from "../core/types.js";
import { logIncomingEvent } from "../exchange/incoming.js";
import { decodeBody, tryParseJson } from "../exchange/record.js";
import { type ExchangeHandle, openExchange } from "../exchange/scope.js";
import type {
  IncomingRequestInfo,
  IncomingResponseInfo,
} from "../exchange/types.js";
import type { Masker } from "../masking/masker.js";
import { isPlainObject } from "../masking/sensitive-paths.js";

/**
 * Extracts what the exchange record needs from a framework request.
 */
export interface HttpRequestMapper<TReq> {
  getMethod: (req: TReq) => string;
  /** Path without the query string */
  getPath: (req: TReq) => string;
  getScheme: (req: TReq) => string;
  getRemoteAddr?: (req: TReq) => string | undefined;
  /** Origin headers only: entity headers such as content-type are left out */
  getHeaders: (req: TReq) => Record<string, string>;
  getQuery?: (req: TReq) => Record<string, unknown>;
  /** Parsed form fields */
  getForm?: (req: TReq) => Record<string, unknown>;
  /** Raw body, or an already parsed body */
  getBody?: (req: TReq) => unknown;
  /** Names of uploaded files */
  getFileNames?: (req: TReq) => string[] | undefined;
  /** Mask rule sets for this request only */
  getMaskNames?: (req: TReq) => string | readonly string[] | undefined;
  getNotes?: (req: TReq) => unknown;
}

/**
 * Extracts what the exchange record needs from a framework response.
 */
export interface HttpResponseMapper<TRes> {
  getStatusCode: (res: TRes) => number;
  /** Execute callback once the response is sent or the client went away */
  onFinish: (res: TRes, callback: () => void) => void;
  getContentType?: (res: TRes) => string | undefined;
  getBody?: (res: TRes) => string | Uint8Array | undefined;
  /** `false` keeps this response's body out of the log */
  getLogData?: (res: TRes) => boolean | undefined;
}

export interface HttpLoggerOptions<TReq, TRes> {
  logger: Logger;
  masker: Masker;
  reqMapper: HttpRequestMapper<TReq>;
  resMapper: HttpResponseMapper<TRes>;
  /** Skip logging certain requests on top of the configured blocklist */
  skip?: (req: TReq) => boolean;
}

export type HttpLoggerHandler<TReq, TRes> = (
  req: TReq,
  res: TRes,
  next?: (err?: unknown) => void,
) => void;

/**
 * Creates the incoming-exchange middleware.
 */
export function createHttpLogger<TReq, TRes>(
  options: HttpLoggerOptions<TReq, TRes>,
): HttpLoggerHandler<TReq, TRes> {
  const { logger, masker, reqMapper, resMapper, skip } = options;

  function isBlocked(req: TReq): boolean {
    const path = reqMapper.getPath(req);
    return masker.config.middlewareBlocklist.some((prefix) =>
      path.startsWith(prefix),
    );
  }

  return (req, res, next) => {
    if (
      !masker.config.enableLoggingMiddleware ||
      isBlocked(req) ||
      skip?.(req)
    ) {
      next?.();
      return;
    }

    const exchange: ExchangeHandle<IncomingRequestInfo, IncomingResponseInfo> =
      openExchange(logIncomingEvent, {
        logger,
        masker,
        request: toRequestInfo(reqMapper, req),
        requestData: captureRequestData(masker, reqMapper, req),
      });

    resMapper.onFinish(res, () => {
      if (exchange.finished) return;
      exchange.request = toRequestInfo(reqMapper, req);
      exchange.notes = reqMapper.getNotes?.(req);
      exchange.response = toResponseInfo(resMapper, res);
      exchange.finish();
    });

    try {
      next?.();
    } catch (err) {
      exchange.response = toResponseInfo(resMapper, res);
      exchange.finish(err);
      throw err;
    }
  };
}

function toRequestInfo<TReq>(
  mapper: HttpRequestMapper<TReq>,
  req: TReq,
): IncomingRequestInfo {
  return {
    method: mapper.getMethod(req),
    path: mapper.getPath(req),
    scheme: mapper.getScheme(req),
    remoteAddr: mapper.getRemoteAddr?.(req),
    headers: mapper.getHeaders(req),
    post: mapper.getForm?.(req) ?? {},
    get: mapper.getQuery?.(req) ?? {},
    maskNames: mapper.getMaskNames?.(req),
  };
}

function toResponseInfo<TRes>(
  mapper: HttpResponseMapper<TRes>,
  res: TRes,
): IncomingResponseInfo {
  return {
    statusCode: mapper.getStatusCode(res),
    contentType: mapper.getContentType?.(res),
    body: mapper.getBody?.(res),
    logData: mapper.getLogData?.(res),
  };
}

/**
 * Body data for the record: uploaded file names, the JSON body, or the raw
 * body masked as a query string.
 */
export function captureRequestData<TReq>(
  masker: Masker,
  mapper: HttpRequestMapper<TReq>,
  req: TReq,
): unknown {
  const files = mapper.getFileNames?.(req);
  if (files && files.length > 0) {
    return { file_list: files };
  }

  const body = mapper.getBody?.(req);
  if (typeof body !== "string" && !(body instanceof Uint8Array)) {
    return body === undefined ? { raw_body: "" } : body;
  }

  const text = decodeBody(body);
  const parsed = tryParseJson(text);
  if (parsed.ok) return parsed.value;

  const names = mapper.getMaskNames?.(req);
  const run = () => masker.sanitizeRequestData(text);
  return {
    raw_body:
      names === undefined || names.length === 0
        ? run()
        : masker.withMasks(names, run),
  };
}

// ─── node:http / Express mappers ────────────────────────────────

/** node:http request plus what Express-style frameworks add */
export interface NodeHttpRequest extends IncomingMessage {
  originalUrl?: string;
  ip?: string;
  protocol?: string;
  query?: unknown;
  body?: unknown;
  files?: unknown;
  /** Set by application code to mask this request with extra rule sets */
  maskNames?: string | readonly string[];
  /** Free-form notes copied onto the END record */
  requestNotes?: unknown;
}

export interface NodeHttpResponse extends ServerResponse {
  /** Set to `false` to keep the body out of the log */
  logData?: boolean;
  locals?: { body?: unknown };
}

const ENTITY_HEADERS = new Set(["content-type", "content-length"]);

function rawUrl(req: NodeHttpRequest): string {
  return req.originalUrl ?? req.url ?? "/";
}

function queryOf(req: NodeHttpRequest): Record<string, unknown> {
  if (isPlainObject(req.query)) return req.query;

  const url = rawUrl(req);
  const start = url.indexOf("?");
  if (start === -1) return {};

  const query: Record<string, string | string[]> = {};
  for (const [key, value] of new URLSearchParams(url.slice(start + 1))) {
    const existing = query[key];
    if (existing === undefined) query[key] = value;
    else if (Array.isArray(existing)) existing.push(value);
    else query[key] = [existing, value];
  }
  return query;
}

function isFormRequest(req: NodeHttpRequest): boolean {
  const type = req.headers["content-type"] ?? "";
  return (
    type.startsWith("application/x-www-form-urlencoded") ||
    type.startsWith("multipart/form-data")
  );
}

function fileNamesOf(req: NodeHttpRequest): string[] | undefined {
  const files = req.files;
  if (!Array.isArray(files) && !isPlainObject(files)) return undefined;

  const list: unknown[] = Array.isArray(files) ? files : Object.values(files);
  return list.flat().flatMap((file) => {
    if (!isPlainObject(file)) return [];
    const name = file.originalname ?? file.name;
    return typeof name === "string" ? [name] : [];
  });
}

/**
 * Mappers for node:http `IncomingMessage`/`ServerResponse`. Express,
 * and most frameworks built on node:http, extend these objects.
 */
export const nodeHttpMappers: {
  req: HttpRequestMapper<NodeHttpRequest>;
  res: HttpResponseMapper<NodeHttpResponse>;
} = {
  req: {
    getMethod: (req) => req.method ?? "UNKNOWN",
    getPath: (req) => rawUrl(req).split("?")[0] ?? "/",
    getScheme: (req) => {
      if (req.protocol) return req.protocol;
      return "encrypted" in req.socket && req.socket.encrypted === true
        ? "https"
        : "http";
    },
    getRemoteAddr: (req) => req.ip ?? req.socket.remoteAddress,
    getHeaders: (req) => {
      const headers: Record<string, string> = {};
      for (const [name, value] of Object.entries(req.headers)) {
        if (value === undefined || ENTITY_HEADERS.has(name)) continue;
        headers[name] = Array.isArray(value) ? value.join(", ") : value;
      }
      return headers;
    },
    getQuery: queryOf,
    getForm: (req) =>
      isFormRequest(req) && isPlainObject(req.body) ? req.body : {},
    getBody: (req) => (isFormRequest(req) ? undefined : req.body),
    getFileNames: fileNamesOf,
    getMaskNames: (req) => req.maskNames,
    getNotes: (req) => req.requestNotes,
  },
  res: {
    getStatusCode: (res) => res.statusCode,
    onFinish: (res, callback) => {
      res.on("finish", callback);
      // Client disconnects never emit "finish"
      res.on("close", callback);
    },
    getContentType: (res) => {
      const type = res.getHeader("content-type");
      if (typeof type !== "string") return undefined;
      return type.split(";")[0]?.trim();
    },
    getBody: (res) => {
      const body = res.locals?.body;
      if (body === undefined) return undefined;
      if (typeof body === "string" || body instanceof Uint8Array) return body;
      return JSON.stringify(body);
    },
    getLogData: (res) => res.logData,
  },
};
