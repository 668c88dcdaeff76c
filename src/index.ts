/**
 * @module exchange-logger
 *
 * Request/response exchange logging with path-based data masking:
 * incoming HTTP middleware, an outgoing fetch wrapper, and the structured
 * logger that renders the records.
 */

// ─── Level Utilities ─────────────────────────────────────────────
export { resolveLevel, shouldIncludeStack, shouldLog } from "./core/levels.js";
// ─── Core ────────────────────────────────────────────────────────
export { createLogger } from "./core/logger.js";
// ─── Types ───────────────────────────────────────────────────────
export {
  type LogEntry,
  type LogError,
  type Logger,
  type LoggerOptions,
  LogLevel,
  type LogLevelName,
  LogLevelNameMap,
  type LogLevelValue,
  LogLevelValueMap,
  type LogMiddleware,
  type TimerResult,
  type Transformer,
} from "./core/types.js";
// ─── Configuration & Errors ──────────────────────────────────────
export {
  configSchema,
  DEFAULT_ENV_PREFIX,
  type ExchangeLoggerConfig,
  type ExchangeLoggerConfigInput,
  loadConfigFromEnv,
  parseConfig,
  parseEnvBoolean,
  resolveConfig,
} from "./core/config.js";
export {
  ConfigError,
  MaskNotRegisteredError,
  serializeError,
} from "./core/errors.js";
// ─── Masking ─────────────────────────────────────────────────────
export {
  MaskContext,
  MaskContextStack,
  type MaskNames,
  type MaskScope,
} from "./masking/context.js";
export { createMasker, Masker, type MaskerOptions } from "./masking/masker.js";
export {
  encodeQueryString,
  parseQueryString,
  type QueryValues,
} from "./masking/query-string.js";
export {
  ALL_MASK,
  MaskRegistry,
  type RegisterOptions,
} from "./masking/registry.js";
export {
  chainMask,
  MASK_STRING,
  type MaskProcessor,
  type MaskSettings,
  type PathTree,
  SensitivePaths,
} from "./masking/sensitive-paths.js";
// ─── Exchanges ───────────────────────────────────────────────────
export { logIncomingEvent } from "./exchange/incoming.js";
export { logOutgoingEvent } from "./exchange/outgoing.js";
export type {
  ExchangeAssembler,
  ExchangeEventInput,
} from "./exchange/record.js";
export {
  type ExchangeHandle,
  type ExchangeOptions,
  openExchange,
  trackExchange,
  trackIncoming,
  trackOutgoing,
} from "./exchange/scope.js";
export {
  calculateResponseTimeMs,
  formatTimestamp,
  TIMESTAMP_FORMAT,
} from "./exchange/timing.js";
export {
  type ExchangeMeta,
  type IncomingRequestInfo,
  type IncomingResponseInfo,
  isExchangeMeta,
  type MaskNameCarrier,
  NOT_LOGGED,
  type OutgoingRequestInfo,
  type OutgoingResponseInfo,
  RequestDirection,
  RequestEdge,
} from "./exchange/types.js";
// ─── Middleware ──────────────────────────────────────────────────
export {
  edgeEndFilterMiddleware,
  endEdgeOnly,
  isSmartEntry,
  passesEdgeEndFilter,
} from "./middleware/edge-filter.js";
export {
  createLoggedFetch,
  type LoggedFetch,
  type LoggedFetchOptions,
  type LoggedRequestInit,
} from "./middleware/fetch.js";
export {
  createHttpLogger,
  type HttpLoggerHandler,
  type HttpLoggerOptions,
  type HttpRequestMapper,
  type HttpResponseMapper,
  type NodeHttpRequest,
  type NodeHttpResponse,
  nodeHttpMappers,
} from "./middleware/http.js";
export {
  type MaskingMiddlewareOptions,
  maskingMiddleware,
} from "./middleware/masking.js";
// ─── Transformers ────────────────────────────────────────────────
export {
  type ConsoleTransportOptions,
  consoleTransport,
} from "./transformers/console.js";
export { createTransformer } from "./transformers/create-transformer.js";
export {
  type DatadogTransportOptions,
  datadogTransport,
  toDatadogAttributes,
} from "./transformers/datadog.js";
export {
  encodeTypedValues,
  type JsonFormatterOptions,
  type JsonTransportOptions,
  jsonFormatter,
  jsonTransport,
} from "./transformers/json.js";
export {
  type SmartFormatterOptions,
  type SmartTransportOptions,
  smartFormatter,
  smartTransport,
} from "./transformers/smart.js";
