/**
 * @module exchange-logger
 * @description Sanitize entry points. Decides which rule
 * sets apply and runs them over a private copy of the data.
 *
 * Applied names = explicit names ∪ names of the current mask scope ∪ global
 * names, in that order.
 *
 * @example
 * ```ts
 * import { createMasker, SensitivePaths } from 'exchange-logger';
 *
 * const masker = createMasker({ config: { enableSensitivePathsProcessor: true } });
 * masker.register('auth', new SensitivePaths('password', 'tokens/*'), { isGlobal: true });
 *
 * masker.sanitizeData({ user: 'ada', password: 'pw' });
 * // → { user: 'ada', password: '*** masked ***' }
 *
 * masker.sanitizeQueryString('password=pw&user=ada');
 * // → 'password=***+masked+***&user=ada'
 * ```
 */

import {
  type ExchangeLoggerConfig,
  type ExchangeLoggerConfigInput,
  resolveConfig,
} from "../core/config.js";
import { MaskNotRegisteredError } from "../core/errors.js";
import { MaskContext, type MaskNames, type MaskScope } from "./context.js";
import { encodeQueryString, parseQueryString } from "./query-string.js";
import { MaskRegistry, type RegisterOptions } from "./registry.js";
import {
  isPlainObject,
  MASK_STRING,
  type MaskProcessor,
  type MaskSettings,
} from "./sensitive-paths.js";

export interface MaskerOptions {
  config?: ExchangeLoggerConfigInput;
  /** Share a registry between maskers (default: a fresh one with `ALL`) */
  registry?: MaskRegistry;
  context?: MaskContext;
}

/**
 * Deep copy of plain objects and arrays. Every other value (functions,
 * class instances, dates) is shared by reference.
 */
export function copyData<T>(value: T): T;
export function copyData(value: unknown): unknown {
  if (Array.isArray(value)) return value.map((item) => copyData(item));
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, copyData(item)]),
    );
  }
  return value;
}

export class Masker {
  readonly registry: MaskRegistry;
  readonly context: MaskContext;
  private _config: ExchangeLoggerConfig;

  constructor(options: MaskerOptions = {}) {
    this._config = resolveConfig(options.config);
    this.registry = options.registry ?? new MaskRegistry();
    this.context = options.context ?? new MaskContext();
  }

  get config(): ExchangeLoggerConfig {
    return this._config;
  }

  /** Replace configuration values; the result is validated again */
  configure(updates: ExchangeLoggerConfigInput): void {
    this._config = resolveConfig({ ...this._config, ...updates });
  }

  get settings(): MaskSettings {
    return {
      enabled: this._config.enableSensitivePathsProcessor,
      showNestedKeys: this._config.showNestedKeysInSensitivePaths,
    };
  }

  // ─── Registry ──────────────────────────────────────────────

  register(
    name: string,
    processor: MaskProcessor,
    options?: RegisterOptions,
  ): void {
    this.registry.register(name, processor, options);
  }

  unregister(name: string): void {
    this.registry.unregister(name);
  }

  // ─── Scopes ────────────────────────────────────────────────

  /** Run `fn` with extra mask names active for everything it sanitizes */
  withMasks<T>(names: MaskNames, fn: () => T): T {
    return this.context.run(names, fn);
  }

  /** Push mask names until the returned scope is released */
  enter(names: MaskNames): MaskScope {
    return this.context.enter(names);
  }

  /** Every name a sanitize call with `explicit` names would apply */
  resolveNames(explicit: Iterable<string> = []): Set<string> {
    const names = new Set(explicit);
    for (const name of this.context.activeNames()) names.add(name);
    for (const name of this.registry.globalNames()) names.add(name);
    return names;
  }

  // ─── Sanitize ──────────────────────────────────────────────

  /**
   * Return a masked deep copy of `data`. The input is never mutated.
   * Throws MaskNotRegisteredError for an unknown name.
   */
  sanitizeData<T>(data: T, ...names: string[]): T {
    const processors = this._processorsFor(names);
    const masked = copyData(data);
    const settings = this.settings;
    for (const processor of processors) {
      processor.process(masked, settings);
    }
    return masked;
  }

  /**
   * Mask a query string. Text that does not parse is returned as is, or
   * replaced by the placeholder when `preferTextFallbackMasking` is set.
   */
  sanitizeQueryString(text: string, ...names: string[]): string {
    const parsed = parseQueryString(text);
    if (parsed === undefined) {
      return this._config.preferTextFallbackMasking ? MASK_STRING : text;
    }
    return encodeQueryString(this.sanitizeData(parsed, ...names));
  }

  /**
   * Mask request data of any shape: mappings and arrays directly, strings as
   * query strings. Anything else is returned unchanged.
   */
  sanitizeRequestData(data: unknown, ...names: string[]): unknown {
    if (isPlainObject(data) || Array.isArray(data)) {
      return this.sanitizeData(data, ...names);
    }
    if (typeof data === "string") {
      return this.sanitizeQueryString(data, ...names);
    }
    return data;
  }

  /**
   * Mask the query component of a URL. A query that does not parse is left
   * alone, whatever `preferTextFallbackMasking` says.
   */
  sanitizeUrl(url: string, ...names: string[]): string {
    const queryStart = url.indexOf("?");
    if (queryStart === -1) return url;

    const hashStart = url.indexOf("#", queryStart);
    const queryEnd = hashStart === -1 ? url.length : hashStart;
    const query = url.slice(queryStart + 1, queryEnd);

    const parsed = parseQueryString(query);
    if (parsed === undefined || query === "") return url;

    const masked = encodeQueryString(this.sanitizeData(parsed, ...names));
    return `${url.slice(0, queryStart + 1)}${masked}${url.slice(queryEnd)}`;
  }

  private _processorsFor(explicit: string[]): MaskProcessor[] {
    const processors: MaskProcessor[] = [];
    for (const name of this.resolveNames(explicit)) {
      const processor = this.registry.get(name);
      if (!processor) throw new MaskNotRegisteredError(name);
      processors.push(processor);
    }
    return processors;
  }
}

/**
 * Create a masker with its own registry and scope context.
 */
export function createMasker(options?: MaskerOptions): Masker {
  return new Masker(options);
}
