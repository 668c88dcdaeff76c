/**
 * @module exchange-logger
 * @description Path-pattern mask rule sets.
 *
 * Patterns are `/`-delimited key paths. Leading and trailing slashes are
 * ignored, `*` matches any key at exactly one level, and a terminal `*` is
 * the same as stopping one segment earlier.
 *
 * @example
 * ```ts
 * const rules = new SensitivePaths('user/password', 'cards/*\/number');
 * // rules.rootPaths → { user: { password: true }, cards: { '*': { number: true } } }
 * ```
 */

export const MASK_STRING = "*** masked ***";

const WILDCARD = "*";

/** Compiled rule node: `true` masks here and everything below */
export type PathRule = true | PathRuleMap;
export type PathRuleMap = Map<string, PathRule>;

/** Plain-object view of a compiled rule tree */
export type PathTree = { [key: string]: true | PathTree };

/** Switches read on every `process` call */
export interface MaskSettings {
  /** Rule sets do nothing while false */
  enabled: boolean;
  /** Terminal rules keep mapping keys and mask only their values */
  showNestedKeys: boolean;
}

/**
 * Anything that can be registered as a named mask.
 * `process` mutates `data` in place.
 */
export interface MaskProcessor {
  process(data: unknown, settings: MaskSettings): void;
}

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Mask a whole value selected by a terminal rule.
 */
export function chainMask(data: unknown, showNestedKeys: boolean): unknown {
  if (data === null || data === undefined) return data;

  if (isPlainObject(data)) {
    if (showNestedKeys) {
      return Object.fromEntries(
        Object.keys(data).map((k): [string, string] => [k, MASK_STRING]),
      );
    }
    return { [MASK_STRING]: MASK_STRING };
  }
  if (Array.isArray(data)) {
    return data.map((item) => chainMask(item, showNestedKeys));
  }
  return MASK_STRING;
}

export class SensitivePaths implements MaskProcessor {
  private readonly _root: PathRuleMap = new Map();

  constructor(...patterns: string[]) {
    for (const pattern of patterns) {
      this._insert(pattern);
    }
  }

  /** Compiled tree as plain objects */
  get rootPaths(): PathTree {
    return toTree(this._root);
  }

  /**
   * Mask `data` in place. Does nothing unless `settings.enabled`.
   */
  process(data: unknown, settings: MaskSettings): void {
    if (!settings.enabled) return;
    sanitizeAny(this._root, data, settings.showNestedKeys);
  }

  private _insert(pattern: string): void {
    const keys = stripSlashes(pattern).split("/");
    let current = this._root;

    while (keys.length > 0) {
      const key = keys.shift() ?? "";

      if (keys.length === 1 && keys[0] === WILDCARD) {
        current.set(key, true);
        return;
      }
      if (keys.length === 0) {
        current.set(key, true);
        return;
      }

      let next = current.get(key);
      if (next === undefined) {
        next = new Map();
        current.set(key, next);
      }
      // An ancestor already masks everything below
      if (next === true) return;
      current = next;
    }
  }
}

function stripSlashes(pattern: string): string {
  let start = 0;
  let end = pattern.length;
  while (start < end && pattern[start] === "/") start++;
  while (end > start && pattern[end - 1] === "/") end--;
  return pattern.slice(start, end);
}

function toTree(rules: PathRuleMap): PathTree {
  return Object.fromEntries(
    [...rules].map(([key, rule]): [string, true | PathTree] => [
      key,
      rule === true ? true : toTree(rule),
    ]),
  );
}

function sanitizeAny(
  rules: PathRuleMap,
  data: unknown,
  showNestedKeys: boolean,
): void {
  if (isPlainObject(data)) {
    sanitizeObject(rules, data, showNestedKeys);
  } else if (Array.isArray(data)) {
    // Arrays do not consume a path segment
    for (const item of data) {
      sanitizeAny(rules, item, showNestedKeys);
    }
  }
}

function sanitizeObject(
  rules: PathRuleMap,
  data: Record<string, unknown>,
  showNestedKeys: boolean,
): void {
  const wildcard = rules.get(WILDCARD);

  if (wildcard === true) {
    if (showNestedKeys) {
      for (const key of Object.keys(data)) {
        assignOwn(data, key, MASK_STRING);
      }
    } else {
      for (const key of Object.keys(data)) {
        delete data[key];
      }
      assignOwn(data, MASK_STRING, MASK_STRING);
    }
  } else if (wildcard !== undefined) {
    for (const value of Object.values(data)) {
      sanitizeAny(wildcard, value, showNestedKeys);
    }
  }

  for (const [key, value] of Object.entries(data)) {
    const rule = rules.get(key);
    if (rule === undefined) continue;
    if (rule === true) {
      assignOwn(data, key, chainMask(value, showNestedKeys));
    } else {
      sanitizeAny(rule, value, showNestedKeys);
    }
  }
}

/** Plain assignment would hit the prototype setter for a "__proto__" key */
function assignOwn(
  data: Record<string, unknown>,
  key: string,
  value: unknown,
): void {
  Object.defineProperty(data, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}
