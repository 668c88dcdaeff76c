/**
 * @module exchange-logger
 * @description Strict `application/x-www-form-urlencoded` parsing for masking.
 *
 * Every `&`-separated field must contain `=`; anything else is not a query
 * string. Values are grouped per key, so `a=1&a=2` → `{ a: ['1', '2'] }`.
 */

import { isPlainObject } from "./sensitive-paths.js";

export type QueryValues = Record<string, string[]>;

export function parseQueryString(text: string): QueryValues | undefined {
  if (text === "") return {};
  if (text.split("&").some((field) => !field.includes("="))) {
    return undefined;
  }

  const values: QueryValues = Object.create(null);
  for (const [key, value] of new URLSearchParams(text)) {
    const list = values[key];
    if (list) {
      list.push(value);
    } else {
      values[key] = [value];
    }
  }
  return { ...values };
}

/**
 * Encode masked data back to a query string. Array values repeat the key.
 */
export function encodeQueryString(data: Record<string, unknown>): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(data)) {
    if (Array.isArray(value)) {
      for (const item of value) params.append(key, encodeValue(item));
    } else {
      params.append(key, encodeValue(value));
    }
  }
  return params.toString();
}

function encodeValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (isPlainObject(value) || Array.isArray(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}
