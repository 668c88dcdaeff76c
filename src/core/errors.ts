/**
 * @module exchange-logger
 * @description Error classes and error serialization for log records.
 */

import type { LogError } from "./types.js";

/** Invalid configuration. Thrown at startup, never while logging. */
export class ConfigError extends Error {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** A sanitize call named a mask rule set that is not registered. */
export class MaskNotRegisteredError extends Error {
  maskName: string;

  constructor(maskName: string) {
    super(`Mask processor "${maskName}" is not registered`);
    this.name = "MaskNotRegisteredError";
    this.maskName = maskName;
  }
}

// ─── Error Serialization ─────────────────────────────────────────

/** Recursively serialize an Error including the ES2022 cause chain */
export function serializeError(
  error: Error,
  includeStack: boolean,
  depth = 0,
): LogError {
  const logError: LogError = {
    message: error.message,
    name: error.name,
    code: readErrorCode(error),
  };
  if (includeStack) {
    logError.stack = error.stack;
  }
  // Cap depth at 5 to stop on cyclic causes
  if (error.cause instanceof Error && depth < 5) {
    logError.cause = serializeError(error.cause, includeStack, depth + 1);
  }
  return logError;
}

/** Normalize anything thrown into an Error */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown;
  return new Error(typeof thrown === "string" ? thrown : String(thrown));
}

function readErrorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
