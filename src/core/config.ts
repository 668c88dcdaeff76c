/**
 * @module exchange-logger
 * @description Configuration, validated with zod at startup, optionally read
 * from `EXCHANGE_LOGGER_*` environment variables.
 *
 * @example
 * ```ts
 * import { loadConfigFromEnv, createMasker } from 'exchange-logger';
 *
 * const config = loadConfigFromEnv();
 * const masker = createMasker({ config });
 * ```
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_ENV_PREFIX = "EXCHANGE_LOGGER";

/**
 * Configuration schema
 */
export const configSchema = z.object({
  /** Outgoing fetch calls are logged */
  enableOutboundRequestLogging: z.boolean().default(true),
  /** Incoming HTTP middleware logs */
  enableLoggingMiddleware: z.boolean().default(true),
  /** Masking switch: when false every rule set is a no-op */
  enableSensitivePathsProcessor: z.boolean().default(false),
  /** Keep keys (masking only values) under terminal rules */
  showNestedKeysInSensitivePaths: z.boolean().default(false),
  /** Attach JSON bodies of incoming-request responses */
  logResponseContent: z.boolean().default(false),
  maxVerboseOutputLength: z.number().int().nonnegative().default(500),
  /** 0 disables JSON payload truncation */
  maxJsonDataToLog: z.number().int().nonnegative().default(0),
  /** Path prefixes the HTTP middleware never logs */
  middlewareBlocklist: z
    .array(z.string(), {
      invalid_type_error: "middlewareBlocklist must be a list.",
    })
    .default(["/admin", "/swagger-docs"]),
  loggerName: z.string().min(1).default("exchange-logger"),
  /** Mask unparseable query strings entirely instead of leaving them */
  preferTextFallbackMasking: z.boolean().default(false),
});

/**
 * Validated and typed configuration object
 */
export type ExchangeLoggerConfig = z.infer<typeof configSchema>;

/** Configuration as callers write it; every key optional */
export type ExchangeLoggerConfigInput = z.input<typeof configSchema>;

type EnvKind = "boolean" | "number" | "list" | "string";

const ENV_KEYS = {
  enableOutboundRequestLogging: ["ENABLE_OUTBOUND_REQUEST_LOGGING", "boolean"],
  enableLoggingMiddleware: ["ENABLE_LOGGING_MIDDLEWARE", "boolean"],
  enableSensitivePathsProcessor: [
    "ENABLE_SENSITIVE_PATHS_PROCESSOR",
    "boolean",
  ],
  showNestedKeysInSensitivePaths: [
    "SHOW_NESTED_KEYS_IN_SENSITIVE_PATHS",
    "boolean",
  ],
  logResponseContent: ["LOG_RESPONSE_CONTENT", "boolean"],
  maxVerboseOutputLength: ["MAX_VERBOSE_OUTPUT_LENGTH", "number"],
  maxJsonDataToLog: ["MAX_JSON_DATA_TO_LOG", "number"],
  middlewareBlocklist: ["MIDDLEWARE_BLOCKLIST", "list"],
  loggerName: ["LOGGER_NAME", "string"],
  preferTextFallbackMasking: ["PREFER_TEXT_FALLBACK_MASKING", "boolean"],
} satisfies Record<keyof ExchangeLoggerConfig, [string, EnvKind]>;

/**
 * Validate raw configuration of unknown shape.
 * Throws a ConfigError listing every failing key.
 */
export function parseConfig(raw: unknown): ExchangeLoggerConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (result.success) return result.data;

  const issues = result.error.issues.map(
    (issue) => `${issue.path.join(".")}: ${issue.message}`,
  );
  throw new ConfigError(
    `Invalid exchange-logger configuration:\n  - ${issues.join("\n  - ")}`,
    issues,
  );
}

/**
 * Fill defaults for programmatic configuration.
 */
export function resolveConfig(
  input: ExchangeLoggerConfigInput = {},
): ExchangeLoggerConfig {
  return parseConfig(input);
}

/**
 * Truthiness the way env flags are usually written: "yes", "true", "T"...
 */
export function parseEnvBoolean(value: string): boolean {
  const first = value.trim().toLowerCase()[0];
  return first === "y" || first === "t";
}

/**
 * Read configuration from environment variables named `${prefix}_${KEY}`.
 * Unset variables keep their defaults.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  prefix: string = DEFAULT_ENV_PREFIX,
): ExchangeLoggerConfig {
  const raw: Record<string, unknown> = {};

  for (const [key, [envName, kind]] of Object.entries(ENV_KEYS)) {
    const name = `${prefix}_${envName}`;
    const value = env[name];
    if (value === undefined) continue;
    raw[key] = readEnvValue(name, value, kind);
  }

  return parseConfig(raw);
}

function readEnvValue(envName: string, value: string, kind: EnvKind): unknown {
  switch (kind) {
    case "boolean":
      return parseEnvBoolean(value);
    case "number":
      return Number(value);
    case "string":
      return value;
    case "list":
      try {
        return JSON.parse(value);
      } catch {
        throw new ConfigError(`${envName} must be a JSON list.`, [
          `${envName}: not valid JSON`,
        ]);
      }
  }
}
