/**
 * Client configuration from environment variables
 *
 * Values are coerced from strings and validated; unset variables take the
 * schema defaults.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigurationError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://web-api.tp.entsoe.eu/api";
export const DEFAULT_TIMEZONE = "Europe/Brussels";

export const ConfigSchema = Type.Object({
  apiKey: Type.Optional(Type.String({ minLength: 1 })),
  baseUrl: Type.String({ pattern: "^https?://", default: DEFAULT_BASE_URL }),
  timezone: Type.String({ minLength: 1, default: DEFAULT_TIMEZONE }),
  concurrency: Type.Integer({ minimum: 1, maximum: 32, default: 4 }),
  timeoutMs: Type.Integer({ minimum: 1, default: 30_000 }),
  maxRateLimitRetries: Type.Integer({ minimum: 0, default: 3 }),
  rateLimitBaseDelayMs: Type.Integer({ minimum: 0, default: 1000 }),
  maxNetworkRetries: Type.Integer({ minimum: 0, default: 2 }),
  networkBaseDelayMs: Type.Integer({ minimum: 0, default: 250 }),
  maxBackoffMs: Type.Integer({ minimum: 0, default: 30_000 }),
  minRequestIntervalMs: Type.Integer({ minimum: 0, default: 0 }),
});

export type EntsoeConfig = Static<typeof ConfigSchema>;

type ConfigKey = keyof EntsoeConfig;

export const ENV_VARIABLES: Readonly<Record<ConfigKey, string>> = {
  apiKey: "ENTSOE_API_KEY",
  baseUrl: "ENTSOE_BASE_URL",
  timezone: "ENTSOE_TIMEZONE",
  concurrency: "ENTSOE_CONCURRENCY",
  timeoutMs: "ENTSOE_TIMEOUT_MS",
  maxRateLimitRetries: "ENTSOE_MAX_RETRIES",
  rateLimitBaseDelayMs: "ENTSOE_RETRY_BASE_MS",
  maxNetworkRetries: "ENTSOE_MAX_NETWORK_RETRIES",
  networkBaseDelayMs: "ENTSOE_NETWORK_RETRY_BASE_MS",
  maxBackoffMs: "ENTSOE_MAX_BACKOFF_MS",
  minRequestIntervalMs: "ENTSOE_MIN_REQUEST_INTERVAL_MS",
};

function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(ENV_VARIABLES, key);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Read and validate configuration from an environment
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): EntsoeConfig {
  const raw: Record<string, string> = {};
  for (const [key, variable] of Object.entries(ENV_VARIABLES)) {
    const value = env[variable]?.trim();
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }

  const config = Value.Convert(ConfigSchema, Value.Default(ConfigSchema, raw));

  if (!Value.Check(ConfigSchema, config)) {
    const problems = [...Value.Errors(ConfigSchema, config)].map((error) => {
      const key = error.path.replace(/^\//, "");
      const variable = isConfigKey(key) ? ENV_VARIABLES[key] : key;
      return `${variable}: ${error.message}`;
    });
    throw new ConfigurationError(
      `Invalid configuration. ${problems.join("; ")}`,
      { problems }
    );
  }

  if (!isValidTimeZone(config.timezone)) {
    throw new ConfigurationError(
      `Invalid configuration. ${ENV_VARIABLES.timezone}: unknown time zone '${config.timezone}'`,
      { timezone: config.timezone }
    );
  }

  return config;
}
