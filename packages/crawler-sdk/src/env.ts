import { AuthenticationError } from "./errors.js";

export const API_KEY_ENV = "CRAWLERVERSE_API_KEY";
export const BASE_URL_ENV = "CRAWLERVERSE_BASE_URL";
export const LOG_LEVEL_ENV = "CRAWLERVERSE_LOG_LEVEL";
export const DEBUG_ENV = "CRAWLERVERSE_DEBUG";

export const DEFAULT_BASE_URL = "https://crawlerver.se/api/agent";
export const DEFAULT_TIMEOUT_MS = 30_000;

export function getEnvValue(name: string): string | undefined {
  const value = process.env[name];
  return value === "" ? undefined : value;
}

/**
 * Resolve the bearer credential. An explicit key wins over
 * `CRAWLERVERSE_API_KEY`; with neither, no request can be authenticated.
 */
export function resolveApiKey(apiKey?: string): string {
  if (apiKey !== undefined) return apiKey;
  const envKey = getEnvValue(API_KEY_ENV);
  if (envKey !== undefined) return envKey;
  throw new AuthenticationError(
    `No API key provided. Pass apiKey or set the ${API_KEY_ENV} environment variable.`,
  );
}

export function resolveBaseUrl(baseUrl?: string): string {
  const raw = baseUrl ?? getEnvValue(BASE_URL_ENV) ?? DEFAULT_BASE_URL;
  return raw.trim().replace(/\/+$/, "");
}

export function isDebugEnabled(): boolean {
  const raw = (getEnvValue(DEBUG_ENV) ?? "").trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}
