import { ConfigError } from "./errors.js";

export const API_KEY_ENV = "ELEVEN_API_STATS";
export const BASE_URL_ENV = "CREDSCOPE_BASE_URL";
export const DEFAULT_BASE_URL = "https://api.elevenlabs.io";

export interface CredscopeConfig {
  apiKey: string;
  baseUrl: string;
}

/**
 * Read the provider credentials from the environment.
 *
 * @throws ConfigError when the API key is missing or blank.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): CredscopeConfig {
  const apiKey = env[API_KEY_ENV]?.trim();
  if (!apiKey) {
    throw new ConfigError(
      `${API_KEY_ENV} environment variable not set. ` +
        `Please set your API key: export ${API_KEY_ENV}='your-api-key-here'`,
    );
  }

  const baseUrl = env[BASE_URL_ENV]?.trim() || DEFAULT_BASE_URL;
  return { apiKey, baseUrl: baseUrl.replace(/\/+$/, "") };
}
