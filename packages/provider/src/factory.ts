import type { ProviderConfig, UsageProvider } from "./types.js";
import { ElevenLabsClient } from "./elevenlabs.js";
import { ConfigError } from "@credscope/core";

/**
 * Creates a usage provider client based on the given configuration.
 * Validates that the required credentials are present for the selected provider.
 */
export function createUsageProvider(config: ProviderConfig): UsageProvider {
  switch (config.provider) {
    case "elevenlabs": {
      if (!config.apiKey) {
        throw new ConfigError("ElevenLabs usage provider requires an apiKey");
      }
      return new ElevenLabsClient(config.apiKey, config.baseUrl);
    }

    default: {
      const exhaustive: never = config.provider;
      throw new ConfigError(`Unknown usage provider: ${String(exhaustive)}`);
    }
  }
}
