import { loadConfig } from "@jetstream-sync/env";
import { redactRedisUrl } from "@jetstream-sync/redis";

/**
 * This script loads, validates, and prints the application configuration.
 * It redacts the Redis password to prevent it from being exposed in logs.
 */
function main() {
  try {
    const config = loadConfig();

    // Create a redacted version for safe logging
    const redactedConfig = {
      ...config,
      REDIS_URL: config.REDIS_URL ? redactRedisUrl(config.REDIS_URL) : undefined,
    };

    console.log(JSON.stringify(redactedConfig, null, 2));
  } catch (error) {
    console.error(
      "Error: Failed to load or validate configuration.",
      error instanceof Error ? error.message : error
    );
    process.exit(1);
  }
}

main();
