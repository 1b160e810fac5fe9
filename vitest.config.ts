import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const rootDir = path.dirname(fileURLToPath(import.meta.url));
const fromRoot = (segment: string) => path.resolve(rootDir, segment);

export default defineConfig({
  test: {
    // Look for test files in all packages
    include: ["packages/**/*.test.ts", "apps/**/*.test.ts"],
    // Exclude node_modules and build artifacts
    exclude: ["**/node_modules/**", "**/dist/**"],
    environment: "node",
  },
  resolve: {
    alias: [
      { find: "@jetstream-sync/env", replacement: fromRoot("packages/env/src") },
      { find: "@jetstream-sync/types", replacement: fromRoot("packages/types/src") },
      { find: "@jetstream-sync/cursor", replacement: fromRoot("packages/shared/cursor/src") },
      { find: "@jetstream-sync/redis", replacement: fromRoot("packages/shared/redis/src") },
      { find: "@jetstream-sync/queues", replacement: fromRoot("packages/shared/queues/src") },
    ],
  },
});
