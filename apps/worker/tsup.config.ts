/* Relative path: apps/worker/tsup.config.ts */

import { defineConfig } from "tsup"

export default defineConfig({
  entry: [
    "src/workers/sync.ts",
    "src/workers/backfillSync.ts",
  ],
  format: ["esm"],
  platform: "node",
  target: "node20",
  noExternal: [/^@jetstream-sync\//],
  clean: true,
})
