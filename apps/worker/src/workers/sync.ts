// Relative path: apps/worker/src/workers/sync.ts
import * as path from 'path';

import { loadConfig, type Config } from '@jetstream-sync/env';
import type { SessionStats } from '@jetstream-sync/types';

import { createLogger, createSessionRunner, listenParamsFromConfig } from './runtime';
import { describeError } from './stream/errors';

/** One live-tail session from environment configuration. */
export async function runSync(config: Config): Promise<SessionStats> {
  const runtime = createSessionRunner(config);
  try {
    const stats = await runtime.runSession(listenParamsFromConfig(config));
    // restart from here with JETSTREAM_START_CURSOR
    runtime.logger.info('sync.resume_cursor', { cursor: stats.latestCursor });
    return stats;
  } finally {
    await runtime.close();
  }
}

// Run a single session when invoked directly (e.g., via npm run sync)
(() => {
  const invokedPath = process.argv[1] ?? '';
  if (!/^sync\.[cm]?[jt]s$/.test(path.basename(invokedPath))) return;

  let config: Config;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(JSON.stringify({ level: 'error', event: 'sync.failed', ...describeError(err) }));
    process.exit(1);
  }
  const logger = createLogger(config);

  runSync(config)
    .then((stats) => {
      logger.info('sync.completed', { stopReason: stats.stopReason, recordsStored: stats.recordsStored });
      process.exit(0);
    })
    .catch((err: unknown) => {
      logger.error('sync.failed', describeError(err));
      process.exit(1);
    });
})();
