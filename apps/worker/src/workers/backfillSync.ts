// Relative path: apps/worker/src/workers/backfillSync.ts
import * as path from 'path';

import { loadConfig, type Config } from '@jetstream-sync/env';

import { createLogger, createSessionRunner, sessionParamsFromConfig } from './runtime';
import { runBackfill, type BackfillSummary } from './stream/backfill';
import { CsvReportSink } from './stream/adapters/csvReportSink';
import { loadIdentities } from './stream/adapters/identities';
import { StreamSyncError, describeError } from './stream/errors';

export type BackfillRunResult = BackfillSummary & { reportPath: string };

/** Backfills every identity in BACKFILL_IDENTITIES_FILE, one chunk per session. */
export async function runBackfillSync(config: Config): Promise<BackfillRunResult> {
  if (!config.BACKFILL_IDENTITIES_FILE) {
    throw new StreamSyncError('CONFIG_ERROR', 'BACKFILL_IDENTITIES_FILE is required for a backfill run');
  }
  const identities = await loadIdentities(config.BACKFILL_IDENTITIES_FILE, config.BACKFILL_IDENTITY_COLUMN);
  const runtime = createSessionRunner(config);
  const reportSink = await CsvReportSink.create({ outputDir: config.BACKFILL_OUTPUT_DIR, clock: runtime.clock });
  runtime.logger.info('backfill.report', { path: reportSink.filePath });

  try {
    const summary = await runBackfill({
      identities,
      chunkSize: config.BACKFILL_CHUNK_SIZE,
      session: sessionParamsFromConfig(config),
      queueName: config.SYNC_QUEUE_NAME,
      dryRun: config.BACKFILL_DRY_RUN,
      runSession: runtime.runSession,
      reportSink,
      clock: runtime.clock,
      logger: runtime.logger,
    });
    return { ...summary, reportPath: reportSink.filePath };
  } finally {
    await reportSink.close();
    await runtime.close();
  }
}

// Run the whole backfill when invoked directly (e.g., via npm run backfill)
(() => {
  const invokedPath = process.argv[1] ?? '';
  if (!/^backfillSync\.[cm]?[jt]s$/.test(path.basename(invokedPath))) return;

  let config: Config;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(JSON.stringify({ level: 'error', event: 'backfill.failed', ...describeError(err) }));
    process.exit(1);
  }
  const logger = createLogger(config);

  runBackfillSync(config)
    .then((result) => {
      logger.info('backfill.finished', result);
      process.exit(result.failed > 0 ? 1 : 0);
    })
    .catch((err: unknown) => {
      logger.error('backfill.failed', describeError(err));
      process.exit(1);
    });
})();
