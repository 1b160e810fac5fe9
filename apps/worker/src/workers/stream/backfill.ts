import type { ChunkReport, SessionStats } from '@jetstream-sync/types';

import type { ListenParams } from './connector';
import { chunkList } from './core/chunk';
import { describeError } from './errors';
import type { ClockPort, LoggerPort, ReportSinkPort } from './ports';

export type SessionRunner = (params: ListenParams) => Promise<SessionStats>;

export type BackfillOptions = {
  identities: readonly string[];
  chunkSize: number;
  /** Applied to every chunk; each chunk supplies its own `wantedIdentities`. */
  session: Omit<ListenParams, 'wantedIdentities'>;
  queueName: string;
  dryRun?: boolean;
  runSession: SessionRunner;
  reportSink: ReportSinkPort;
  clock: ClockPort;
  logger: LoggerPort;
};

export type BackfillSummary = {
  chunks: number;
  succeeded: number;
  failed: number;
  dryRun: boolean;
  recordsStored: number;
};

const IDENTITY_PREVIEW = 5;

export function summarizeIdentities(identities: readonly string[]): string {
  const preview = identities.slice(0, IDENTITY_PREVIEW).join(',');
  return identities.length > IDENTITY_PREVIEW ? `${preview}...` : preview;
}

/** The report's start column shows whichever lower bound the sessions were given. */
function startBound(session: BackfillOptions['session']): string {
  if (session.startTimestamp !== undefined) return session.startTimestamp;
  if (session.startCursor !== undefined) return String(session.startCursor);
  return '';
}

function roundSeconds(ms: number): number {
  return Math.round(ms / 10) / 100;
}

/**
 * Runs one connector session per identity chunk, strictly in order, and
 * appends a report row as soon as each chunk finishes. A failing chunk is
 * recorded as `ERROR: <message>` and the run moves on.
 */
export async function runBackfill(options: BackfillOptions): Promise<BackfillSummary> {
  const { session, clock, logger, reportSink } = options;
  const chunks = chunkList(options.identities, options.chunkSize);
  const summary: BackfillSummary = {
    chunks: chunks.length,
    succeeded: 0,
    failed: 0,
    dryRun: options.dryRun ?? false,
    recordsStored: 0,
  };

  logger.info('backfill.started', {
    identities: options.identities.length,
    chunks: chunks.length,
    chunkSize: options.chunkSize,
    dryRun: summary.dryRun,
  });

  for (const [index, identities] of chunks.entries()) {
    const chunkId = index + 1;
    const startedAt = clock.now();
    const base = {
      chunkId,
      startTime: startedAt.toISOString(),
      identityCount: identities.length,
      identities: summarizeIdentities(identities),
      collections: session.wantedCollections.join(','),
      startTimestamp: startBound(session),
      endTimestamp: session.endTimestamp ?? '',
      targetCount: session.targetCount,
      maxTime: session.maxTimeSeconds,
      queueName: options.queueName,
    };
    logger.info('backfill.chunk.started', { chunkId, of: chunks.length, identityCount: identities.length });

    let row: ChunkReport;
    if (summary.dryRun) {
      logger.info('backfill.chunk.dry_run', {
        chunkId,
        identityCount: identities.length,
        collections: session.wantedCollections,
        startTimestamp: session.startTimestamp ?? null,
        endTimestamp: session.endTimestamp ?? null,
        targetCount: session.targetCount,
        maxTimeSeconds: session.maxTimeSeconds,
      });
      row = {
        ...base,
        endTime: base.startTime,
        durationSeconds: 0,
        recordsStored: 0,
        latestCursor: '',
        currentDate: '',
        endCursorReached: false,
        status: 'DRY_RUN',
      };
    } else {
      try {
        const stats = await options.runSession({ ...session, wantedIdentities: identities });
        const finishedAt = clock.now();
        row = {
          ...base,
          endTime: finishedAt.toISOString(),
          durationSeconds: roundSeconds(finishedAt.getTime() - startedAt.getTime()),
          recordsStored: stats.recordsStored,
          latestCursor: stats.latestCursor === null ? '' : String(stats.latestCursor),
          currentDate: stats.currentDate ?? '',
          endCursorReached: stats.endCursorReached,
          status: 'SUCCESS',
        };
        summary.succeeded += 1;
        summary.recordsStored += stats.recordsStored;
        logger.info('backfill.chunk.completed', {
          chunkId,
          recordsStored: stats.recordsStored,
          durationSeconds: row.durationSeconds,
          endCursorReached: stats.endCursorReached,
        });
      } catch (err) {
        const finishedAt = clock.now();
        const { message } = describeError(err);
        row = {
          ...base,
          endTime: finishedAt.toISOString(),
          durationSeconds: roundSeconds(finishedAt.getTime() - startedAt.getTime()),
          recordsStored: 0,
          latestCursor: '',
          currentDate: '',
          endCursorReached: false,
          status: `ERROR: ${message}`,
        };
        summary.failed += 1;
        logger.error('backfill.chunk.failed', { chunkId, ...describeError(err) });
      }
    }

    await reportSink.append(row);
  }

  logger.info('backfill.completed', summary);
  return summary;
}
