import type { BatchMetadata, StreamRecord } from '@jetstream-sync/types';

import { serializeRecord, type SessionContext } from './core/extract';
import { StreamSyncError, describeError } from './errors';
import type { ClockPort, LoggerPort, QueuePort } from './ports';

export type FlushResult =
  | { status: 'flushed'; size: number }
  | { status: 'empty' }
  | { status: 'failed'; size: number; error: unknown };

export type BatchWriterDependencies = {
  queue: QueuePort;
  clock: ClockPort;
  logger: LoggerPort;
  context: SessionContext;
  batchSize: number;
};

/**
 * Accumulates records for one session and hands them to the queue in batches.
 *
 * A failed flush keeps the pending batch intact, so the same records (plus any
 * staged since) go out again on the next trigger. Delivery is at-least-once:
 * a queue that partially committed before failing will see duplicates, and
 * records left pending after the final flush fails never reach the queue.
 */
export class BatchWriter {
  private pending: StreamRecord[] = [];
  private flushed = 0;
  private failures = 0;

  constructor(private readonly deps: BatchWriterDependencies) {
    if (!Number.isInteger(deps.batchSize) || deps.batchSize < 1) {
      throw new StreamSyncError('CONFIG_ERROR', 'batchSize must be an integer >= 1', {
        details: { batchSize: deps.batchSize },
      });
    }
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  get batchesFlushed(): number {
    return this.flushed;
  }

  get flushFailures(): number {
    return this.failures;
  }

  /** Appends a record; flushes before returning once the batch threshold is met. */
  async stage(record: StreamRecord): Promise<FlushResult | null> {
    this.pending.push(record);
    if (this.pending.length >= this.deps.batchSize) {
      return this.flush();
    }
    return null;
  }

  async flush(): Promise<FlushResult> {
    const result = await this.attemptAppend();
    if (result.status === 'flushed') {
      this.pending = [];
    }
    return result;
  }

  /** Called once at session end whatever the batch size, including zero. */
  async flushRemaining(): Promise<FlushResult> {
    const result = await this.flush();
    if (result.status === 'failed') {
      this.deps.logger.error('batch.final_flush_failed', {
        unflushedRecords: result.size,
        ...describeError(result.error),
      });
    }
    return result;
  }

  private async attemptAppend(): Promise<FlushResult> {
    const { queue, clock, logger, context } = this.deps;
    if (this.pending.length === 0) {
      return { status: 'empty' };
    }

    const size = this.pending.length;
    const metadata: BatchMetadata = {
      flushTime: clock.now().toISOString(),
      batchSize: size,
      collections: [...context.collectionsSeen],
    };

    try {
      await queue.append(this.pending.map(serializeRecord), metadata);
    } catch (error) {
      this.failures += 1;
      logger.error('batch.flush_failed', { size, failures: this.failures, ...describeError(error) });
      return { status: 'failed', size, error };
    }

    this.flushed += 1;
    logger.info('batch.flushed', { size, collections: metadata.collections });
    return { status: 'flushed', size };
  }
}
