import { BATCH_JOB_NAME, type BatchJob } from '@jetstream-sync/queues';
import type { BatchMetadata, SerializedRecord } from '@jetstream-sync/types';

import { StreamSyncError } from '../errors';
import type { QueuePort } from '../ports';

/** What the adapter needs from a BullMQ `Queue<BatchJob>`. */
export interface BatchQueueClient {
  readonly name: string;
  add(name: string, data: BatchJob): Promise<unknown>;
  count(): Promise<number>;
}

export type BullmqQueueOptions = {
  /** Upper bound on a single queue call; a call still pending after this fails with QUEUE_ERROR. */
  timeoutMs?: number;
};

export const DEFAULT_QUEUE_TIMEOUT_MS = 10_000;

/** One flushed batch becomes one `batch` job carrying the items and their metadata. */
export class BullmqQueue implements QueuePort {
  private readonly timeoutMs: number;

  constructor(
    private readonly queue: BatchQueueClient,
    options: BullmqQueueOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_QUEUE_TIMEOUT_MS;
  }

  async append(items: SerializedRecord[], metadata: BatchMetadata): Promise<void> {
    try {
      await this.withTimeout('add', this.queue.add(BATCH_JOB_NAME, { items, metadata }));
    } catch (err) {
      throw new StreamSyncError('QUEUE_ERROR', `failed to enqueue batch on ${this.queue.name}`, {
        cause: err,
        details: { queue: this.queue.name, batchSize: items.length },
      });
    }
  }

  async length(): Promise<number> {
    try {
      return await this.withTimeout('count', this.queue.count());
    } catch (err) {
      throw new StreamSyncError('QUEUE_ERROR', `failed to read the length of ${this.queue.name}`, {
        cause: err,
        details: { queue: this.queue.name },
      });
    }
  }

  private withTimeout<T>(operation: string, call: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`${operation} did not complete within ${this.timeoutMs}ms`)),
        this.timeoutMs,
      );
    });
    return Promise.race([call, expired]).finally(() => clearTimeout(timer));
  }
}
