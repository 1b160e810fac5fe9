// Relative path: packages/shared/queues/src/index.ts

import { Queue } from "bullmq";
import type Redis from "ioredis";
import type { BatchMetadata, SerializedRecord } from "@jetstream-sync/types";

/** Payload of one flushed batch; a single job per flush. */
export type BatchJob = {
  items: SerializedRecord[];
  metadata: BatchMetadata;
};

export const BATCH_JOB_NAME = "batch";

export function createQueue<T extends object>(name: string, connection: Redis): Queue<T> {
  // BullMQ accepts an ioredis instance via connection property
  const queue = new Queue<T>(name, {
    connection,
  });
  return queue;
}

export function createBatchQueue(name: string, connection: Redis): Queue<BatchJob> {
  return createQueue<BatchJob>(name, connection);
}

/** Opens the named queue just long enough to count its jobs. */
export async function readQueueLength(name: string, connection: Redis): Promise<number> {
  const queue = createBatchQueue(name, connection);
  try {
    return await queue.count();
  } finally {
    await queue.close();
  }
}
