// Relative path: packages/shared/queues/src/index.test.ts

/**
 * Test Purpose:
 * - Checks the queue helpers construct BullMQ queues on the caller's connection and release them after counting.
 *
 * Assumptions:
 * - `bullmq` is mocked and the ioredis client is created with `lazyConnect`, so no Redis server is contacted.
 *
 * Expected Outcome & Rationale:
 * - `readQueueLength` returns the job count and closes the queue it opened, even when counting fails.
 */
import { beforeEach, describe, expect, it, vi } from "vitest";
import Redis from "ioredis";

const queueMocks = vi.hoisted(() => {
  const constructed: Array<{ name: string; connection: unknown }> = [];
  return {
    constructed,
    count: vi.fn(async (): Promise<number> => 0),
    close: vi.fn(async (): Promise<void> => undefined),
  };
});

vi.mock("bullmq", () => ({
  Queue: class {
    constructor(name: string, options: { connection: unknown }) {
      queueMocks.constructed.push({ name, connection: options.connection });
    }
    count = queueMocks.count;
    close = queueMocks.close;
  },
}));

import { BATCH_JOB_NAME, createBatchQueue, readQueueLength } from "./index";

const connection = new Redis({ lazyConnect: true });

describe("queues", () => {
  beforeEach(() => {
    queueMocks.constructed.length = 0;
    queueMocks.count.mockReset();
    queueMocks.close.mockReset();
  });

  it("names flushed batches 'batch'", () => {
    expect(BATCH_JOB_NAME).toBe("batch");
  });

  it("creates the queue on the given connection", () => {
    createBatchQueue("jetstream_sync", connection);

    expect(queueMocks.constructed).toHaveLength(1);
    expect(queueMocks.constructed[0]?.name).toBe("jetstream_sync");
    expect(queueMocks.constructed[0]?.connection).toBe(connection);
  });

  it("counts jobs and closes the queue", async () => {
    queueMocks.count.mockResolvedValueOnce(7);

    await expect(readQueueLength("jetstream_sync", connection)).resolves.toBe(7);
    expect(queueMocks.close).toHaveBeenCalledTimes(1);
  });

  it("closes the queue when counting fails", async () => {
    queueMocks.count.mockRejectedValueOnce(new Error("NOAUTH Authentication required."));

    await expect(readQueueLength("jetstream_sync", connection)).rejects.toThrow("NOAUTH");
    expect(queueMocks.close).toHaveBeenCalledTimes(1);
  });
});
