// Relative path: apps/worker/src/workers/runtime.ts
// Wires the streaming engine to its production adapters: ws for the source,
// a BullMQ queue on one fail-fast ioredis connection, the system clock and JSON logs.
import type { Config } from '@jetstream-sync/env';
import type { Queue } from 'bullmq';
import type Redis from 'ioredis';
import { createBatchQueue, type BatchJob } from '@jetstream-sync/queues';
import { closeRedis, createProducerRedis, redactRedisUrl, DEFAULT_REDIS_URL } from '@jetstream-sync/redis';
import type { SessionStats } from '@jetstream-sync/types';

import { BullmqQueue } from './stream/adapters/bullmqQueue';
import { SystemClock } from './stream/adapters/clock';
import { ConsoleLogger } from './stream/adapters/logger';
import { WebSocketSource } from './stream/adapters/websocketSource';
import { StreamConnector, type ListenParams } from './stream/connector';
import type { ClockPort, LoggerPort } from './stream/ports';

export type SessionRuntime = {
  logger: LoggerPort;
  clock: ClockPort;
  runSession(params: ListenParams): Promise<SessionStats>;
  /** Closes the queue and the Redis connection; call once at the end of the run. */
  close(): Promise<void>;
};

export function createLogger(config: Pick<Config, 'LOG_LEVEL'>): LoggerPort {
  return new ConsoleLogger(config.LOG_LEVEL);
}

export function sessionParamsFromConfig(config: Config): Omit<ListenParams, 'wantedIdentities'> {
  return {
    instance: config.JETSTREAM_INSTANCE,
    wantedCollections: config.JETSTREAM_COLLECTIONS,
    startCursor: config.JETSTREAM_START_CURSOR,
    startTimestamp: config.JETSTREAM_START_TIMESTAMP,
    endTimestamp: config.JETSTREAM_END_TIMESTAMP,
    targetCount: config.SYNC_TARGET_COUNT,
    maxTimeSeconds: config.SYNC_MAX_TIME_SECONDS,
  };
}

export function listenParamsFromConfig(config: Config): ListenParams {
  return { ...sessionParamsFromConfig(config), wantedIdentities: config.JETSTREAM_IDENTITIES };
}

/**
 * Builds everything a run needs around one Redis connection, opened by the
 * first session so a dry run never touches Redis. Each session gets a fresh
 * connector, and so a fresh batch, over the shared queue.
 */
export function createSessionRunner(config: Config, logger: LoggerPort = createLogger(config)): SessionRuntime {
  const redisUrl = config.REDIS_URL ?? DEFAULT_REDIS_URL;
  const clock = new SystemClock();
  const source = new WebSocketSource();
  let opened: { connection: Redis; queue: Queue<BatchJob> } | null = null;

  const open = () => {
    if (!opened) {
      const connection = createProducerRedis(redisUrl);
      opened = { connection, queue: createBatchQueue(config.SYNC_QUEUE_NAME, connection) };
      logger.info('runtime.queue_opened', { redis: redactRedisUrl(redisUrl), queue: config.SYNC_QUEUE_NAME });
    }
    return opened;
  };

  return {
    logger,
    clock,
    runSession: (params) =>
      new StreamConnector({
        source,
        queue: new BullmqQueue(open().queue),
        clock,
        logger,
        batchSize: config.SYNC_BATCH_SIZE,
      }).listen(params),
    close: async () => {
      if (!opened) return;
      const { connection, queue } = opened;
      opened = null;
      await queue.close();
      await closeRedis(connection);
    },
  };
}
