import { loadConfig } from "@jetstream-sync/env";
import { readQueueLength } from "@jetstream-sync/queues";
import { closeRedis, createProducerRedis, redactRedisUrl } from "@jetstream-sync/redis";

/**
 * Prints how many batch jobs are waiting on the sync queue.
 * Usage: npm run queue:length [-- <queue name>]
 */
async function main() {
  const config = loadConfig();
  const queueName = process.argv[2] ?? config.SYNC_QUEUE_NAME;
  const connection = createProducerRedis(config.REDIS_URL);
  try {
    const length = await readQueueLength(queueName, connection);
    console.log(
      JSON.stringify({
        queue: queueName,
        redis: config.REDIS_URL ? redactRedisUrl(config.REDIS_URL) : "default",
        length,
      })
    );
  } finally {
    await closeRedis(connection);
  }
}

main().catch((error: unknown) => {
  console.error("Error: Failed to read queue length.", error instanceof Error ? error.message : error);
  process.exit(1);
});
