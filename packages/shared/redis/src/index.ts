import Redis, { type RedisOptions } from "ioredis";

export const DEFAULT_REDIS_URL = "redis://127.0.0.1:6379";

/** Reconnect attempts a producer connection makes before it gives up and ends. */
export const PRODUCER_MAX_RECONNECTS = 10;

/** Backoff for producer reconnects; `null` ends the connection. */
export function producerRetryStrategy(times: number): number | null {
  if (times > PRODUCER_MAX_RECONNECTS) return null;
  return Math.min(times * 200, 2000);
}

export const producerRedisOptions: RedisOptions = {
  lazyConnect: true,
  // Commands issued while disconnected reject instead of waiting in the offline queue
  enableOfflineQueue: false,
  maxRetriesPerRequest: 1,
  retryStrategy: producerRetryStrategy,
};

/**
 * Connection for code that only adds jobs and reads counts. Commands fail fast
 * while Redis is unreachable, and after `PRODUCER_MAX_RECONNECTS` failed
 * reconnects the connection ends so pending readiness waits reject. Callers
 * own the connection and release it with `closeRedis`.
 */
export function createProducerRedis(url: string = DEFAULT_REDIS_URL): Redis {
  return new Redis(url, producerRedisOptions);
}

/** Quits a ready connection; anything else is dropped without waiting on Redis. */
export async function closeRedis(connection: Redis): Promise<void> {
  if (connection.status === "ready") {
    await connection.quit();
  } else {
    connection.disconnect();
  }
}

/** Replaces the password component of a Redis URL for logging. */
export function redactRedisUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) parsed.password = "[REDACTED]";
    return parsed.toString();
  } catch {
    return "[unparseable]";
  }
}
