/**
 * Redis Client Factory
 *
 * One ioredis connection is shared by the cache and the rate limiter.
 */

import Redis from "ioredis";
import { createLogger } from "@hopline/logger";

const log = createLogger("redis");

export interface RedisClientOptions {
  url: string;
  /** Connection timeout in ms (default: 5000) */
  connectTimeout?: number;
  /** Per-command timeout in ms (default: 1000) */
  commandTimeout?: number;
  /** Max retries per request (default: 3) */
  maxRetries?: number;
}

export function createRedisClient(options: RedisClientOptions): Redis {
  const { url, connectTimeout = 5000, commandTimeout = 1000, maxRetries = 3 } = options;

  const client = new Redis(url, {
    connectTimeout,
    commandTimeout,
    maxRetriesPerRequest: maxRetries,
    enableReadyCheck: true,
    // Fail fast when disconnected; callers fall back to the repository or fail open
    enableOfflineQueue: false,
    retryStrategy: (times) => (times > 5 ? null : Math.min(times * 100, 2000)),
  });

  client.on("connect", () => log.info("connected"));
  client.on("error", (err: Error) => log.error({ err }, "redis error"));
  client.on("close", () => log.warn("connection closed"));

  return client;
}
