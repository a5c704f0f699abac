/**
 * HTTP Server Bootstrap
 *
 * Wires the stores selected by STORAGE_DRIVER into the resolver and rate
 * limiter, then serves the Hono app through @hono/node-server.
 *
 * Shutdown order: stop accepting connections, drain background work, then
 * close analytics, cache/Redis and the database pool.
 */

import { serve } from "@hono/node-server";
import {
  createAccessQueue,
  LoggingAnalyticsRecorder,
  QueueAnalyticsRecorder,
  type AnalyticsRecorder,
} from "@hopline/analytics";
import { createRedisClient, MemoryCacheStore, RedisCacheStore, type CacheStore } from "@hopline/cache";
import { createPool, InMemoryUrlRepository, PostgresUrlRepository, type UrlRepository } from "@hopline/db";
import { createLogger, type Logger } from "@hopline/logger";
import {
  MemoryRateLimitStore,
  RateLimiter,
  RedisRateLimitStore,
  type RateLimitStore,
} from "@hopline/ratelimit";
import { CACHE_CONFIG, createCodeGenerator, systemClock, type Clock } from "@hopline/shared";
import { createApp } from "./app.js";
import { BackgroundTasks } from "./background.js";
import * as metrics from "./metrics.js";
import { RedirectResolver } from "./resolver.js";
import type { Config } from "./types.js";

const log = createLogger("server");

/** How long shutdown waits for detached side effects */
const DRAIN_TIMEOUT_MS = 5_000;

export interface Services {
  repository: UrlRepository;
  cache: CacheStore;
  limiter: RateLimiter;
  analytics: AnalyticsRecorder;
  background: BackgroundTasks;
  resolver: RedirectResolver;
  /** Drain background work and release every connection */
  close(): Promise<void>;
}

interface Stores {
  repository: UrlRepository;
  cache: CacheStore;
  rateLimitStore: RateLimitStore;
}

function createStores(config: Config, clock: Clock, named: (name: string) => Logger): Stores {
  if (config.storage.driver === "memory") {
    return {
      repository: new InMemoryUrlRepository(clock),
      cache: new MemoryCacheStore(clock),
      rateLimitStore: new MemoryRateLimitStore(),
    };
  }

  // One connection serves both the cache and the rate limiter
  const redis = createRedisClient({ url: config.storage.redisUrl, commandTimeout: Math.max(config.redisTimeoutMs * 4, 200) });
  const pool = createPool({ connectionString: config.storage.databaseUrl, timeoutMs: config.dbTimeoutMs });

  return {
    repository: new PostgresUrlRepository(pool, { timeoutMs: config.dbTimeoutMs, logger: named("db") }),
    cache: new RedisCacheStore(redis, { ttlJitter: CACHE_CONFIG.TTL_JITTER }),
    rateLimitStore: new RedisRateLimitStore(redis),
  };
}

function createAnalytics(config: Config, clock: Clock, logger: Logger): AnalyticsRecorder {
  if (config.analyticsQueue === null || config.storage.driver === "memory") {
    return new LoggingAnalyticsRecorder({ clock, logger });
  }
  const queue = createAccessQueue({ redisUrl: config.storage.redisUrl, queueName: config.analyticsQueue });
  return new QueueAnalyticsRecorder(queue, { clock, logger });
}

/**
 * Build every component from configuration.
 */
export function createServices(config: Config, clock: Clock = systemClock): Services {
  // LOG_LEVEL from config wins over each logger's own default
  const named = (name: string): Logger => createLogger(name, { level: config.logLevel });

  const { repository, cache, rateLimitStore } = createStores(config, clock, named);
  const analytics = createAnalytics(config, clock, named("analytics"));
  const background = new BackgroundTasks({ ...config.background, logger: named("background") });

  const limiter = new RateLimiter(rateLimitStore, {
    ...config.rateLimit,
    timeoutMs: config.redisTimeoutMs,
    clock,
    logger: named("ratelimit"),
  });

  const resolver = new RedirectResolver({
    repository,
    cache,
    analytics,
    background,
    baseUrl: config.baseUrl,
    generator: createCodeGenerator({ mode: "collision-retry", length: config.shortCodeLength }),
    cacheTtlSeconds: config.cacheTtlSeconds,
    cacheTimeoutMs: config.redisTimeoutMs,
    clock,
    logger: named("resolver"),
  });

  const close = async (): Promise<void> => {
    const drained = await background.drain(DRAIN_TIMEOUT_MS);
    if (!drained) {
      log.warn({ active: background.active, pending: background.pending }, "shutting down with background work in flight");
    }

    const results = await Promise.allSettled([analytics.close(), cache.disconnect(), repository.close()]);
    for (const result of results) {
      if (result.status === "rejected") {
        log.error({ err: result.reason }, "shutdown error");
      }
    }
  };

  return { repository, cache, limiter, analytics, background, resolver, close };
}

/**
 * Start listening. Returns a function that shuts the server down.
 */
export function startServer(config: Config, services: Services = createServices(config)): () => Promise<void> {
  const app = createApp({ ...services, logger: createLogger("http", { level: config.logLevel }) });

  const server = serve({
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  });

  log.info({ host: config.host, port: config.port, storage: config.storage.driver }, "redirect service listening");

  return async () => {
    log.info("shutting down");
    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) {
          log.warn({ err }, "http server close error");
        }
        resolve();
      });
    });
    await services.close();
    log.info(metrics.getSummary(), "shutdown complete");
  };
}
