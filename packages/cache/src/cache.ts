/**
 * Redis and in-memory CacheStore implementations.
 *
 * Values are stored as plain strings (the original URL) under `url:<code>`.
 */

import type Redis from "ioredis";
import { CACHE_CONFIG, systemClock, type Clock } from "@hopline/shared";
import { createRedisClient, type RedisClientOptions } from "./client.js";
import type { CacheStore, CacheStoreOptions } from "./types.js";

/**
 * Spread a TTL by +/- `fraction` so keys written in a burst expire at different times.
 * Never returns less than one second.
 */
export function applyJitter(ttlSeconds: number, fraction: number, random: () => number = Math.random): number {
  const jitter = ttlSeconds * fraction * (random() * 2 - 1);
  return Math.max(1, Math.floor(ttlSeconds + jitter));
}

// ============================================================================
// Redis
// ============================================================================

export class RedisCacheStore implements CacheStore {
  private readonly client: Redis;
  private readonly ttlJitter: number;

  constructor(client: Redis, options: CacheStoreOptions = {}) {
    this.client = client;
    this.ttlJitter = options.ttlJitter ?? CACHE_CONFIG.TTL_JITTER;
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.setex(key, applyJitter(ttlSeconds, this.ttlJitter), value);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === "PONG";
    } catch {
      return false;
    }
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}

export function createRedisCacheStore(options: RedisClientOptions & CacheStoreOptions): RedisCacheStore {
  return new RedisCacheStore(createRedisClient(options), options);
}

// ============================================================================
// In-memory
// ============================================================================

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

/**
 * Single-process cache for development and tests. Expiry is evaluated lazily on read.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly now: Clock;

  constructor(clock: Clock = systemClock) {
    this.now = clock;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async disconnect(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
