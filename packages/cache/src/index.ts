/**
 * @hopline/cache - CacheStore contract and its Redis / in-memory implementations.
 */

export { RedisCacheStore, MemoryCacheStore, createRedisCacheStore, applyJitter } from "./cache.js";
export { createRedisClient, type RedisClientOptions } from "./client.js";
export type { CacheStore, CacheStoreOptions } from "./types.js";
