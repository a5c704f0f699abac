/**
 * @hopline/ratelimit - fixed window, sliding window and token bucket limiting
 * over a shared counter store.
 *
 * ```ts
 * const limiter = new RateLimiter(new RedisRateLimitStore(redis), {
 *   policy: "sliding_window",
 *   limit: 100,
 *   windowMs: 60_000,
 * });
 * const { allowed, retryAfterMs } = await limiter.check(ipKey(clientIp));
 * ```
 */

export { RateLimiter, resolvePolicy } from "./limiter.js";
export { RedisRateLimitStore } from "./redis-store.js";
export { MemoryRateLimitStore, type MemoryRateLimitStoreOptions } from "./memory-store.js";
export {
  normalizeIp,
  ipKey,
  userKey,
  apiKeyKey,
  endpointKey,
  globalKey,
  compositeKey,
} from "./keys.js";
export { RATE_LIMIT_POLICIES } from "./types.js";
export type {
  RateLimitPolicy,
  RateLimitStore,
  RateLimiterConfig,
  RateLimitInfo,
  RateLimitDecision,
  FixedWindowState,
  SlidingWindowState,
  TokenBucketState,
  TokenBucketParams,
} from "./types.js";
