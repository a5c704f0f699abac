/**
 * RateLimiter
 *
 * One policy per limiter, chosen at construction:
 *
 * | policy         | store operation        | window                          |
 * |----------------|------------------------|---------------------------------|
 * | fixed_window   | INCR on a time bucket  | hard edges, up to 2x at a seam  |
 * | sliding_window | sorted-set prune+add   | trailing `windowMs`             |
 * | token_bucket   | refill-and-consume     | bursts up to `capacity`         |
 *
 * Store failures fail open unless `failOpen: false`, in which case they
 * surface as UNAVAILABLE.
 */

import { createLogger, type Logger } from "@hopline/logger";
import { systemClock, unavailableError, validationError, withDeadline, type Clock } from "@hopline/shared";
import { bucketStart } from "./keys.js";
import {
  RATE_LIMIT_POLICIES,
  type RateLimitDecision,
  type RateLimitInfo,
  type RateLimitPolicy,
  type RateLimitStore,
  type RateLimiterConfig,
  type TokenBucketParams,
} from "./types.js";

// ============================================================================
// Policy Resolution
// ============================================================================

function isPolicy(value: string): value is RateLimitPolicy {
  return RATE_LIMIT_POLICIES.some((policy) => policy === value);
}

export function resolvePolicy(raw: string, log?: Logger): RateLimitPolicy {
  const normalized = raw.trim().toLowerCase().replace(/-/g, "_");
  if (isPolicy(normalized)) return normalized;
  log?.warn({ policy: raw }, "unknown rate limit policy, using sliding_window");
  return "sliding_window";
}

// ============================================================================
// Strategies
// ============================================================================

type Evaluation = Omit<RateLimitDecision, "key" | "policy" | "windowMs">;
type Snapshot = Omit<RateLimitInfo, "key" | "policy" | "windowMs">;

interface Strategy {
  consume(key: string, nowMs: number): Promise<Evaluation>;
  peek(key: string, nowMs: number): Promise<Snapshot>;
}

interface StrategyParams {
  limit: number;
  windowMs: number;
  bucket: TokenBucketParams;
}

function fixedWindow(store: RateLimitStore, { limit, windowMs }: StrategyParams): Strategy {
  const snapshot = (count: number, nowMs: number): Snapshot => ({
    count,
    limit,
    remaining: Math.max(0, limit - count),
    resetAt: bucketStart(nowMs, windowMs) + windowMs,
  });

  return {
    async consume(key, nowMs) {
      const { count } = await store.incrementFixedWindow(key, windowMs, nowMs);
      const state = snapshot(count, nowMs);
      const allowed = count <= limit;
      return { ...state, allowed, retryAfterMs: allowed ? 0 : state.resetAt - nowMs };
    },
    async peek(key, nowMs) {
      const { count } = await store.peekFixedWindow(key, windowMs, nowMs);
      return snapshot(count, nowMs);
    },
  };
}

function slidingWindow(store: RateLimitStore, { limit, windowMs }: StrategyParams): Strategy {
  const snapshot = (count: number, oldestMs: number | null, nowMs: number): Snapshot => ({
    count,
    limit,
    remaining: Math.max(0, limit - count),
    resetAt: oldestMs === null ? nowMs : oldestMs + windowMs,
  });

  return {
    async consume(key, nowMs) {
      const { allowed, count, oldestMs } = await store.slidingWindow(key, limit, windowMs, nowMs);
      const state = snapshot(count, oldestMs, nowMs);
      return { ...state, allowed, retryAfterMs: allowed ? 0 : Math.max(0, state.resetAt - nowMs) };
    },
    async peek(key, nowMs) {
      const { count, oldestMs } = await store.peekSlidingWindow(key, windowMs, nowMs);
      return snapshot(count, oldestMs, nowMs);
    },
  };
}

function tokenBucket(store: RateLimitStore, { bucket }: StrategyParams): Strategy {
  const msPerToken = bucket.windowMs / bucket.refillRate;
  const snapshot = (tokens: number, nowMs: number): Snapshot => {
    const remaining = Math.floor(tokens);
    return {
      count: bucket.capacity - remaining,
      limit: bucket.capacity,
      remaining,
      resetAt: nowMs + Math.ceil((bucket.capacity - tokens) * msPerToken),
    };
  };

  return {
    async consume(key, nowMs) {
      const { allowed, tokens } = await store.tokenBucket(key, bucket, nowMs);
      return {
        ...snapshot(tokens, nowMs),
        allowed,
        retryAfterMs: allowed ? 0 : Math.ceil((1 - tokens) * msPerToken),
      };
    },
    async peek(key, nowMs) {
      const { tokens } = await store.peekTokenBucket(key, bucket, nowMs);
      return snapshot(tokens, nowMs);
    },
  };
}

const STRATEGIES: Record<RateLimitPolicy, (store: RateLimitStore, params: StrategyParams) => Strategy> = {
  fixed_window: fixedWindow,
  sliding_window: slidingWindow,
  token_bucket: tokenBucket,
};

// ============================================================================
// RateLimiter
// ============================================================================

export class RateLimiter {
  readonly policy: RateLimitPolicy;
  readonly limit: number;
  readonly windowMs: number;

  private readonly store: RateLimitStore;
  private readonly strategy: Strategy;
  private readonly failOpen: boolean;
  private readonly timeoutMs: number;
  private readonly now: Clock;
  private readonly log: Logger;

  constructor(store: RateLimitStore, config: RateLimiterConfig) {
    if (!Number.isInteger(config.limit) || config.limit <= 0) {
      throw validationError("Rate limit must be a positive integer", { limit: config.limit });
    }
    if (!(config.windowMs > 0)) {
      throw validationError("Rate limit window must be positive", { windowMs: config.windowMs });
    }

    this.log = config.logger ?? createLogger("ratelimit");
    this.store = store;
    this.policy = resolvePolicy(config.policy, this.log);
    this.windowMs = config.windowMs;
    this.failOpen = config.failOpen ?? true;
    this.timeoutMs = config.timeoutMs ?? 0;
    this.now = config.clock ?? systemClock;

    const bucket: TokenBucketParams = {
      capacity: config.capacity ?? config.limit,
      refillRate: config.refillRate ?? config.limit,
      windowMs: config.windowMs,
    };
    if (!(bucket.capacity > 0) || !(bucket.refillRate > 0)) {
      throw validationError("Token bucket capacity and refill rate must be positive", {
        capacity: bucket.capacity,
        refillRate: bucket.refillRate,
      });
    }

    this.limit = this.policy === "token_bucket" ? bucket.capacity : config.limit;
    this.strategy = STRATEGIES[this.policy](store, { limit: config.limit, windowMs: config.windowMs, bucket });
  }

  async allow(key: string): Promise<boolean> {
    return (await this.check(key)).allowed;
  }

  /**
   * Consume one unit for `key` and report the resulting state.
   */
  async check(key: string): Promise<RateLimitDecision> {
    const nowMs = this.now();
    try {
      const result = await withDeadline(this.strategy.consume(key, nowMs), this.timeoutMs, "ratelimit.check");
      return { key, policy: this.policy, windowMs: this.windowMs, ...result };
    } catch (err) {
      if (!this.failOpen) {
        throw unavailableError("Rate limiter unavailable", { retryable: true, cause: err });
      }
      this.log.warn({ err, key, policy: this.policy }, "rate limit check failed, allowing request");
      return {
        key,
        policy: this.policy,
        windowMs: this.windowMs,
        count: 0,
        limit: this.limit,
        remaining: this.limit,
        resetAt: nowMs + this.windowMs,
        allowed: true,
        retryAfterMs: 0,
        degraded: true,
      };
    }
  }

  /**
   * Current usage for `key` without consuming anything.
   */
  async info(key: string): Promise<RateLimitInfo> {
    const nowMs = this.now();
    try {
      const snapshot = await withDeadline(this.strategy.peek(key, nowMs), this.timeoutMs, "ratelimit.info");
      return { key, policy: this.policy, windowMs: this.windowMs, ...snapshot };
    } catch (err) {
      throw unavailableError("Rate limit info unavailable", { retryable: true, cause: err });
    }
  }

  async reset(key: string): Promise<void> {
    try {
      await withDeadline(this.store.reset(key, this.windowMs, this.now()), this.timeoutMs, "ratelimit.reset");
    } catch (err) {
      throw unavailableError("Rate limit reset failed", { retryable: true, cause: err });
    }
  }
}
