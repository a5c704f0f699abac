/**
 * Single-process RateLimitStore.
 *
 * Every method does its read-modify-write without awaiting, so each call is
 * atomic on the event loop. Counters are not shared between processes.
 *
 * Expired counters, windows and buckets are swept on write, at most once per
 * sweep interval, so memory tracks the set of recently active keys.
 */

import { bucketStart, fixedWindowKey, slidingWindowKey, tokenBucketKey } from "./keys.js";
import type {
  FixedWindowState,
  RateLimitStore,
  SlidingWindowState,
  TokenBucketParams,
  TokenBucketState,
} from "./types.js";

interface Counter {
  count: number;
  expiresAt: number;
}

interface SlidingLog {
  /** Admission timestamps, oldest first */
  scores: number[];
  /** When the newest score leaves the window */
  expiresAt: number;
}

interface Bucket {
  tokens: number;
  lastRefill: number;
  expiresAt: number;
}

function evictExpired<T extends { expiresAt: number }>(entries: Map<string, T>, nowMs: number): void {
  for (const [storageKey, entry] of entries) {
    if (entry.expiresAt <= nowMs) {
      entries.delete(storageKey);
    }
  }
}

export interface MemoryRateLimitStoreOptions {
  /** Minimum time between sweeps of expired entries (default: 1000) */
  sweepIntervalMs?: number;
}

export class MemoryRateLimitStore implements RateLimitStore {
  private readonly counters = new Map<string, Counter>();
  private readonly windows = new Map<string, SlidingLog>();
  private readonly buckets = new Map<string, Bucket>();
  private readonly sweepIntervalMs: number;
  private nextSweepAt = Number.NEGATIVE_INFINITY;

  constructor(options: MemoryRateLimitStoreOptions = {}) {
    this.sweepIntervalMs = options.sweepIntervalMs ?? 1000;
  }

  /** Entries currently held across every representation */
  get size(): number {
    return this.counters.size + this.windows.size + this.buckets.size;
  }

  async incrementFixedWindow(key: string, windowMs: number, nowMs: number): Promise<FixedWindowState> {
    this.sweep(nowMs);

    const storageKey = fixedWindowKey(key, bucketStart(nowMs, windowMs));
    const current = this.liveCounter(storageKey, nowMs);
    const next: Counter = current
      ? { count: current.count + 1, expiresAt: current.expiresAt }
      : { count: 1, expiresAt: bucketStart(nowMs, windowMs) + windowMs };
    this.counters.set(storageKey, next);
    return { count: next.count };
  }

  async slidingWindow(key: string, limit: number, windowMs: number, nowMs: number): Promise<SlidingWindowState> {
    this.sweep(nowMs);

    const storageKey = slidingWindowKey(key);
    const scores = this.prune(storageKey, windowMs, nowMs);

    let allowed = false;
    if (scores.length < limit) {
      scores.push(nowMs);
      allowed = true;
    }
    if (scores.length > 0) {
      this.windows.set(storageKey, { scores, expiresAt: scores[scores.length - 1] + windowMs });
    } else {
      this.windows.delete(storageKey);
    }

    return { allowed, count: scores.length, oldestMs: scores.length > 0 ? scores[0] : null };
  }

  async tokenBucket(key: string, params: TokenBucketParams, nowMs: number): Promise<TokenBucketState> {
    this.sweep(nowMs);

    const storageKey = tokenBucketKey(key);
    let tokens = this.refill(storageKey, params, nowMs);

    let allowed = false;
    if (tokens >= 1) {
      tokens -= 1;
      allowed = true;
    }
    this.buckets.set(storageKey, { tokens, lastRefill: nowMs, expiresAt: nowMs + params.windowMs * 2 });

    return { allowed, tokens };
  }

  async peekFixedWindow(key: string, windowMs: number, nowMs: number): Promise<FixedWindowState> {
    const counter = this.liveCounter(fixedWindowKey(key, bucketStart(nowMs, windowMs)), nowMs);
    return { count: counter?.count ?? 0 };
  }

  async peekSlidingWindow(key: string, windowMs: number, nowMs: number): Promise<Omit<SlidingWindowState, "allowed">> {
    const scores = this.prune(slidingWindowKey(key), windowMs, nowMs);
    return { count: scores.length, oldestMs: scores.length > 0 ? scores[0] : null };
  }

  async peekTokenBucket(
    key: string,
    params: TokenBucketParams,
    nowMs: number
  ): Promise<Omit<TokenBucketState, "allowed">> {
    return { tokens: this.refill(tokenBucketKey(key), params, nowMs) };
  }

  async reset(key: string, windowMs: number, nowMs: number): Promise<void> {
    this.counters.delete(fixedWindowKey(key, bucketStart(nowMs, windowMs)));
    this.windows.delete(slidingWindowKey(key));
    this.buckets.delete(tokenBucketKey(key));
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private sweep(nowMs: number): void {
    if (nowMs < this.nextSweepAt) {
      return;
    }
    this.nextSweepAt = nowMs + this.sweepIntervalMs;

    evictExpired(this.counters, nowMs);
    evictExpired(this.windows, nowMs);
    evictExpired(this.buckets, nowMs);
  }

  private liveCounter(storageKey: string, nowMs: number): Counter | undefined {
    const counter = this.counters.get(storageKey);
    if (counter && counter.expiresAt <= nowMs) {
      this.counters.delete(storageKey);
      return undefined;
    }
    return counter;
  }

  private prune(storageKey: string, windowMs: number, nowMs: number): number[] {
    const threshold = nowMs - windowMs;
    return (this.windows.get(storageKey)?.scores ?? []).filter((score) => score > threshold);
  }

  private refill(storageKey: string, params: TokenBucketParams, nowMs: number): number {
    const bucket = this.buckets.get(storageKey);
    if (!bucket || bucket.expiresAt <= nowMs) {
      return params.capacity;
    }
    const elapsed = Math.max(0, nowMs - bucket.lastRefill);
    return Math.min(params.capacity, bucket.tokens + (elapsed * params.refillRate) / params.windowMs);
  }
}
