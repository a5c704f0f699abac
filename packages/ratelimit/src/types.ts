/**
 * Rate limit Type Definitions
 */

import type { Logger } from "@hopline/logger";
import type { Clock } from "@hopline/shared";

export const RATE_LIMIT_POLICIES = ["fixed_window", "sliding_window", "token_bucket"] as const;

export type RateLimitPolicy = (typeof RATE_LIMIT_POLICIES)[number];

// ============================================================================
// Store
// ============================================================================

export interface FixedWindowState {
  /** Requests counted in the current bucket, including this one when incrementing */
  count: number;
}

export interface SlidingWindowState {
  allowed: boolean;
  /** Entries in the trailing window after this call */
  count: number;
  /** Score of the oldest entry still inside the window, null when empty */
  oldestMs: number | null;
}

export interface TokenBucketState {
  allowed: boolean;
  /** Fractional tokens left after this call */
  tokens: number;
}

export interface TokenBucketParams {
  capacity: number;
  /** Tokens added per window */
  refillRate: number;
  windowMs: number;
}

/**
 * Remote counter operations. Every mutating call is a single atomic
 * operation on the backing store; `nowMs` comes from the caller's clock.
 */
export interface RateLimitStore {
  incrementFixedWindow(key: string, windowMs: number, nowMs: number): Promise<FixedWindowState>;
  slidingWindow(key: string, limit: number, windowMs: number, nowMs: number): Promise<SlidingWindowState>;
  tokenBucket(key: string, params: TokenBucketParams, nowMs: number): Promise<TokenBucketState>;

  peekFixedWindow(key: string, windowMs: number, nowMs: number): Promise<FixedWindowState>;
  peekSlidingWindow(key: string, windowMs: number, nowMs: number): Promise<Omit<SlidingWindowState, "allowed">>;
  peekTokenBucket(key: string, params: TokenBucketParams, nowMs: number): Promise<Omit<TokenBucketState, "allowed">>;

  /** Drop every representation of `key` for the current window */
  reset(key: string, windowMs: number, nowMs: number): Promise<void>;
}

// ============================================================================
// Limiter
// ============================================================================

export interface RateLimiterConfig {
  /** Unrecognised values fall back to sliding_window */
  policy: string;
  limit: number;
  windowMs: number;
  /** Token bucket size (default: limit) */
  capacity?: number;
  /** Tokens refilled per window (default: limit) */
  refillRate?: number;
  /** Allow requests when the store fails (default: true) */
  failOpen?: boolean;
  /** Deadline for each store call in ms (0 disables) */
  timeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export interface RateLimitInfo {
  key: string;
  policy: RateLimitPolicy;
  count: number;
  limit: number;
  remaining: number;
  /** Epoch ms at which the window resets or the bucket is full again */
  resetAt: number;
  windowMs: number;
}

export interface RateLimitDecision extends RateLimitInfo {
  allowed: boolean;
  /** How long a denied caller should wait, 0 when allowed */
  retryAfterMs: number;
  /** Set when the store failed and the decision came from the fail-open policy */
  degraded?: boolean;
}
