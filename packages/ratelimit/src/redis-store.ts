/**
 * Redis-backed RateLimitStore.
 *
 * Scripts are loaded once with SCRIPT LOAD and invoked by SHA. A NOSCRIPT
 * reply (Redis restarted or flushed its script cache) falls back to EVAL
 * and forgets the SHA so the next call reloads it.
 */

import { randomUUID } from "node:crypto";
import type Redis from "ioredis";
import { bucketStart, fixedWindowKey, slidingWindowKey, tokenBucketKey } from "./keys.js";
import { SCRIPTS, type ScriptName } from "./scripts.js";
import type {
  FixedWindowState,
  RateLimitStore,
  SlidingWindowState,
  TokenBucketParams,
  TokenBucketState,
} from "./types.js";

type ScriptArg = string | number;

function toNumber(value: unknown, field: string): number {
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  if (Number.isNaN(parsed)) {
    throw new Error(`Unexpected ${field} in rate limit reply: ${String(value)}`);
  }
  return parsed;
}

function toArray(value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Unexpected rate limit reply: ${String(value)}`);
  }
  return value;
}

function isNoScriptError(err: unknown): boolean {
  return err instanceof Error && err.message.includes("NOSCRIPT");
}

export class RedisRateLimitStore implements RateLimitStore {
  private readonly client: Redis;
  private readonly shas = new Map<ScriptName, string>();

  constructor(client: Redis) {
    this.client = client;
  }

  // ==========================================================================
  // Script execution
  // ==========================================================================

  private async load(name: ScriptName): Promise<string> {
    const cached = this.shas.get(name);
    if (cached) return cached;

    const sha: unknown = await this.client.script("LOAD", SCRIPTS[name]);
    if (typeof sha !== "string") {
      throw new Error(`SCRIPT LOAD returned no sha for ${name}`);
    }
    this.shas.set(name, sha);
    return sha;
  }

  private async run(name: ScriptName, key: string, args: ScriptArg[]): Promise<unknown> {
    const sha = await this.load(name);
    try {
      return await this.client.evalsha(sha, 1, key, ...args);
    } catch (err) {
      if (!isNoScriptError(err)) throw err;
      this.shas.delete(name);
      return this.client.eval(SCRIPTS[name], 1, key, ...args);
    }
  }

  // ==========================================================================
  // Atomic operations
  // ==========================================================================

  async incrementFixedWindow(key: string, windowMs: number, nowMs: number): Promise<FixedWindowState> {
    const reply = await this.run("fixedWindow", fixedWindowKey(key, bucketStart(nowMs, windowMs)), [windowMs]);
    return { count: toNumber(reply, "count") };
  }

  async slidingWindow(key: string, limit: number, windowMs: number, nowMs: number): Promise<SlidingWindowState> {
    // Members must be unique or concurrent calls in the same millisecond collapse into one entry
    const member = `${nowMs}:${randomUUID()}`;
    const [allowed, count, oldest] = toArray(
      await this.run("slidingWindow", slidingWindowKey(key), [limit, windowMs, nowMs, member])
    );
    const oldestMs = toNumber(oldest, "oldest");
    return {
      allowed: toNumber(allowed, "allowed") === 1,
      count: toNumber(count, "count"),
      oldestMs: oldestMs < 0 ? null : oldestMs,
    };
  }

  async tokenBucket(key: string, params: TokenBucketParams, nowMs: number): Promise<TokenBucketState> {
    const [allowed, tokens] = toArray(
      await this.run("tokenBucket", tokenBucketKey(key), [params.capacity, params.refillRate, params.windowMs, nowMs])
    );
    return { allowed: toNumber(allowed, "allowed") === 1, tokens: toNumber(tokens, "tokens") };
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  async peekFixedWindow(key: string, windowMs: number, nowMs: number): Promise<FixedWindowState> {
    const value = await this.client.get(fixedWindowKey(key, bucketStart(nowMs, windowMs)));
    return { count: value === null ? 0 : toNumber(value, "count") };
  }

  async peekSlidingWindow(key: string, windowMs: number, nowMs: number): Promise<Omit<SlidingWindowState, "allowed">> {
    const setKey = slidingWindowKey(key);
    const min = `(${nowMs - windowMs}`;
    const [count, oldest] = await Promise.all([
      this.client.zcount(setKey, min, "+inf"),
      this.client.zrangebyscore(setKey, min, "+inf", "WITHSCORES", "LIMIT", 0, 1),
    ]);
    return { count, oldestMs: oldest.length >= 2 ? toNumber(oldest[1], "oldest") : null };
  }

  async peekTokenBucket(
    key: string,
    params: TokenBucketParams,
    nowMs: number
  ): Promise<Omit<TokenBucketState, "allowed">> {
    const [tokens, lastRefill] = await this.client.hmget(tokenBucketKey(key), "tokens", "last_refill");
    if (tokens === null || lastRefill === null) {
      return { tokens: params.capacity };
    }
    const elapsed = Math.max(0, nowMs - toNumber(lastRefill, "last_refill"));
    return {
      tokens: Math.min(params.capacity, toNumber(tokens, "tokens") + (elapsed * params.refillRate) / params.windowMs),
    };
  }

  async reset(key: string, windowMs: number, nowMs: number): Promise<void> {
    await this.client.del(
      fixedWindowKey(key, bucketStart(nowMs, windowMs)),
      slidingWindowKey(key),
      tokenBucketKey(key)
    );
  }
}
