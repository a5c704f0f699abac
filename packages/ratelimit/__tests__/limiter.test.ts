/**
 * RateLimiter Tests
 *
 * Runs every policy against the in-memory store with a hand-driven clock.
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import { createLogger } from "@hopline/logger";
import { AppError, ErrorCode } from "@hopline/shared";
import { MemoryRateLimitStore, RateLimiter, resolvePolicy } from "../src/index.js";

describe("RateLimiter", () => {
  let now: number;
  const clock = () => now;
  let store: MemoryRateLimitStore;

  beforeEach(() => {
    now = 1_000_000;
    store = new MemoryRateLimitStore();
  });

  describe("sliding_window", () => {
    const build = () => new RateLimiter(store, { policy: "sliding_window", limit: 5, windowMs: 1000, clock });

    it("admits the limit, rejects the next call, then recovers after the window", async () => {
      const limiter = build();

      for (let i = 0; i < 5; i++) {
        await expect(limiter.allow("ip:1.2.3.4")).resolves.toBe(true);
      }
      await expect(limiter.allow("ip:1.2.3.4")).resolves.toBe(false);

      now += 1001;
      await expect(limiter.allow("ip:1.2.3.4")).resolves.toBe(true);
    });

    it("reports when a denied caller may retry", async () => {
      const limiter = build();
      for (let i = 0; i < 5; i++) await limiter.check("k");

      const decision = await limiter.check("k");

      expect(decision).toMatchObject({
        allowed: false,
        count: 5,
        limit: 5,
        remaining: 0,
        resetAt: 1_001_000,
        retryAfterMs: 1000,
        policy: "sliding_window",
      });
    });

    it("does not count rejected calls against the window", async () => {
      const limiter = build();
      for (let i = 0; i < 8; i++) await limiter.check("k");

      await expect(limiter.info("k")).resolves.toMatchObject({ count: 5, remaining: 0 });
    });

    it("slides rather than resetting on a boundary", async () => {
      const limiter = build();
      for (let i = 0; i < 3; i++) await limiter.check("k");
      now += 500;
      for (let i = 0; i < 2; i++) await limiter.check("k");

      now += 501;
      // the first three dropped out, the last two are still inside the window
      await expect(limiter.info("k")).resolves.toMatchObject({ count: 2, remaining: 3, resetAt: 1_001_500 });
    });

    it("keeps keys independent", async () => {
      const limiter = build();
      for (let i = 0; i < 5; i++) await limiter.check("a");

      await expect(limiter.allow("a")).resolves.toBe(false);
      await expect(limiter.allow("b")).resolves.toBe(true);
    });
  });

  describe("fixed_window", () => {
    it("counts per bucket and resets on the bucket edge", async () => {
      now = 1_000_500;
      const limiter = new RateLimiter(store, { policy: "fixed_window", limit: 2, windowMs: 1000, clock });

      await expect(limiter.allow("k")).resolves.toBe(true);
      await expect(limiter.allow("k")).resolves.toBe(true);
      await expect(limiter.check("k")).resolves.toMatchObject({
        allowed: false,
        count: 3,
        remaining: 0,
        resetAt: 1_001_000,
        retryAfterMs: 500,
      });

      now = 1_001_000;
      await expect(limiter.allow("k")).resolves.toBe(true);
    });
  });

  describe("token_bucket", () => {
    const build = () =>
      new RateLimiter(store, { policy: "token_bucket", limit: 3, capacity: 3, refillRate: 1, windowMs: 1000, clock });

    it("allows a burst up to capacity, then drains and refills", async () => {
      const limiter = build();

      await expect(limiter.allow("k")).resolves.toBe(true);
      await expect(limiter.allow("k")).resolves.toBe(true);
      await expect(limiter.allow("k")).resolves.toBe(true);
      await expect(limiter.check("k")).resolves.toMatchObject({ allowed: false, remaining: 0, retryAfterMs: 1000 });

      now += 1000;
      await expect(limiter.allow("k")).resolves.toBe(true);
      await expect(limiter.allow("k")).resolves.toBe(false);
    });

    it("refills fractionally", async () => {
      const limiter = build();
      for (let i = 0; i < 3; i++) await limiter.check("k");

      now += 500;
      await expect(limiter.info("k")).resolves.toMatchObject({ remaining: 0, count: 3, resetAt: now + 2500 });
      await expect(limiter.check("k")).resolves.toMatchObject({ allowed: false, retryAfterMs: 500 });
    });

    it("never exceeds capacity", async () => {
      const limiter = build();
      await limiter.check("k");

      now += 60_000;
      await expect(limiter.info("k")).resolves.toMatchObject({ remaining: 3, limit: 3 });
    });
  });

  describe("policy selection", () => {
    it("falls back to sliding_window for unknown names", () => {
      const log = createLogger("test");
      const warn = jest.spyOn(log, "warn");
      expect(resolvePolicy("leaky_bucket", log)).toBe("sliding_window");
      expect(warn).toHaveBeenCalledTimes(1);
      expect(new RateLimiter(store, { policy: "", limit: 1, windowMs: 1000 }).policy).toBe("sliding_window");
    });

    it("accepts dashed and mixed-case names", () => {
      expect(resolvePolicy("Token-Bucket")).toBe("token_bucket");
      expect(resolvePolicy("FIXED_WINDOW")).toBe("fixed_window");
    });

    it("rejects nonsensical limits", () => {
      expect(() => new RateLimiter(store, { policy: "fixed_window", limit: 0, windowMs: 1000 })).toThrow(AppError);
      expect(() => new RateLimiter(store, { policy: "fixed_window", limit: 5, windowMs: 0 })).toThrow(
        "Rate limit window must be positive"
      );
    });
  });

  describe("store failures", () => {
    it("fail open by default", async () => {
      jest.spyOn(store, "slidingWindow").mockRejectedValue(new Error("connection lost"));
      const limiter = new RateLimiter(store, { policy: "sliding_window", limit: 5, windowMs: 1000, clock });

      await expect(limiter.check("k")).resolves.toMatchObject({
        allowed: true,
        degraded: true,
        remaining: 5,
        resetAt: 1_001_000,
      });
    });

    it("treat a slow store as a failure", async () => {
      jest.spyOn(store, "slidingWindow").mockReturnValue(new Promise<never>(() => undefined));
      const limiter = new RateLimiter(store, {
        policy: "sliding_window",
        limit: 5,
        windowMs: 1000,
        timeoutMs: 10,
        clock,
      });

      await expect(limiter.allow("k")).resolves.toBe(true);
    });

    it("raise UNAVAILABLE when failing closed", async () => {
      jest.spyOn(store, "incrementFixedWindow").mockRejectedValue(new Error("connection lost"));
      const limiter = new RateLimiter(store, { policy: "fixed_window", limit: 5, windowMs: 1000, failOpen: false });

      await expect(limiter.allow("k")).rejects.toMatchObject({ code: ErrorCode.UNAVAILABLE, retryable: true });
    });

    it("propagate info failures", async () => {
      jest.spyOn(store, "peekSlidingWindow").mockRejectedValue(new Error("connection lost"));
      const limiter = new RateLimiter(store, { policy: "sliding_window", limit: 5, windowMs: 1000 });

      await expect(limiter.info("k")).rejects.toMatchObject({ code: ErrorCode.UNAVAILABLE });
    });
  });

  describe("reset", () => {
    it("clears the key", async () => {
      const limiter = new RateLimiter(store, { policy: "sliding_window", limit: 1, windowMs: 1000, clock });
      await limiter.check("k");
      await expect(limiter.allow("k")).resolves.toBe(false);

      await limiter.reset("k");

      await expect(limiter.allow("k")).resolves.toBe(true);
    });
  });
});
