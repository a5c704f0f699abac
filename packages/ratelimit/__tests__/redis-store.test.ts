/**
 * RedisRateLimitStore Tests
 *
 * ioredis is replaced by a stub; the Lua scripts themselves are exercised
 * through MemoryRateLimitStore, which implements the same algorithms.
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import type Redis from "ioredis";
import { RedisRateLimitStore } from "../src/index.js";
import { SCRIPTS } from "../src/scripts.js";

type Reply = unknown;

const mockRedisClient = {
  script: jest.fn<(subcommand: string, source: string) => Promise<Reply>>(),
  evalsha: jest.fn<(...args: unknown[]) => Promise<Reply>>(),
  eval: jest.fn<(...args: unknown[]) => Promise<Reply>>(),
  get: jest.fn<(key: string) => Promise<string | null>>(),
  zcount: jest.fn<(...args: unknown[]) => Promise<number>>(),
  zrangebyscore: jest.fn<(...args: unknown[]) => Promise<string[]>>(),
  hmget: jest.fn<(...args: unknown[]) => Promise<(string | null)[]>>(),
  del: jest.fn<(...keys: string[]) => Promise<number>>(),
};

describe("RedisRateLimitStore", () => {
  let store: RedisRateLimitStore;

  beforeEach(() => {
    jest.resetAllMocks();
    store = new RedisRateLimitStore(mockRedisClient as unknown as Redis);
    mockRedisClient.script.mockImplementation(async (_sub, source) =>
      source === SCRIPTS.fixedWindow ? "sha-fixed" : source === SCRIPTS.slidingWindow ? "sha-sliding" : "sha-bucket"
    );
  });

  describe("script execution", () => {
    it("loads each script once and runs it by sha", async () => {
      mockRedisClient.evalsha.mockResolvedValueOnce(1).mockResolvedValueOnce(2);

      await expect(store.incrementFixedWindow("ip:1.2.3.4", 60_000, 1_000_030_000)).resolves.toEqual({ count: 1 });
      await expect(store.incrementFixedWindow("ip:1.2.3.4", 60_000, 1_000_030_000)).resolves.toEqual({ count: 2 });

      expect(mockRedisClient.script).toHaveBeenCalledTimes(1);
      expect(mockRedisClient.script).toHaveBeenCalledWith("LOAD", SCRIPTS.fixedWindow);
      expect(mockRedisClient.evalsha).toHaveBeenCalledWith(
        "sha-fixed",
        1,
        "fixed_window:ip:1.2.3.4:1000020000",
        60_000
      );
    });

    it("falls back to EVAL on NOSCRIPT and reloads next time", async () => {
      mockRedisClient.evalsha
        .mockRejectedValueOnce(new Error("NOSCRIPT No matching script. Please use EVAL."))
        .mockResolvedValueOnce(4);
      mockRedisClient.eval.mockResolvedValueOnce(3);

      await expect(store.incrementFixedWindow("k", 1000, 5000)).resolves.toEqual({ count: 3 });
      expect(mockRedisClient.eval).toHaveBeenCalledWith(SCRIPTS.fixedWindow, 1, "fixed_window:k:5000", 1000);

      await expect(store.incrementFixedWindow("k", 1000, 5000)).resolves.toEqual({ count: 4 });
      expect(mockRedisClient.script).toHaveBeenCalledTimes(2);
    });

    it("propagates other errors", async () => {
      mockRedisClient.evalsha.mockRejectedValue(new Error("READONLY You can't write against a read only replica."));

      await expect(store.incrementFixedWindow("k", 1000, 5000)).rejects.toThrow("READONLY");
      expect(mockRedisClient.eval).not.toHaveBeenCalled();
    });

    it("rejects malformed replies", async () => {
      mockRedisClient.evalsha.mockResolvedValue("not-a-number");
      await expect(store.incrementFixedWindow("k", 1000, 5000)).rejects.toThrow("Unexpected count");
    });
  });

  describe("sliding window", () => {
    it("sends limit, window, clock and a unique member", async () => {
      mockRedisClient.evalsha.mockResolvedValue([1, 2, "990"]);

      await expect(store.slidingWindow("ip:1.2.3.4", 5, 1000, 1000)).resolves.toEqual({
        allowed: true,
        count: 2,
        oldestMs: 990,
      });

      const args = mockRedisClient.evalsha.mock.calls[0];
      expect(args.slice(0, 6)).toEqual(["sha-sliding", 1, "sliding_window:ip:1.2.3.4", 5, 1000, 1000]);
      expect(args[6]).toMatch(/^1000:[0-9a-f-]{36}$/);
    });

    it("maps an empty window to a null oldest entry", async () => {
      mockRedisClient.evalsha.mockResolvedValue([0, 0, "-1"]);
      await expect(store.slidingWindow("k", 0, 1000, 1000)).resolves.toEqual({
        allowed: false,
        count: 0,
        oldestMs: null,
      });
    });

    it("peeks with an exclusive lower bound", async () => {
      mockRedisClient.zcount.mockResolvedValue(3);
      mockRedisClient.zrangebyscore.mockResolvedValue(["1200:abc", "1200"]);

      await expect(store.peekSlidingWindow("k", 1000, 2000)).resolves.toEqual({ count: 3, oldestMs: 1200 });
      expect(mockRedisClient.zcount).toHaveBeenCalledWith("sliding_window:k", "(1000", "+inf");
    });
  });

  describe("token bucket", () => {
    const params = { capacity: 3, refillRate: 2, windowMs: 1000 };

    it("parses fractional tokens", async () => {
      mockRedisClient.evalsha.mockResolvedValue([0, "0.25"]);

      await expect(store.tokenBucket("k", params, 1000)).resolves.toEqual({ allowed: false, tokens: 0.25 });
      expect(mockRedisClient.evalsha).toHaveBeenCalledWith("sha-bucket", 1, "token_bucket:k", 3, 2, 1000, 1000);
    });

    it("peeks a missing bucket as full", async () => {
      mockRedisClient.hmget.mockResolvedValue([null, null]);
      await expect(store.peekTokenBucket("k", params, 1000)).resolves.toEqual({ tokens: 3 });
    });

    it("peeks with refill applied", async () => {
      mockRedisClient.hmget.mockResolvedValue(["1", "1000"]);
      await expect(store.peekTokenBucket("k", params, 1500)).resolves.toEqual({ tokens: 2 });
    });
  });

  it("reset deletes every representation", async () => {
    mockRedisClient.del.mockResolvedValue(3);

    await store.reset("k", 1000, 5500);

    expect(mockRedisClient.del).toHaveBeenCalledWith("fixed_window:k:5000", "sliding_window:k", "token_bucket:k");
  });
});
