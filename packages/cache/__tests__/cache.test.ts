/**
 * CacheStore Tests
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import type Redis from "ioredis";
import { RedisCacheStore, MemoryCacheStore, applyJitter } from "../src/index.js";

const mockRedisClient = {
  get: jest.fn<(key: string) => Promise<string | null>>(),
  setex: jest.fn<(key: string, seconds: number, value: string) => Promise<"OK">>(),
  del: jest.fn<(key: string) => Promise<number>>(),
  ping: jest.fn<() => Promise<string>>(),
  quit: jest.fn<() => Promise<"OK">>(),
};

describe("applyJitter", () => {
  it("leaves the TTL alone at the midpoint", () => {
    expect(applyJitter(3600, 0.08, () => 0.5)).toBe(3600);
  });

  it("stays within +/- the fraction", () => {
    expect(applyJitter(3600, 0.08, () => 0)).toBe(3312);
    expect(applyJitter(3600, 0.08, () => 0.999999)).toBe(3887);
  });

  it("never drops below one second", () => {
    expect(applyJitter(1, 0.5, () => 0)).toBe(1);
  });
});

describe("RedisCacheStore", () => {
  let store: RedisCacheStore;

  beforeEach(() => {
    store = new RedisCacheStore(mockRedisClient as unknown as Redis);
    jest.spyOn(Math, "random").mockReturnValue(0.5);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("returns the stored string", async () => {
    mockRedisClient.get.mockResolvedValue("https://example.com");
    await expect(store.get("url:abc1234")).resolves.toBe("https://example.com");
    expect(mockRedisClient.get).toHaveBeenCalledWith("url:abc1234");
  });

  it("returns null on a miss", async () => {
    mockRedisClient.get.mockResolvedValue(null);
    await expect(store.get("url:missing")).resolves.toBeNull();
  });

  it("lets read errors reach the caller", async () => {
    mockRedisClient.get.mockRejectedValue(new Error("Connection refused"));
    await expect(store.get("url:abc1234")).rejects.toThrow("Connection refused");
  });

  it("writes with SETEX and the jittered TTL", async () => {
    mockRedisClient.setex.mockResolvedValue("OK");
    await store.set("url:abc1234", "https://example.com", 3600);
    expect(mockRedisClient.setex).toHaveBeenCalledWith("url:abc1234", 3600, "https://example.com");
  });

  it("deletes keys", async () => {
    mockRedisClient.del.mockResolvedValue(1);
    await store.delete("url:abc1234");
    expect(mockRedisClient.del).toHaveBeenCalledWith("url:abc1234");
  });

  it("reports ping failures as unhealthy", async () => {
    mockRedisClient.ping.mockResolvedValueOnce("PONG").mockRejectedValueOnce(new Error("down"));
    await expect(store.ping()).resolves.toBe(true);
    await expect(store.ping()).resolves.toBe(false);
  });

  it("can disable jitter", async () => {
    jest.spyOn(Math, "random").mockReturnValue(0);
    mockRedisClient.setex.mockResolvedValue("OK");
    await new RedisCacheStore(mockRedisClient as unknown as Redis, { ttlJitter: 0 }).set("k", "v", 100);
    expect(mockRedisClient.setex).toHaveBeenCalledWith("k", 100, "v");
  });
});

describe("MemoryCacheStore", () => {
  it("expires entries against the injected clock", async () => {
    let now = 1_000_000;
    const store = new MemoryCacheStore(() => now);

    await store.set("url:abc1234", "https://example.com", 60);
    await expect(store.get("url:abc1234")).resolves.toBe("https://example.com");

    now += 59_999;
    await expect(store.get("url:abc1234")).resolves.toBe("https://example.com");

    now += 1;
    await expect(store.get("url:abc1234")).resolves.toBeNull();
    expect(store.size).toBe(0);
  });

  it("deletes entries", async () => {
    const store = new MemoryCacheStore();
    await store.set("k", "v", 60);
    await store.delete("k");
    await expect(store.get("k")).resolves.toBeNull();
  });
});
