import { describe, it, expect, jest, afterEach } from "@jest/globals";
import {
  AppError,
  DeadlineExceededError,
  ErrorCode,
  ERROR_HTTP_STATUS,
  expiredError,
  hasErrorCode,
  unavailableError,
  validationError,
  withDeadline,
} from "../src/index.js";

describe("AppError", () => {
  it("maps codes to HTTP statuses", () => {
    expect(expiredError().status).toBe(410);
    expect(new AppError(ErrorCode.INACTIVE, "x").status).toBe(410);
    expect(ERROR_HTTP_STATUS.RATE_LIMIT_EXCEEDED).toBe(429);
    expect(ERROR_HTTP_STATUS.UNAVAILABLE).toBe(503);
  });

  it("serialises without empty details", () => {
    expect(expiredError().toJSON()).toEqual({ code: "EXPIRED", message: "URL has expired" });
    expect(validationError("bad", { field: "url" }).toJSON()).toEqual({
      code: "VALIDATION_ERROR",
      message: "bad",
      details: { field: "url" },
    });
  });

  it("carries retryable and cause", () => {
    const cause = new Error("socket closed");
    const err = unavailableError("write outcome unknown", { retryable: false, cause });
    expect(err.retryable).toBe(false);
    expect(err.cause).toBe(cause);
    expect(hasErrorCode(err, ErrorCode.UNAVAILABLE)).toBe(true);
    expect(hasErrorCode(cause, ErrorCode.UNAVAILABLE)).toBe(false);
  });
});

describe("withDeadline", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it("resolves when the promise settles first", async () => {
    await expect(withDeadline(Promise.resolve(42), 100, "op")).resolves.toBe(42);
  });

  it("propagates the promise's own rejection", async () => {
    await expect(withDeadline(Promise.reject(new Error("boom")), 100, "op")).rejects.toThrow("boom");
  });

  it("rejects with DeadlineExceededError on timeout", async () => {
    jest.useFakeTimers();
    const pending = withDeadline(new Promise<never>(() => undefined), 50, "cache.get");
    jest.advanceTimersByTime(50);

    const error = await pending.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(DeadlineExceededError);
    expect(error).toMatchObject({ operation: "cache.get", timeoutMs: 50, message: "cache.get timed out after 50ms" });
  });

  it("treats a non-positive timeout as no deadline", async () => {
    await expect(withDeadline(Promise.resolve("x"), 0, "op")).resolves.toBe("x");
  });
});
