import { describe, it, expect, vi } from "vitest";
import { TimeoutError, withRetry, withTimeout } from "../retry.js";

describe("withTimeout", () => {
  it("resolves when the promise settles in time", async () => {
    await expect(withTimeout(Promise.resolve(42), 50, "fast")).resolves.toBe(42);
  });

  it("rejects with TimeoutError and aborts the controller", async () => {
    const controller = new AbortController();
    const never = new Promise<number>(() => {});

    await expect(withTimeout(never, 10, "slow call", controller)).rejects.toThrow(new TimeoutError("slow call", 10));
    expect(controller.signal.aborted).toBe(true);
  });

  it("passes through the underlying rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("boom")), 50)).rejects.toThrow("boom");
  });
});

describe("withRetry", () => {
  it("retries once by default then gives up", async () => {
    const fn = vi.fn(async () => {
      throw new Error("flaky");
    });

    await expect(withRetry(fn, { delayMs: 0 })).rejects.toThrow("flaky");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("returns the first success", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValueOnce(new Error("flaky")).mockResolvedValueOnce("ok");

    await expect(withRetry(fn, { delayMs: 0 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("stops when shouldRetry declines", async () => {
    const fn = vi.fn(async () => {
      throw new Error("permanent");
    });

    await expect(withRetry(fn, { delayMs: 0, shouldRetry: () => false })).rejects.toThrow("permanent");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("wraps a non-Error rejection", async () => {
    await expect(withRetry(() => Promise.reject("plain string"), { retries: 0 })).rejects.toThrow("plain string");
  });
});
