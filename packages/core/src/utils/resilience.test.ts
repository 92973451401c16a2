import { describe, it, expect, vi } from "vitest";
import { computeDelay, isRetryableError, withRetry, withTimeout } from "./resilience.js";
import { TransientError, ValidationError } from "../errors.js";

describe("isRetryableError", () => {
  it("trusts the flag of orchestration errors", () => {
    expect(isRetryableError(new TransientError("upstream 503"))).toBe(true);
    expect(isRetryableError(new ValidationError("bad key"))).toBe(false);
  });

  it("classifies status codes on the error", () => {
    expect(isRetryableError(Object.assign(new Error("oops"), { status: 503 }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error("oops"), { statusCode: 429 }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error("oops"), { statusCode: 404 }))).toBe(false);
    expect(isRetryableError(Object.assign(new Error("oops"), { status: 401 }))).toBe(false);
  });

  it("recognises network failures and timeouts by message", () => {
    expect(isRetryableError(new TypeError("fetch failed"))).toBe(true);
    expect(isRetryableError(new Error("socket hang up"))).toBe(true);
    expect(isRetryableError(new Error("Request timed out"))).toBe(true);
    expect(isRetryableError(new Error("something else"))).toBe(false);
  });

  it("never retries aborts or non-errors", () => {
    expect(isRetryableError(Object.assign(new Error("timeout"), { name: "AbortError" }))).toBe(false);
    expect(isRetryableError("fetch failed")).toBe(false);
  });
});

describe("computeDelay", () => {
  it("grows exponentially up to the cap", () => {
    expect(computeDelay(0, 1000, 2, 8000)).toBe(1000);
    expect(computeDelay(1, 1000, 2, 8000)).toBe(2000);
    expect(computeDelay(3, 1000, 2, 8000)).toBe(8000);
    expect(computeDelay(5, 1000, 2, 8000)).toBe(8000);
  });
});

describe("withRetry", () => {
  it("retries transient failures with backoff until one succeeds", async () => {
    const delays: number[] = [];
    const onRetry = vi.fn();
    let calls = 0;

    const result = await withRetry({
      fn: async () => {
        calls++;
        if (calls < 3) throw new TransientError("flaky");
        return "done";
      },
      maxRetries: 2,
      onRetry,
      sleep: async (ms) => { delays.push(ms); },
    });

    expect(result).toBe("done");
    expect(calls).toBe(3);
    expect(delays).toEqual([1000, 2000]);
    expect(onRetry.mock.calls.map(([info]) => info.attempt)).toEqual([1, 2]);
  });

  it("rethrows a non-retryable error without retrying", async () => {
    const fn = vi.fn(async () => { throw new ValidationError("bad request"); });
    await expect(withRetry({ fn, sleep: async () => {} })).rejects.toBeInstanceOf(ValidationError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("throws the last error once retries are exhausted", async () => {
    let calls = 0;
    const fn = async () => { calls++; throw new TransientError(`failure ${calls}`); };

    await expect(withRetry({ fn, maxRetries: 2, sleep: async () => {} })).rejects.toThrow("failure 3");
    expect(calls).toBe(3);
  });

  it("times out each attempt when timeoutMs is set", async () => {
    let calls = 0;
    const never = () => { calls++; return new Promise<string>(() => {}); };

    await expect(withRetry({ fn: never, maxRetries: 1, timeoutMs: 5, sleep: async () => {} }))
      .rejects.toThrow("Request timed out after 5ms");
    expect(calls).toBe(2);
  });
});

describe("withTimeout", () => {
  it("aborts the signal handed to the call when the deadline passes", async () => {
    let seen: AbortSignal | undefined;
    const pending = withTimeout((signal) => {
      seen = signal;
      return new Promise<void>(() => {});
    }, 5, { component: "embedding" });

    const error = await pending.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransientError);
    expect(error).toMatchObject({ kind: "transient", component: "embedding", retryable: true });
    expect(seen?.aborted).toBe(true);
  });

  it("returns the value when the call finishes in time", async () => {
    await expect(withTimeout(async () => 42, 1000)).resolves.toBe(42);
  });
});
