import { describe, it, expect, vi, afterEach } from "vitest";
import { withRetry, withTimeout } from "../retry";
import { TimeoutError } from "../../errors";

describe("withRetry", () => {
  it("backs off exponentially between attempts", async () => {
    const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockResolvedValue("ok");

    const result = await withRetry(fn, { maxAttempts: 3, delayMs: 100, sleep });

    expect(result).toBe("ok");
    expect(fn.mock.calls).toEqual([[1], [2], [3]]);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it("rethrows immediately when shouldRetry rejects the error", async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new Error("fatal"));

    await expect(
      withRetry(fn, { maxAttempts: 5, delayMs: 1, shouldRetry: () => false }),
    ).rejects.toThrow("fatal");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives up after maxAttempts with the last error", async () => {
    const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
    const onRetry = vi.fn();
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockImplementation(async (n) => {
      throw new Error(`attempt ${n}`);
    });

    await expect(withRetry(fn, { maxAttempts: 2, delayMs: 10, sleep, onRetry })).rejects.toThrow("attempt 2");
    expect(onRetry).toHaveBeenCalledTimes(1);
  });
});

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects with TimeoutError once the limit passes", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => {}), 100, "probe");
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);

    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });

  it("returns the result when the operation settles in time", async () => {
    await expect(withTimeout(Promise.resolve("ok"), 100, "probe")).resolves.toBe("ok");
  });

  it("leaves the operation unbounded for a non-positive limit", async () => {
    await expect(withTimeout(Promise.resolve(1), 0, "probe")).resolves.toBe(1);
  });
});
