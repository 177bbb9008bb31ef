import { describe, expect, it, vi } from "vitest";
import { withRetry } from "../src/utils/retry.js";

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`attempt ${attempt}`);
      return "ok";
    });

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 1 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("rethrows the last error once attempts run out", async () => {
    const onRetry = vi.fn();
    const fn = vi.fn(async (attempt: number): Promise<string> => {
      throw new Error(`attempt ${attempt}`);
    });

    await expect(withRetry(fn, { maxAttempts: 2, baseDelayMs: 1, onRetry })).rejects.toThrow("attempt 2");
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error));
  });

  it("stops retrying once the signal is aborted", async () => {
    const controller = new AbortController();
    const fn = vi.fn(async (): Promise<string> => {
      controller.abort();
      throw new Error("gave up");
    });

    await expect(withRetry(fn, { maxAttempts: 5, baseDelayMs: 1, signal: controller.signal })).rejects.toThrow(
      "gave up",
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("ends the backoff wait on abort without another attempt", async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      const fn = vi.fn(async (attempt: number): Promise<string> => {
        throw new Error(`attempt ${attempt}`);
      });
      const outcome = expect(
        withRetry(fn, { maxAttempts: 3, baseDelayMs: 1_000, signal: controller.signal }),
      ).rejects.toThrow("attempt 1");

      await vi.advanceTimersByTimeAsync(10);
      controller.abort();
      await outcome;

      expect(fn).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });

  it("caps the backoff delay", async () => {
    vi.useFakeTimers();
    try {
      const fn = vi.fn(async (attempt: number) => {
        if (attempt < 4) throw new Error("not yet");
        return attempt;
      });
      const pending = withRetry(fn, { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 150 });

      // delays: 100, 150, 150
      await vi.advanceTimersByTimeAsync(399);
      expect(fn).toHaveBeenCalledTimes(3);
      await vi.advanceTimersByTimeAsync(1);
      await expect(pending).resolves.toBe(4);
    } finally {
      vi.useRealTimers();
    }
  });
});
