import { getConfig } from "../config.js";

export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Ends the backoff wait and stops retrying once aborted; the last error is rethrown. */
  signal?: AbortSignal;
  onRetry?: (attempt: number, err: unknown) => void;
};

/** Run `fn` with exponential backoff. Workers use this; the scheduler never retries. */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs } = { ...getConfig().retry, ...definedOnly(opts) };

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (attempt > 1 && opts?.signal?.aborted) break;
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === maxAttempts || opts?.signal?.aborted) break;
      opts?.onRetry?.(attempt, err);
      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      await sleep(delay, opts?.signal);
    }
  }
  throw lastError;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

function definedOnly(opts?: RetryOptions): Partial<Record<"maxAttempts" | "baseDelayMs" | "maxDelayMs", number>> {
  const out: Partial<Record<"maxAttempts" | "baseDelayMs" | "maxDelayMs", number>> = {};
  if (opts?.maxAttempts !== undefined) out.maxAttempts = opts.maxAttempts;
  if (opts?.baseDelayMs !== undefined) out.baseDelayMs = opts.baseDelayMs;
  if (opts?.maxDelayMs !== undefined) out.maxDelayMs = opts.maxDelayMs;
  return out;
}
