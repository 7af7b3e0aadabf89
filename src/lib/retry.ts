import { SourceError, SourceErrorCode, isSourceError } from "../sources/types.js";

export type RetryOptions = {
  /** Total attempts including the first one */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  jitterPct?: number;
  signal?: AbortSignal;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  random?: () => number;
};

export function cancelledError(): SourceError {
  return new SourceError(SourceErrorCode.CANCELLED, "Run cancelled");
}

/**
 * setTimeout-based sleep that rejects with CANCELLED as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function backoffDelay(attempt: number, opts: RetryOptions = {}): number {
  const baseDelayMs = opts.baseDelayMs ?? 500;
  const maxDelayMs = opts.maxDelayMs ?? 8000;
  const factor = opts.factor ?? 2;
  const jitterPct = opts.jitterPct ?? 0.25;
  const random = opts.random ?? Math.random;

  const delay = Math.min(maxDelayMs, baseDelayMs * Math.pow(factor, attempt - 1));
  const jitter = delay * (random() * 2 * jitterPct - jitterPct);
  return Math.max(0, Math.round(delay + jitter));
}

function defaultRetryable(err: unknown): boolean {
  return isSourceError(err) && err.retryable;
}

/**
 * Run fn until it succeeds, a non-retryable error is thrown, or attempts run out.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
  const isRetryable = opts.isRetryable ?? defaultRetryable;

  let attempt = 0;
  let lastErr: unknown;

  while (attempt < maxAttempts) {
    if (opts.signal?.aborted) throw cancelledError();
    attempt++;

    try {
      return await fn(attempt);
    } catch (err) {
      lastErr = err;
      if (!isRetryable(err) || attempt >= maxAttempts) {
        break;
      }

      const delay = backoffDelay(attempt, opts);
      opts.onRetry?.(err, attempt, delay);
      await sleep(delay, opts.signal);
    }
  }

  throw lastErr;
}
