import type { SourceTag } from "../types/lot.js";
import { SourceError, SourceErrorCode, classifyStatus, errorMessage, isSourceError } from "../sources/types.js";
import type { TokenBucket } from "./rate-limit.js";
import { cancelledError, withRetry } from "./retry.js";
import type { Logger } from "./run-logger.js";

export type HttpPolicy = {
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_HTTP_POLICY: HttpPolicy = {
  timeoutMs: 15_000,
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
};

export type SourceRequest = {
  source: SourceTag;
  url: string;
  init?: RequestInit;
  limiter: TokenBucket;
  policy: HttpPolicy;
  signal?: AbortSignal;
  logger?: Logger;
};

export type BodyReader<T> = (res: Response) => Promise<T>;

/**
 * fetch with a per-attempt timeout that also honours the caller's signal.
 * The timer and the abort listener stay armed until `read` has consumed the body.
 * Timeouts and network failures come back as RETRYABLE, caller aborts as CANCELLED.
 */
export async function fetchWithTimeout<T>(
  source: SourceTag,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: BodyReader<T>,
  signal?: AbortSignal,
): Promise<T> {
  if (signal?.aborted) throw cancelledError();

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const res = await fetch(url, { ...init, signal: controller.signal });
    return await read(res);
  } catch (err) {
    if (timedOut) {
      throw new SourceError(SourceErrorCode.RETRYABLE, `${source} request timed out after ${timeoutMs}ms`, {
        source,
        url,
      });
    }
    if (signal?.aborted) throw cancelledError();
    if (isSourceError(err)) throw err;
    throw new SourceError(SourceErrorCode.RETRYABLE, `${source} network error: ${errorMessage(err)}`, {
      source,
      url,
      cause: err,
    });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Rate-limited, retried request. Every attempt takes a token from the
 * channel's bucket. Only 200 and 204 reach `read`; anything else is
 * classified and, when retryable, tried again with backoff.
 */
export async function requestWithRetry<T>(req: SourceRequest, read: BodyReader<T>): Promise<T> {
  const { source, url, policy, limiter, signal } = req;

  return withRetry(
    async () => {
      await limiter.take(signal);
      return fetchWithTimeout(
        source,
        url,
        req.init ?? {},
        policy.timeoutMs,
        async (res) => {
          if (res.status === 200 || res.status === 204) return read(res);

          const text = await res.text().catch(() => "");
          throw new SourceError(classifyStatus(res.status), `${source} HTTP ${res.status}: ${text.slice(0, 200)}`, {
            source,
            status: res.status,
            url,
          });
        },
        signal,
      );
    },
    {
      maxAttempts: policy.maxAttempts,
      baseDelayMs: policy.baseDelayMs,
      maxDelayMs: policy.maxDelayMs,
      signal,
      onRetry: (err, attempt, delayMs) => {
        const msg = `retry ${attempt}/${policy.maxAttempts - 1} in ${delayMs}ms: ${errorMessage(err)}`;
        if (req.logger) req.logger.warn(msg, { url });
        else console.warn(`[${source}] ${msg}`);
      },
    },
  );
}

const readText: BodyReader<string> = async (res) => (res.status === 204 ? "" : res.text());

/** JSON body of a successful request; null for 204 */
export async function requestJson(req: SourceRequest): Promise<unknown> {
  const text = await requestWithRetry(req, readText);
  if (!text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new SourceError(SourceErrorCode.DEGRADED, `${req.source} returned invalid JSON`, {
      source: req.source,
      url: req.url,
      cause: err,
    });
  }
}

export async function requestText(req: SourceRequest): Promise<string> {
  return requestWithRetry(req, readText);
}

export function isCancelled(err: unknown): boolean {
  return isSourceError(err, SourceErrorCode.CANCELLED);
}
