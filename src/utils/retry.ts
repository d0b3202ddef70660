import { isPipelineError, TimeoutError } from "./errors.js";

export interface RetryOptions {
  /** Total attempts, including the first one. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  /** Called before each re-attempt; handy for logging. */
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new TimeoutError("Aborted while waiting to retry"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new TimeoutError("Aborted while waiting to retry"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exp = baseDelayMs * 2 ** (attempt - 1);
  const jitter = Math.random() * baseDelayMs;
  return Math.min(maxDelayMs, exp + jitter);
}

/**
 * Runs `fn` until it succeeds, throws a non-retryable error, or runs out of attempts.
 * Only PipelineErrors flagged `retryable` are retried.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  const maxDelayMs = options.maxDelayMs ?? options.baseDelayMs * 16;

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new TimeoutError("Aborted before attempt");
    }
    try {
      return await fn(attempt);
    } catch (err) {
      const retryable = isPipelineError(err) && err.retryable;
      if (!retryable || attempt >= attempts || options.signal?.aborted) throw err;

      const delay = backoffDelay(attempt, options.baseDelayMs, maxDelayMs);
      options.onRetry?.(err, attempt, delay);
      await sleep(delay, options.signal);
    }
  }
}
