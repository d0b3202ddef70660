import { TimeoutError } from "./errors.js";

export interface Deadline {
  signal: AbortSignal;
  /** Clears the timer and detaches from the parent signal. */
  dispose(): void;
}

/**
 * Signal that aborts after `ms`, or as soon as `parent` aborts.
 * The abort reason is always a TimeoutError.
 */
export function createDeadline(ms: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const abort = () => {
    if (!controller.signal.aborted) {
      controller.abort(new TimeoutError(`Request deadline of ${ms}ms exceeded`));
    }
  };

  const timer = setTimeout(abort, ms);
  if (parent?.aborted) abort();
  parent?.addEventListener("abort", abort, { once: true });

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", abort);
    },
  };
}

const abortReason = (signal: AbortSignal): TimeoutError =>
  signal.reason instanceof TimeoutError ? signal.reason : new TimeoutError();

/**
 * Settles with `promise`, or rejects with a TimeoutError once `signal` aborts.
 * The losing promise keeps running; its outcome is observed and dropped.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      promise.then(
        () => undefined,
        () => undefined
      );
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
