/**
 * Abort Signal Propagation
 *
 * Design notes:
 * 1. Each turn creates an AbortController as the cancel source for that turn
 * 2. Work inside the turn may receive two layers of signal:
 *    - turn-level signal (user pressed cancel)
 *    - operation-level signal (request timeout)
 * 3. combineAbortSignals merges both layers: either one triggers abort
 * 4. abortable() / withIdleTimeout() wrap the promises a turn suspends on
 */

import { CoreError, cancelledError } from "../errors.js";

/**
 * Combine two AbortSignals; either one triggers abort
 */
export function combineAbortSignals(a?: AbortSignal, b?: AbortSignal): AbortSignal | undefined {
  if (!a) return b;
  if (!b) return a;
  if (a.aborted) return a;
  if (b.aborted) return b;
  return AbortSignal.any([a, b]);
}

/**
 * Wrap a Promise to make it interruptible by abort
 *
 * - When the signal fires, rejects with CoreError(Cancelled)
 * - The wrapped promise keeps running; its result is ignored
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    return Promise.reject(cancelledError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      signal.removeEventListener("abort", onAbort);
      reject(cancelledError());
    };
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Reject with a ProviderTransport timeout when `promise` has not settled
 * within `ms`. Used per stream chunk as the idle watchdog.
 *
 * An abort on `signal` clears the timer, since the wrapped promise may never settle.
 */
export function withIdleTimeout<T>(promise: Promise<T>, ms: number, message: string, signal?: AbortSignal): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) return promise;
  return new Promise<T>((resolve, reject) => {
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };
    const onAbort = () => {
      cleanup();
      reject(cancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      reject(new CoreError("ProviderTransport", message));
    }, ms);
    promise.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }
  });
}
