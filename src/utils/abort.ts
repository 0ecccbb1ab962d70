/**
 * Abort helpers for external calls whose SDKs take no AbortSignal.
 */

import { abortReason } from './RetryPolicy.js';

/**
 * Settle with `promise`, or reject as soon as `signal` aborts.
 * The underlying work is not stopped; its late result is ignored.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortReason(signal));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Signal for a single attempt: aborts when the caller aborts or when the
 * per-attempt timeout elapses. A timeout of 0 disables the timer.
 */
export function attemptSignal(outer: AbortSignal | undefined, timeoutMs: number): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (outer) signals.push(outer);
  if (timeoutMs > 0) signals.push(AbortSignal.timeout(timeoutMs));
  if (signals.length === 0) return undefined;
  if (signals.length === 1) return signals[0];
  return AbortSignal.any(signals);
}
