import { TimeoutError } from "./errors.js";

/**
 * Races a promise against a timer. The underlying work is not cancelled; only
 * the caller stops waiting for it.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label = "Operation"): Promise<T> {
  if (ms <= 0) return promise;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`)), ms);
    timer.unref();
  });
  return Promise.race([promise, expired]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
