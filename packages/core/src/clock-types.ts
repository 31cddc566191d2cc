/**
 * Clock abstraction, injectable for deterministic testing.
 *
 * Production code uses Date.now() and globalThis timers via `defaultClock`.
 * Tests inject a fake clock that controls time explicitly.
 */

export interface Clock {
  /** Wall-clock milliseconds since the epoch */
  readonly now: () => number;
  /** Resolve after `ms`, or reject with the signal's reason once it aborts. */
  readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Production clock using real timers and Date.now(). */
export const defaultClock: Clock = {
  now: () => Date.now(),

  sleep: (ms: number, signal?: AbortSignal): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason ?? new DOMException("Aborted", "AbortError"));
        return;
      }

      const timer = globalThis.setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);

      function onAbort() {
        globalThis.clearTimeout(timer);
        reject(signal?.reason ?? new DOMException("Aborted", "AbortError"));
      }

      signal?.addEventListener("abort", onAbort, { once: true });
    }),
};
