/**
 * Deterministic clock for scheduler and state-machine tests.
 *
 * Time only moves when the test says so. `advance(ms)` wakes every sleep
 * that has come due; `waitForSleep()` lets a test wait for async code to
 * park on its next sleep.
 */

import type { Clock } from "@countdown/core";

interface Sleeper {
  readonly wakeAt: number;
  readonly wake: () => void;
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new DOMException("Aborted", "AbortError");
}

export class FakeClock implements Clock {
  private current: number;
  private sleepers: readonly Sleeper[] = [];
  private parkedWaiters: (() => void)[] = [];

  constructor(startMs = 0) {
    this.current = startMs;
  }

  readonly now = (): number => this.current;

  readonly sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }
      const sleeper: Sleeper = { wakeAt: this.current + ms, wake: resolve };
      this.park(sleeper);
      signal?.addEventListener(
        "abort",
        () => {
          this.unpark(sleeper);
          reject(abortReason(signal));
        },
        { once: true },
      );
    });

  /** Jump the wall clock without waking anyone (clock skew). */
  set(ms: number): void {
    this.current = ms;
  }

  /** Move time forward and wake every sleeper that is now due. */
  advance(ms: number): void {
    this.current += ms;
    const due = this.sleepers.filter((s) => s.wakeAt <= this.current);
    this.sleepers = this.sleepers.filter((s) => s.wakeAt > this.current);
    for (const sleeper of due) {
      sleeper.wake();
    }
  }

  /** Resolves once at least one sleep is pending. */
  waitForSleep(): Promise<void> {
    if (this.sleepers.length > 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.parkedWaiters.push(resolve);
    });
  }

  /** `advance(ms)`, then wait for the woken loop to sleep again. */
  async advanceToNextSleep(ms: number): Promise<void> {
    this.advance(ms);
    await this.waitForSleep();
  }

  get pendingSleeps(): number {
    return this.sleepers.length;
  }

  private park(sleeper: Sleeper): void {
    this.sleepers = [...this.sleepers, sleeper];
    const waiters = this.parkedWaiters;
    this.parkedWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }

  private unpark(sleeper: Sleeper): void {
    this.sleepers = this.sleepers.filter((s) => s !== sleeper);
  }
}
