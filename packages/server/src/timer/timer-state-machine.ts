import { type Clock, defaultClock, type TimerSnapshot } from "@countdown/core";
import { ValidationError } from "@countdown/errors";
import { type PersistedSnapshot, toPersistedSnapshot } from "./snapshot.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Result of a state-machine operation. `snapshot` is captured in the same
 * synchronous step as the mutation; `changed` is false for no-ops.
 */
export interface TimerMutation {
  readonly snapshot: TimerSnapshot;
  readonly changed: boolean;
}

// ---------------------------------------------------------------------------
// TimerStateMachine
// ---------------------------------------------------------------------------

/**
 * Authoritative countdown state.
 *
 * Every operation runs synchronously to completion, so on the event loop
 * no two mutations can interleave and each returned snapshot is exactly
 * the state the mutation produced. Persisting and broadcasting that
 * snapshot is the caller's job.
 *
 * Invariants:
 * - `seconds` is a non-negative integer
 * - a running timer that reaches 0 stops in the same step
 * - `lastUpdate` never moves backwards, even if the wall clock does
 */
export class TimerStateMachine {
  private _seconds: number;
  private _running: boolean;
  private _lastUpdate: number;
  private readonly clock: Clock;

  constructor(initial: TimerSnapshot, clock: Clock = defaultClock) {
    this.clock = clock;
    this._seconds = Math.max(0, Math.floor(initial.seconds));
    this._running = initial.running && this._seconds > 0;
    this._lastUpdate = initial.lastUpdate;
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  snapshot(): TimerSnapshot {
    return { seconds: this._seconds, running: this._running, lastUpdate: this._lastUpdate };
  }

  toPersisted(): PersistedSnapshot {
    return toPersistedSnapshot(this.snapshot());
  }

  get seconds(): number {
    return this._seconds;
  }

  get running(): boolean {
    return this._running;
  }

  // -------------------------------------------------------------------------
  // Control operations
  // -------------------------------------------------------------------------

  /** Begin counting down. No-op when already running; `seconds` is untouched. */
  start(): TimerMutation {
    if (this._running) return this.unchanged();
    this._running = true;
    this.touch(this.clock.now());
    return this.changed();
  }

  /** Stop counting down. No-op when already paused. */
  pause(): TimerMutation {
    if (!this._running) return this.unchanged();
    this._running = false;
    this.touch(this.clock.now());
    return this.changed();
  }

  reset(): TimerMutation {
    this._seconds = 0;
    this._running = false;
    this.touch(this.clock.now());
    return this.changed();
  }

  /** Add `delta` seconds (may be negative); the result floors at 0. */
  adjust(delta: number): TimerMutation {
    assertWholeSeconds("delta", delta);
    this._seconds = assertInRange("delta", delta, Math.max(0, this._seconds + delta));
    this.touch(this.clock.now());
    return this.changed();
  }

  set(value: number): TimerMutation {
    assertWholeSeconds("seconds", value);
    this._seconds = assertInRange("seconds", value, Math.max(0, value));
    this.touch(this.clock.now());
    return this.changed();
  }

  // -------------------------------------------------------------------------
  // Tick
  // -------------------------------------------------------------------------

  /**
   * Subtract the whole seconds elapsed since `lastUpdate`.
   * Only a running timer changes; a negative elapsed time counts as zero.
   */
  tick(now: number = this.clock.now()): TimerMutation {
    if (!this._running) return this.unchanged();

    const elapsedSeconds = Math.floor(Math.max(0, now - this._lastUpdate) / 1000);
    this._seconds = Math.max(0, this._seconds - elapsedSeconds);
    this.touch(now);
    if (this._seconds === 0) {
      this._running = false;
    }
    return this.changed();
  }

  // -------------------------------------------------------------------------
  // Recovery
  // -------------------------------------------------------------------------

  /**
   * Replace the whole state with one recovered from storage.
   * Used once at startup, before any control call or tick.
   */
  restore(snapshot: TimerSnapshot): TimerMutation {
    this._seconds = Math.max(0, Math.floor(snapshot.seconds));
    this._running = snapshot.running && this._seconds > 0;
    this._lastUpdate = Math.max(this._lastUpdate, snapshot.lastUpdate);
    return this.changed();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private touch(now: number): void {
    this._lastUpdate = Math.max(this._lastUpdate, now);
  }

  private changed(): TimerMutation {
    return { snapshot: this.snapshot(), changed: true };
  }

  private unchanged(): TimerMutation {
    return { snapshot: this.snapshot(), changed: false };
  }
}

function assertWholeSeconds(field: string, value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError({
      code: "TIMER_INVALID_DURATION",
      message: `${field} must be a whole number of seconds, got ${value}`,
      issues: [{ field, message: "must be a safe integer", code: "invalid_type", value }],
    });
  }
}

/** Rejects a resulting duration that doubles can no longer count down exactly. */
function assertInRange(field: string, value: number, result: number): number {
  if (result > Number.MAX_SAFE_INTEGER) {
    throw new ValidationError({
      code: "TIMER_INVALID_DURATION",
      message: `${field} would push the timer past ${Number.MAX_SAFE_INTEGER} seconds`,
      issues: [{ field, message: "result is out of range", code: "too_big", value }],
    });
  }
  return result;
}
