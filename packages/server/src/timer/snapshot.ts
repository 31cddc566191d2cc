import type { TimerSnapshot } from "@countdown/core";
import { z } from "zod";

// ---------------------------------------------------------------------------
// On-disk record
// ---------------------------------------------------------------------------

/**
 * The persisted projection of the timer. `last_update` is float seconds
 * since the epoch; field names are part of the file format.
 */
export const PersistedSnapshotSchema = z.object({
  seconds: z.number().int().nonnegative(),
  running: z.boolean(),
  last_update: z.number().finite(),
});

export type PersistedSnapshot = z.infer<typeof PersistedSnapshotSchema>;

export function toPersistedSnapshot(snapshot: TimerSnapshot): PersistedSnapshot {
  return {
    seconds: snapshot.seconds,
    running: snapshot.running,
    last_update: snapshot.lastUpdate / 1000,
  };
}

// ---------------------------------------------------------------------------
// Startup
// ---------------------------------------------------------------------------

export function freshTimerState(now: number): TimerSnapshot {
  return { seconds: 0, running: false, lastUpdate: now };
}

/**
 * Rebuild the in-memory state from a snapshot written before a restart.
 *
 * A running timer loses the whole seconds that passed while the process was
 * down and stops if that exhausts it. A paused timer is restored verbatim.
 * Either way the result is stamped with `now`.
 */
export function recoverTimerState(saved: PersistedSnapshot, now: number): TimerSnapshot {
  if (!saved.running) {
    return { seconds: saved.seconds, running: false, lastUpdate: now };
  }

  // Work in integer ms so T+30s is exactly 30 elapsed seconds.
  const elapsedMs = Math.max(0, now - Math.round(saved.last_update * 1000));
  const seconds = Math.max(0, saved.seconds - Math.floor(elapsedMs / 1000));
  return { seconds, running: seconds > 0, lastUpdate: now };
}
