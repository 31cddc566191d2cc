/**
 * Timer state shapes shared by the server and its clients.
 */

/**
 * Point-in-time view of the authoritative timer.
 */
export interface TimerSnapshot {
  /** Remaining countdown, whole seconds, never negative */
  readonly seconds: number;
  readonly running: boolean;
  /** Wall-clock ms at which `seconds`/`running` were last known-correct */
  readonly lastUpdate: number;
}

/**
 * Body pushed to subscribers on connect and on every tick,
 * and returned by `GET /get`.
 */
export interface TimerPayload {
  readonly seconds: number;
  readonly running: boolean;
}

/** `status` values reported by the control endpoints. */
export type ControlStatus = "reset" | "started" | "paused" | "adjusted" | "set";

/** Body returned by every mutating control endpoint. */
export interface ControlResponse {
  readonly status: ControlStatus;
  readonly seconds: number;
}

/** Project a snapshot onto the wire payload. */
export function toTimerPayload(snapshot: TimerSnapshot): TimerPayload {
  return { seconds: snapshot.seconds, running: snapshot.running };
}
