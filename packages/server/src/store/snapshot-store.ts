import type { ExternalError } from "@countdown/errors";
import type { PersistedSnapshot } from "../timer/snapshot.js";

// ---------------------------------------------------------------------------
// Result type
// ---------------------------------------------------------------------------

export type StoreResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: ExternalError };

// ---------------------------------------------------------------------------
// Abstract interface
// ---------------------------------------------------------------------------

/**
 * Persistence backend for the timer snapshot.
 *
 * Implementations never throw: every failure comes back as an unsuccessful
 * result so callers can log it and keep the in-memory state authoritative.
 */
export interface SnapshotStore {
  /** `value` is undefined when nothing has been saved yet. */
  load(): Promise<StoreResult<PersistedSnapshot | undefined>>;
  /** Overwrite the stored snapshot. */
  save(snapshot: PersistedSnapshot): Promise<StoreResult<void>>;
}
