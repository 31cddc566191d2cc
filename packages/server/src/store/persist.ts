import type { PersistedSnapshot } from "../timer/snapshot.js";
import type { SnapshotStore } from "./snapshot-store.js";

/**
 * Save and log on failure. Returns whether the write landed.
 * The in-memory timer stays authoritative either way.
 */
export async function persistSnapshot(
  store: SnapshotStore,
  snapshot: PersistedSnapshot,
): Promise<boolean> {
  const result = await store.save(snapshot);
  if (!result.success) {
    console.warn(`[countdown-store] Failed to persist timer state: ${result.error.message}`);
    return false;
  }
  return true;
}
