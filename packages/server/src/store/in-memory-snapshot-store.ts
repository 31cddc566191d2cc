import { ExternalError } from "@countdown/errors";
import { type PersistedSnapshot, PersistedSnapshotSchema } from "../timer/snapshot.js";
import type { SnapshotStore, StoreResult } from "./snapshot-store.js";

/**
 * In-memory snapshot store for tests and embedding.
 *
 * Holds a structured clone so callers cannot mutate what was saved.
 * `failNextSave` / `failNextLoad` inject one-shot failures.
 */
export class InMemorySnapshotStore implements SnapshotStore {
  private stored: PersistedSnapshot | undefined;
  private saveFailures = 0;
  private loadFailures = 0;
  private _saveCount = 0;

  constructor(initial?: PersistedSnapshot) {
    this.stored = initial ? structuredClone(initial) : undefined;
  }

  async load(): Promise<StoreResult<PersistedSnapshot | undefined>> {
    if (this.loadFailures > 0) {
      this.loadFailures--;
      return {
        success: false,
        error: new ExternalError({
          code: "PERSISTENCE_READ_FAILED",
          message: "Injected load failure",
        }),
      };
    }
    if (!this.stored) return { success: true, value: undefined };

    // Same validation as the file store so tests see identical behavior.
    const parsed = PersistedSnapshotSchema.safeParse(this.stored);
    if (!parsed.success) {
      return {
        success: false,
        error: new ExternalError({
          code: "PERSISTENCE_SNAPSHOT_INVALID",
          message: "Stored snapshot failed validation",
        }),
      };
    }
    return { success: true, value: parsed.data };
  }

  async save(snapshot: PersistedSnapshot): Promise<StoreResult<void>> {
    if (this.saveFailures > 0) {
      this.saveFailures--;
      return {
        success: false,
        error: new ExternalError({
          code: "PERSISTENCE_WRITE_FAILED",
          message: "Injected save failure",
        }),
      };
    }
    this.stored = structuredClone(snapshot);
    this._saveCount++;
    return { success: true, value: undefined };
  }

  /** The last successfully saved snapshot. */
  get current(): PersistedSnapshot | undefined {
    return this.stored ? structuredClone(this.stored) : undefined;
  }

  get saveCount(): number {
    return this._saveCount;
  }

  failNextSave(times = 1): void {
    this.saveFailures = times;
  }

  failNextLoad(times = 1): void {
    this.loadFailures = times;
  }
}
