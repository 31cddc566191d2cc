import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { ExternalError, getErrorMessage } from "@countdown/errors";
import { type PersistedSnapshot, PersistedSnapshotSchema } from "../timer/snapshot.js";
import type { SnapshotStore, StoreResult } from "./snapshot-store.js";

/**
 * Snapshot store backed by one JSON file, overwritten on every save.
 *
 * Saves are chained so they reach the disk in call order; the file always
 * ends up holding the most recent snapshot handed to `save`.
 */
export class FileSnapshotStore implements SnapshotStore {
  readonly path: string;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(path: string) {
    this.path = path;
  }

  async load(): Promise<StoreResult<PersistedSnapshot | undefined>> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (isNotFound(error)) return { success: true, value: undefined };
      return {
        success: false,
        error: new ExternalError({
          code: "PERSISTENCE_READ_FAILED",
          message: `Failed to read ${this.path}: ${getErrorMessage(error)}`,
          metadata: { path: this.path },
          cause: error instanceof Error ? error : undefined,
        }),
      };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return {
        success: false,
        error: new ExternalError({
          code: "PERSISTENCE_SNAPSHOT_INVALID",
          message: `${this.path} is not valid JSON`,
          metadata: { path: this.path },
          cause: error instanceof Error ? error : undefined,
        }),
      };
    }

    const parsed = PersistedSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((i) => i.path.join(".") || "(root)").join(", ");
      return {
        success: false,
        error: new ExternalError({
          code: "PERSISTENCE_SNAPSHOT_INVALID",
          message: `${this.path} has missing or invalid fields: ${fields}`,
          metadata: { path: this.path },
        }),
      };
    }
    return { success: true, value: parsed.data };
  }

  save(snapshot: PersistedSnapshot): Promise<StoreResult<void>> {
    const body = JSON.stringify(snapshot);
    const next = this.pending.then(() => this.write(body));
    this.pending = next;
    return next;
  }

  private async write(body: string): Promise<StoreResult<void>> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, body, "utf8");
      return { success: true, value: undefined };
    } catch (error) {
      return {
        success: false,
        error: new ExternalError({
          code: "PERSISTENCE_WRITE_FAILED",
          message: `Failed to write ${this.path}: ${getErrorMessage(error)}`,
          metadata: { path: this.path },
          cause: error instanceof Error ? error : undefined,
        }),
      };
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
