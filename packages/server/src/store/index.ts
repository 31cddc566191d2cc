export { FileSnapshotStore } from "./file-snapshot-store.js";
export { InMemorySnapshotStore } from "./in-memory-snapshot-store.js";
export { persistSnapshot } from "./persist.js";
export type { SnapshotStore, StoreResult } from "./snapshot-store.js";
