export { DEFAULT_SNAPSHOT_TABLE, createSnapshotTable } from "./schema.js";
export { createSnapshotStore } from "./snapshot-store.js";
export type { SnapshotStore, SnapshotStoreOptions } from "./snapshot-store.js";
