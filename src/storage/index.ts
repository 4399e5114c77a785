/**
 * @fileoverview Storage module exports
 */

export { SnapshotStore } from './snapshot_store.js';
export type { SnapshotStoreOptions, StoredSnapshotInfo } from './snapshot_store.js';
