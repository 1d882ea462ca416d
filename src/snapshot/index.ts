/**
 * Snapshot Module - Public API
 */

// Types
export type { Snapshot, SnapshotEntry } from "./schema.js";
export { EMPTY_SNAPSHOT } from "./schema.js";

// Service functions
export type { SnapshotStore } from "./service.js";
export { createSnapshotStore } from "./service.js";
