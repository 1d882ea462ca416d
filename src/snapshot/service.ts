/**
 * Snapshot Module - Service Layer
 *
 * Copy-on-publish holder for the latest snapshot. The writer builds a new
 * map and swaps a single reference; readers take whatever reference is
 * current and never wait on the writer.
 */
import { createLogger } from "../logger.js";
import { EMPTY_SNAPSHOT, type Snapshot, type SnapshotEntry } from "./schema.js";

const log = createLogger("snapshot");

export type SnapshotStore = Readonly<{
  /** Replace the whole snapshot with a new generation */
  publish: (entries: Iterable<SnapshotEntry>, publishedAt: number) => Snapshot;
  /** Most recently published snapshot */
  getSnapshot: () => Snapshot;
}>;

/**
 * Create an empty snapshot store.
 */
export function createSnapshotStore(): SnapshotStore {
  let current: Snapshot = EMPTY_SNAPSHOT;

  return {
    publish: (entries, publishedAt) => {
      const next = new Map<string, SnapshotEntry>();
      for (const entry of entries) {
        next.set(entry.deviceId, Object.freeze({ ...entry }));
      }

      current = Object.freeze({
        generation: current.generation + 1,
        publishedAt,
        entries: next,
      });

      log.debug(
        { generation: current.generation, devices: next.size },
        "Snapshot published",
      );
      return current;
    },
    getSnapshot: () => current,
  };
}
