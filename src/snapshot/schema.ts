/**
 * Snapshot Module - Schemas and Types
 *
 * The read-only view of the latest readings served to the scrape handler.
 */
import type { Reading } from "../device/index.js";

/**
 * Latest good reading for one reachable device.
 */
export type SnapshotEntry = Readonly<{
  deviceId: string;
  alias: string;
  reading: Reading;
}>;

/**
 * One published generation of readings.
 */
export type Snapshot = Readonly<{
  /** Increments on every publish, 0 before the first */
  generation: number;
  /** Epoch milliseconds of the publish, null before the first */
  publishedAt: number | null;
  entries: ReadonlyMap<string, SnapshotEntry>;
}>;

export const EMPTY_SNAPSHOT: Snapshot = Object.freeze({
  generation: 0,
  publishedAt: null,
  entries: new Map<string, SnapshotEntry>(),
});
