/**
 * Poller Module - Schemas and Types
 *
 * The known-device set and the per-device health state machine:
 *
 *   DISCOVERED -> REACHABLE <-> UNREACHABLE -> (removed)
 *
 * Records are owned by the poller and replaced, never mutated.
 */
import type {
  DeviceAddress,
  DeviceProfile,
  PollError,
  Reading,
} from "../device/index.js";

// =============================================================================
// Device Record
// =============================================================================

export type DeviceHealth = "DISCOVERED" | "REACHABLE" | "UNREACHABLE";

export const CANDIDATE_SOURCES = ["discovery", "directory"] as const;

export type CandidateSource = (typeof CANDIDATE_SOURCES)[number];

/**
 * Consecutive candidate cycles in which each source failed to sight the
 * device. null means the source has never sighted it.
 */
export type Sightings = Readonly<Record<CandidateSource, number | null>>;

export type DeviceRecord = Readonly<{
  /** Vendor-assigned identity, unique in the known-device set */
  deviceId: string;
  alias: string;
  address: DeviceAddress;
  /** Reporting-profile tag selecting the field mapping */
  profile: DeviceProfile;
  /** Source that pinned the profile; null while it is "auto" */
  profileSource: CandidateSource | null;
  model: string | null;
  health: DeviceHealth;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  /** Epoch ms of the last successful poll */
  lastSuccessAt: number | null;
  lastFailure: PollError | null;
  /** Most recent successful reading, kept across failures */
  lastReading: Reading | null;
  firstSeenAt: number;
  sightings: Sightings;
}>;

// =============================================================================
// Configuration
// =============================================================================

export type HealthThresholds = Readonly<{
  /** Consecutive failures that mark a device UNREACHABLE */
  unreachableAfterFailures: number;
  /** Consecutive successes that mark a device REACHABLE */
  reachableAfterSuccesses: number;
  /** Readings older than this are not exported (ms) */
  staleAfterMs: number;
}>;

export type PollerConfig = HealthThresholds &
  Readonly<{
    pollIntervalMs: number;
    candidateIntervalMs: number;
    /** Maximum device queries in flight */
    concurrency: number;
    /** Candidate cycles a device may be missing from every source */
    expiryCycles: number;
  }>;

// =============================================================================
// Summaries
// =============================================================================

export type MergeResult = Readonly<{
  records: ReadonlyMap<string, DeviceRecord>;
  added: ReadonlyArray<string>;
  updated: ReadonlyArray<string>;
  removed: ReadonlyArray<string>;
}>;

export type CycleSummary = Readonly<{
  polled: number;
  succeeded: number;
  failed: number;
  exported: number;
  durationMs: number;
  generation: number;
}>;

export type PollerStatus = Readonly<{
  running: boolean;
  knownDevices: number;
  reachable: number;
  unreachable: number;
  cycles: number;
  lastCycleAt: number | null;
  lastCycleDurationMs: number | null;
}>;
