/**
 * Poller Module - Pure Transformations
 *
 * Candidate merging, the health state machine and snapshot selection.
 * No side effects, no I/O - just data in, data out.
 */
import type { DeviceCandidate, PollOutcome } from "../device/index.js";
import type { SnapshotEntry } from "../snapshot/index.js";
import type {
  CandidateSource,
  DeviceHealth,
  DeviceRecord,
  HealthThresholds,
  MergeResult,
  Sightings,
} from "./schema.js";

// =============================================================================
// Candidate Merging
// =============================================================================

const NO_SIGHTINGS: Sightings = { discovery: null, directory: null };

/**
 * Create a fresh record for a first sighting.
 */
export function createRecord(
  candidate: DeviceCandidate,
  source: CandidateSource,
  now: number,
): DeviceRecord {
  return {
    deviceId: candidate.deviceId,
    alias: candidate.alias,
    address: candidate.address,
    profile: candidate.profile,
    profileSource: candidate.profile === "auto" ? null : source,
    model: candidate.model,
    health: "DISCOVERED",
    consecutiveFailures: 0,
    consecutiveSuccesses: 0,
    lastSuccessAt: null,
    lastFailure: null,
    lastReading: null,
    firstSeenAt: now,
    sightings: { ...NO_SIGHTINGS, [source]: 0 },
  };
}

/**
 * Whether a sighting may replace the record's profile. "auto" never does,
 * and a discovered profile never replaces one pinned in the directory.
 */
function takesProfile(
  record: DeviceRecord,
  candidate: DeviceCandidate,
  source: CandidateSource,
): boolean {
  if (candidate.profile === "auto") {
    return false;
  }
  return !(source === "discovery" && record.profileSource === "directory");
}

/**
 * Refresh a known record from a new sighting. Identity, health and history
 * are kept; location and display fields follow the candidate.
 */
export function refreshRecord(
  record: DeviceRecord,
  candidate: DeviceCandidate,
  source: CandidateSource,
): DeviceRecord {
  const profile = takesProfile(record, candidate, source)
    ? { profile: candidate.profile, profileSource: source }
    : { profile: record.profile, profileSource: record.profileSource };

  return {
    ...record,
    ...profile,
    alias: candidate.alias,
    address: candidate.address,
    model: candidate.model ?? record.model,
    sightings: { ...record.sightings, [source]: 0 },
  };
}

function sameDetails(a: DeviceRecord, b: DeviceRecord): boolean {
  return (
    a.alias === b.alias &&
    a.address.host === b.address.host &&
    a.address.port === b.address.port &&
    a.profile === b.profile &&
    a.model === b.model
  );
}

/**
 * A record expires once every source that ever sighted it has missed it
 * for at least expiryCycles consecutive cycles.
 */
export function isExpired(record: DeviceRecord, expiryCycles: number): boolean {
  const counts = Object.values(record.sightings).filter(
    (count): count is number => count !== null,
  );
  return counts.length > 0 && counts.every((count) => count >= expiryCycles);
}

/**
 * Merge one source's candidate list into the known-device set.
 *
 * Candidates are keyed by deviceId; within one list the last one wins.
 * Known devices the source previously sighted but did not list this time
 * accumulate a missed cycle and are removed once expired.
 *
 * @returns New record map plus the IDs that were added, updated or removed
 */
export function mergeCandidates(
  records: ReadonlyMap<string, DeviceRecord>,
  candidates: ReadonlyArray<DeviceCandidate>,
  source: CandidateSource,
  now: number,
  expiryCycles: number,
): MergeResult {
  const sighted = new Map<string, DeviceCandidate>();
  for (const candidate of candidates) {
    sighted.set(candidate.deviceId, candidate);
  }

  const next = new Map<string, DeviceRecord>();
  const added: string[] = [];
  const updated: string[] = [];
  const removed: string[] = [];

  for (const [deviceId, record] of records) {
    const candidate = sighted.get(deviceId);

    if (candidate) {
      const refreshed = refreshRecord(record, candidate, source);
      if (!sameDetails(record, refreshed)) {
        updated.push(deviceId);
      }
      next.set(deviceId, refreshed);
      continue;
    }

    const missed = record.sightings[source];
    const aged: DeviceRecord =
      missed === null
        ? record
        : { ...record, sightings: { ...record.sightings, [source]: missed + 1 } };

    if (isExpired(aged, expiryCycles)) {
      removed.push(deviceId);
    } else {
      next.set(deviceId, aged);
    }
  }

  for (const [deviceId, candidate] of sighted) {
    if (!records.has(deviceId)) {
      next.set(deviceId, createRecord(candidate, source, now));
      added.push(deviceId);
    }
  }

  return { records: next, added, updated, removed };
}

// =============================================================================
// Health State Machine
// =============================================================================

/**
 * Fold one poll outcome into a record.
 *
 * Success resets the failure count and keeps the reading; the device
 * becomes REACHABLE once reachableAfterSuccesses is met. Failure resets
 * the success count; the device becomes UNREACHABLE once
 * unreachableAfterFailures is met. A failure never discards the last
 * good reading.
 */
export function applyOutcome(
  record: DeviceRecord,
  outcome: PollOutcome,
  thresholds: HealthThresholds,
): DeviceRecord {
  if (outcome.isOk()) {
    const consecutiveSuccesses = record.consecutiveSuccesses + 1;
    const health: DeviceHealth =
      consecutiveSuccesses >= thresholds.reachableAfterSuccesses
        ? "REACHABLE"
        : record.health;

    return {
      ...record,
      health,
      consecutiveSuccesses,
      consecutiveFailures: 0,
      lastSuccessAt: outcome.value.observedAt,
      lastFailure: null,
      lastReading: outcome.value,
    };
  }

  const consecutiveFailures = record.consecutiveFailures + 1;
  const health: DeviceHealth =
    consecutiveFailures >= thresholds.unreachableAfterFailures
      ? "UNREACHABLE"
      : record.health;

  return {
    ...record,
    health,
    consecutiveFailures,
    consecutiveSuccesses: 0,
    lastFailure: outcome.error,
  };
}

// =============================================================================
// Snapshot Selection
// =============================================================================

/**
 * Whether a record's last reading belongs in the published snapshot.
 */
export function isExportable(
  record: DeviceRecord,
  now: number,
  staleAfterMs: number,
): boolean {
  if (record.health !== "REACHABLE" || record.lastReading === null) {
    return false;
  }
  return now - record.lastReading.observedAt <= staleAfterMs;
}

/**
 * Select the snapshot entries for the current known-device set, ordered
 * by deviceId.
 */
export function buildSnapshotEntries(
  records: Iterable<DeviceRecord>,
  now: number,
  staleAfterMs: number,
): SnapshotEntry[] {
  const entries: SnapshotEntry[] = [];
  for (const record of records) {
    if (record.lastReading !== null && isExportable(record, now, staleAfterMs)) {
      entries.push({
        deviceId: record.deviceId,
        alias: record.alias,
        reading: record.lastReading,
      });
    }
  }
  return entries.sort((a, b) => a.deviceId.localeCompare(b.deviceId));
}

/**
 * Count records by health state.
 */
export function countByHealth(
  records: Iterable<DeviceRecord>,
): Record<DeviceHealth, number> {
  const counts: Record<DeviceHealth, number> = {
    DISCOVERED: 0,
    REACHABLE: 0,
    UNREACHABLE: 0,
  };
  for (const record of records) {
    counts[record.health]++;
  }
  return counts;
}
