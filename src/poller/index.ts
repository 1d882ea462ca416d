/**
 * Poller Module - Public API
 *
 * Known-device set, health state machine and the refresh-cycle orchestrator.
 */

// Types
export type {
  CandidateSource,
  CycleSummary,
  DeviceHealth,
  DeviceRecord,
  HealthThresholds,
  MergeResult,
  PollerConfig,
  PollerStatus,
  Sightings,
} from "./schema.js";
export { CANDIDATE_SOURCES } from "./schema.js";

// Service functions (side effects)
export type { DeviceQuery, DiscoverFn, Poller, PollerDeps } from "./service.js";
export { createPoller, runBounded } from "./service.js";

// Pure transformations
export {
  applyOutcome,
  buildSnapshotEntries,
  countByHealth,
  createRecord,
  isExpired,
  isExportable,
  mergeCandidates,
  refreshRecord,
} from "./transform.js";
