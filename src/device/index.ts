/**
 * Device Module - Public API
 *
 * TCP telemetry queries against individual devices.
 */

// Types
export type {
  DeviceAddress,
  DeviceCandidate,
  DeviceProfile,
  FieldMapping,
  PollOutcome,
  Quantity,
  QueryTimeouts,
  Reading,
  Realtime,
  ReportingProfile,
  ReportingProfileId,
} from "./schema.js";
export {
  DeviceProfileSchema,
  QUANTITIES,
  REPORTING_PROFILE_IDS,
  REPORTING_PROFILES,
  RealtimeSchema,
  TELEMETRY_QUERY,
} from "./schema.js";

// Errors
export type { PollError, PollErrorKind } from "./errors.js";
export {
  formatPollError,
  protocolError,
  timeout,
  unexpectedSchema,
  unreachable,
} from "./errors.js";

// Service functions (side effects)
export type { QueryOptions } from "./service.js";
export { formatAddress, queryDevice, sendQuery } from "./service.js";

// Pure transformations
export {
  detectProfile,
  parseRealtimeResponse,
  toAutoReading,
  toReading,
} from "./transform.js";
