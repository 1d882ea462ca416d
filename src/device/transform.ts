/**
 * Device Module - Pure Transformations
 *
 * Maps decoded device responses to Readings using the reporting-profile table.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { JsonValue } from "../codec/index.js";
import { type PollError, unexpectedSchema } from "./errors.js";
import {
  type DeviceProfile,
  EmeterResponseSchema,
  type FieldMapping,
  QUANTITIES,
  type Quantity,
  REPORTING_PROFILE_IDS,
  REPORTING_PROFILES,
  type Reading,
  type Realtime,
  type ReportingProfile,
  type ReportingProfileId,
} from "./schema.js";

// =============================================================================
// Profile Resolution
// =============================================================================

function mappedFields(profile: ReportingProfile): FieldMapping[] {
  return QUANTITIES.map((quantity) => profile[quantity]);
}

function hasAllFields(realtime: Realtime, profile: ReportingProfile): boolean {
  return mappedFields(profile).every(
    (mapping) => realtime[mapping.field] !== undefined,
  );
}

function hasAnyField(realtime: Realtime, profile: ReportingProfile): boolean {
  return mappedFields(profile).some(
    (mapping) => realtime[mapping.field] !== undefined,
  );
}

/**
 * Find the one reporting profile a realtime block uses throughout.
 *
 * @returns Profile ID, or null when the block is incomplete or mixes conventions
 */
export function detectProfile(realtime: Realtime): ReportingProfileId | null {
  for (const id of REPORTING_PROFILE_IDS) {
    if (!hasAllFields(realtime, REPORTING_PROFILES[id])) {
      continue;
    }
    const mixed = REPORTING_PROFILE_IDS.some(
      (other) => other !== id && hasAnyField(realtime, REPORTING_PROFILES[other]),
    );
    return mixed ? null : id;
  }
  return null;
}

function applyMapping(
  realtime: Realtime,
  mapping: FieldMapping,
): number | undefined {
  const raw = realtime[mapping.field];
  if (raw === undefined) {
    return undefined;
  }
  return (raw * mapping.numerator) / mapping.denominator;
}

/**
 * Resolve one quantity across all profiles. The first positive value wins,
 * otherwise the first value present.
 */
function resolveQuantity(
  realtime: Realtime,
  quantity: Quantity,
): number | undefined {
  let fallback: number | undefined;
  for (const id of REPORTING_PROFILE_IDS) {
    const value = applyMapping(realtime, REPORTING_PROFILES[id][quantity]);
    if (value !== undefined && value > 0) {
      return value;
    }
    if (fallback === undefined) {
      fallback = value;
    }
  }
  return fallback;
}

// =============================================================================
// Response Parsing
// =============================================================================

/**
 * Convert a realtime block to a Reading under the given profile.
 *
 * @returns Reading, or UNEXPECTED_SCHEMA naming the first missing field
 */
export function toReading(
  realtime: Realtime,
  profile: ReportingProfile,
  observedAt: number,
): Result<Reading, PollError> {
  const currentAmperes = applyMapping(realtime, profile.current);
  const voltageVolts = applyMapping(realtime, profile.voltage);
  const powerWatts = applyMapping(realtime, profile.power);
  const energyJoulesTotal = applyMapping(realtime, profile.energy);

  if (
    currentAmperes === undefined ||
    voltageVolts === undefined ||
    powerWatts === undefined ||
    energyJoulesTotal === undefined
  ) {
    const missing = mappedFields(profile)
      .filter((mapping) => realtime[mapping.field] === undefined)
      .map((mapping) => mapping.field);
    return err(
      unexpectedSchema(
        `Missing ${profile.id} fields: ${missing.join(", ")}`,
        realtime,
      ),
    );
  }

  return ok(
    Object.freeze({
      currentAmperes,
      voltageVolts,
      powerWatts,
      energyJoulesTotal,
      observedAt,
    }),
  );
}

/**
 * Convert a realtime block to a Reading, resolving each quantity on its own.
 *
 * @returns Reading, or UNEXPECTED_SCHEMA naming the unresolved quantities
 */
export function toAutoReading(
  realtime: Realtime,
  observedAt: number,
): Result<Reading, PollError> {
  const currentAmperes = resolveQuantity(realtime, "current");
  const voltageVolts = resolveQuantity(realtime, "voltage");
  const powerWatts = resolveQuantity(realtime, "power");
  const energyJoulesTotal = resolveQuantity(realtime, "energy");

  if (
    currentAmperes === undefined ||
    voltageVolts === undefined ||
    powerWatts === undefined ||
    energyJoulesTotal === undefined
  ) {
    const missing = QUANTITIES.filter(
      (quantity) => resolveQuantity(realtime, quantity) === undefined,
    );
    return err(
      unexpectedSchema(
        `Realtime block has no field for: ${missing.join(", ")}`,
        realtime,
      ),
    );
  }

  return ok(
    Object.freeze({
      currentAmperes,
      voltageVolts,
      powerWatts,
      energyJoulesTotal,
      observedAt,
    }),
  );
}

/**
 * Parse a decoded device response into a Reading.
 *
 * @param response - Decoded JSON body
 * @param profile - Reporting profile tag from the device record
 * @param observedAt - Timestamp to stamp on the reading
 */
export function parseRealtimeResponse(
  response: JsonValue,
  profile: DeviceProfile,
  observedAt: number,
): Result<Reading, PollError> {
  const parsed = EmeterResponseSchema.safeParse(response);
  if (!parsed.success) {
    return err(
      unexpectedSchema("Response has no emeter.get_realtime block", response),
    );
  }

  const realtime = parsed.data.emeter.get_realtime;

  if (realtime.err_code !== undefined && realtime.err_code !== 0) {
    return err(
      unexpectedSchema(`Device reported err_code ${realtime.err_code}`, realtime),
    );
  }

  if (profile === "auto") {
    return toAutoReading(realtime, observedAt);
  }

  return toReading(realtime, REPORTING_PROFILES[profile], observedAt);
}
