/**
 * Device Module - Schemas and Types
 *
 * Data shapes for device queries and the readings they produce.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { JsonObject } from "../codec/index.js";
import type { PollError } from "./errors.js";

// =============================================================================
// Addressing
// =============================================================================

/**
 * Network location of a device. May change (DHCP) without changing identity.
 */
export type DeviceAddress = Readonly<{
  host: string;
  port: number;
}>;

/**
 * A device sighting from discovery or the directory, before it is merged
 * into the known-device set.
 */
export type DeviceCandidate = Readonly<{
  deviceId: string;
  alias: string;
  address: DeviceAddress;
  profile: DeviceProfile;
  model: string | null;
}>;

/**
 * Connect and read deadlines for one query.
 */
export type QueryTimeouts = Readonly<{
  connectTimeoutMs: number;
  readTimeoutMs: number;
}>;

/**
 * Request selecting identity and realtime energy telemetry.
 */
export const TELEMETRY_QUERY: JsonObject = {
  system: { get_sysinfo: {} },
  emeter: { get_realtime: {} },
};

// =============================================================================
// Reading
// =============================================================================

/**
 * One successful telemetry sample, in base SI units.
 */
export type Reading = Readonly<{
  currentAmperes: number;
  voltageVolts: number;
  powerWatts: number;
  /** Monotonic counter, resets when the device reboots */
  energyJoulesTotal: number;
  /** Epoch milliseconds */
  observedAt: number;
}>;

/**
 * Result of one poll attempt. Never persisted.
 */
export type PollOutcome = Result<Reading, PollError>;

// =============================================================================
// Realtime Response
// =============================================================================

/**
 * Realtime energy block. Older hardware reports floats in base units,
 * newer hardware reports integers in milli-units.
 */
export const RealtimeSchema = z.object({
  current: z.number().optional().describe("Current in amperes"),
  voltage: z.number().optional().describe("Voltage in volts"),
  power: z.number().optional().describe("Power in watts"),
  total: z.number().optional().describe("Cumulative energy in kWh"),
  current_ma: z.number().optional().describe("Current in milliamperes"),
  voltage_mv: z.number().optional().describe("Voltage in millivolts"),
  power_mw: z.number().optional().describe("Power in milliwatts"),
  total_wh: z.number().optional().describe("Cumulative energy in Wh"),
  err_code: z.number().optional().describe("Device error code, 0 on success"),
});

export type Realtime = z.infer<typeof RealtimeSchema>;

export type RealtimeField = Exclude<keyof Realtime, "err_code">;

export const EmeterResponseSchema = z.object({
  emeter: z.object({
    get_realtime: RealtimeSchema,
  }),
});

// =============================================================================
// Reporting Profiles
// =============================================================================

export const REPORTING_PROFILE_IDS = ["base-units", "milli-units"] as const;

export type ReportingProfileId = (typeof REPORTING_PROFILE_IDS)[number];

/**
 * Profile tag carried by a device record. "auto" resolves each quantity
 * on its own, in the order of REPORTING_PROFILE_IDS.
 */
export type DeviceProfile = ReportingProfileId | "auto";

export const DeviceProfileSchema = z.enum(["auto", "base-units", "milli-units"]);

/**
 * Conversion of one raw field to base units: raw * numerator / denominator.
 */
export type FieldMapping = Readonly<{
  field: RealtimeField;
  numerator: number;
  denominator: number;
}>;

export const QUANTITIES = ["current", "voltage", "power", "energy"] as const;

export type Quantity = (typeof QUANTITIES)[number];

export type ReportingProfile = Readonly<
  { id: ReportingProfileId } & Record<Quantity, FieldMapping>
>;

const SECONDS_PER_HOUR = 3600;

/**
 * Field mapping per reporting convention. Supporting another model means
 * adding a row here.
 */
export const REPORTING_PROFILES: Readonly<
  Record<ReportingProfileId, ReportingProfile>
> = {
  "base-units": {
    id: "base-units",
    current: { field: "current", numerator: 1, denominator: 1 },
    voltage: { field: "voltage", numerator: 1, denominator: 1 },
    power: { field: "power", numerator: 1, denominator: 1 },
    // kWh -> J
    energy: { field: "total", numerator: 1000 * SECONDS_PER_HOUR, denominator: 1 },
  },
  "milli-units": {
    id: "milli-units",
    current: { field: "current_ma", numerator: 1, denominator: 1000 },
    voltage: { field: "voltage_mv", numerator: 1, denominator: 1000 },
    power: { field: "power_mw", numerator: 1, denominator: 1000 },
    // Wh -> J
    energy: { field: "total_wh", numerator: SECONDS_PER_HOUR, denominator: 1 },
  },
};
