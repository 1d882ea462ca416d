/**
 * Metrics Module - Schemas and Types
 *
 * Metric family definitions for the Prometheus text exposition format.
 */
import type { Reading } from "../device/index.js";
import type { DeviceRecord } from "../poller/index.js";

export const EXPOSITION_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

export type MetricType = "gauge" | "counter";

/**
 * A family whose samples come from each device's latest reading.
 */
export type ReadingFamily = Readonly<{
  name: string;
  help: string;
  type: MetricType;
  value: (reading: Reading) => number;
}>;

export const READING_FAMILIES: ReadonlyArray<ReadingFamily> = [
  {
    name: "device_electric_potential_volts",
    help: "RMS voltage reported by the device.",
    type: "gauge",
    value: (reading) => reading.voltageVolts,
  },
  {
    name: "device_electric_current_amperes",
    help: "RMS current reported by the device.",
    type: "gauge",
    value: (reading) => reading.currentAmperes,
  },
  {
    name: "device_electric_power_watts",
    help: "Active power reported by the device.",
    type: "gauge",
    value: (reading) => reading.powerWatts,
  },
  {
    name: "device_electric_energy_joules_total",
    help: "Cumulative energy reported by the device.",
    type: "counter",
    value: (reading) => reading.energyJoulesTotal,
  },
];

export const UP_FAMILY = {
  name: "device_up",
  help: "Whether the device's latest reading is being exported (1) or not (0).",
  type: "gauge",
} as const satisfies Omit<ReadingFamily, "value">;

export const FAILURES_FAMILY = {
  name: "device_consecutive_failures",
  help: "Consecutive failed polls of the device.",
  type: "gauge",
} as const satisfies Omit<ReadingFamily, "value">;

/**
 * The parts of a device record the exposition needs.
 */
export type ExposedDevice = Pick<
  DeviceRecord,
  "deviceId" | "alias" | "consecutiveFailures"
>;

export type Labels = Readonly<{
  device_alias: string;
  device_id: string;
}>;
