/**
 * API view models - JSON-safe projections of poller state.
 */
import {
  type DeviceProfile,
  type Reading,
  formatAddress,
  formatPollError,
} from "../device/index.js";
import type { DeviceHealth, DeviceRecord, PollerStatus } from "../poller/index.js";
import type { Snapshot } from "../snapshot/index.js";

export type DeviceView = {
  deviceId: string;
  alias: string;
  address: string;
  profile: DeviceProfile;
  model: string | null;
  health: DeviceHealth;
  exported: boolean;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  lastSuccessAt: string | null;
  lastFailure: string | null;
  lastReading: Reading | null;
};

export type HealthView = {
  status: "starting" | "ok";
  snapshot: {
    generation: number;
    publishedAt: string | null;
    devices: number;
  };
  poller: PollerStatus;
};

const toIso = (epochMs: number | null): string | null =>
  epochMs === null ? null : new Date(epochMs).toISOString();

export function toDeviceView(record: DeviceRecord, snapshot: Snapshot): DeviceView {
  return {
    deviceId: record.deviceId,
    alias: record.alias,
    address: formatAddress(record.address),
    profile: record.profile,
    model: record.model,
    health: record.health,
    exported: snapshot.entries.has(record.deviceId),
    consecutiveFailures: record.consecutiveFailures,
    consecutiveSuccesses: record.consecutiveSuccesses,
    lastSuccessAt: toIso(record.lastSuccessAt),
    lastFailure: record.lastFailure ? formatPollError(record.lastFailure) : null,
    lastReading: record.lastReading,
  };
}

export function toHealthView(snapshot: Snapshot, status: PollerStatus): HealthView {
  return {
    status: snapshot.generation === 0 ? "starting" : "ok",
    snapshot: {
      generation: snapshot.generation,
      publishedAt: toIso(snapshot.publishedAt),
      devices: snapshot.entries.size,
    },
    poller: status,
  };
}
