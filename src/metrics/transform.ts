/**
 * Metrics Module - Pure Transformations
 *
 * Renders a snapshot and the known-device set as Prometheus text
 * exposition (format 0.0.4). No side effects, no I/O - just data in, data out.
 */
import type { Snapshot } from "../snapshot/index.js";
import {
  type ExposedDevice,
  FAILURES_FAMILY,
  type Labels,
  type MetricType,
  READING_FAMILIES,
  UP_FAMILY,
} from "./schema.js";

// =============================================================================
// Formatting Helpers
// =============================================================================

/**
 * Escape a label value: backslash, double quote and newline.
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

/**
 * Escape HELP text: backslash and newline.
 */
export function escapeHelp(help: string): string {
  return help.replace(/\\/g, "\\\\").replace(/\n/g, "\\n");
}

/**
 * Format a sample value. Non-finite values use the exposition spellings.
 */
export function formatValue(value: number): string {
  if (Number.isNaN(value)) {
    return "NaN";
  }
  if (value === Number.POSITIVE_INFINITY) {
    return "+Inf";
  }
  if (value === Number.NEGATIVE_INFINITY) {
    return "-Inf";
  }
  return String(value);
}

export function formatLabels(labels: Labels): string {
  return `{device_alias="${escapeLabelValue(labels.device_alias)}",device_id="${escapeLabelValue(labels.device_id)}"}`;
}

function header(name: string, help: string, type: MetricType): string[] {
  return [`# HELP ${name} ${escapeHelp(help)}`, `# TYPE ${name} ${type}`];
}

function sample(name: string, labels: Labels, value: number): string {
  return `${name}${formatLabels(labels)} ${formatValue(value)}`;
}

// =============================================================================
// Exposition
// =============================================================================

/**
 * Render the exposition body.
 *
 * Reading families cover the devices in the snapshot. device_up and
 * device_consecutive_failures cover every known device, plus any snapshot
 * entry no longer in the known set. Series are ordered by deviceId.
 */
export function formatExposition(
  snapshot: Snapshot,
  devices: ReadonlyArray<ExposedDevice>,
): string {
  const entries = [...snapshot.entries.values()].sort((a, b) =>
    a.deviceId.localeCompare(b.deviceId),
  );

  const known = new Map<string, ExposedDevice>();
  for (const device of devices) {
    known.set(device.deviceId, device);
  }
  for (const entry of entries) {
    if (!known.has(entry.deviceId)) {
      known.set(entry.deviceId, {
        deviceId: entry.deviceId,
        alias: entry.alias,
        consecutiveFailures: 0,
      });
    }
  }
  const everyDevice = [...known.values()].sort((a, b) =>
    a.deviceId.localeCompare(b.deviceId),
  );

  const lines: string[] = [];

  for (const family of READING_FAMILIES) {
    lines.push(...header(family.name, family.help, family.type));
    for (const entry of entries) {
      lines.push(
        sample(
          family.name,
          { device_alias: entry.alias, device_id: entry.deviceId },
          family.value(entry.reading),
        ),
      );
    }
  }

  lines.push(...header(UP_FAMILY.name, UP_FAMILY.help, UP_FAMILY.type));
  for (const device of everyDevice) {
    lines.push(
      sample(
        UP_FAMILY.name,
        { device_alias: device.alias, device_id: device.deviceId },
        snapshot.entries.has(device.deviceId) ? 1 : 0,
      ),
    );
  }

  lines.push(
    ...header(FAILURES_FAMILY.name, FAILURES_FAMILY.help, FAILURES_FAMILY.type),
  );
  for (const device of everyDevice) {
    lines.push(
      sample(
        FAILURES_FAMILY.name,
        { device_alias: device.alias, device_id: device.deviceId },
        device.consecutiveFailures,
      ),
    );
  }

  return `${lines.join("\n")}\n`;
}
