/**
 * Metrics Transform Tests
 *
 * Tests for the Prometheus text exposition.
 */
import { describe, expect, it } from "vitest";

import type { Snapshot, SnapshotEntry } from "../../snapshot/index.js";
import {
  escapeLabelValue,
  formatExposition,
  formatLabels,
  formatValue,
} from "../transform.js";

function snapshotOf(entries: SnapshotEntry[]): Snapshot {
  return {
    generation: 1,
    publishedAt: 1_000,
    entries: new Map(
      entries.map((entry): [string, SnapshotEntry] => [entry.deviceId, entry]),
    ),
  };
}

const DESK: SnapshotEntry = {
  deviceId: "A",
  alias: "Desk",
  reading: {
    currentAmperes: 0.25,
    voltageVolts: 123.1,
    powerWatts: 30,
    energyJoulesTotal: 1_800_000,
    observedAt: 1_000,
  },
};

describe("Metrics Transform", () => {
  describe("escapeLabelValue", () => {
    it("escapes backslash, quote and newline", () => {
      expect(escapeLabelValue('a\\b"c\nd')).toBe('a\\\\b\\"c\\nd');
    });

    it("leaves other characters alone", () => {
      expect(escapeLabelValue("Küche {1}")).toBe("Küche {1}");
    });
  });

  describe("formatLabels", () => {
    it("renders alias then id", () => {
      expect(formatLabels({ device_alias: 'TV "big"', device_id: "A" })).toBe(
        '{device_alias="TV \\"big\\"",device_id="A"}',
      );
    });
  });

  describe("formatValue", () => {
    it.each([
      [30, "30"],
      [123.1, "123.1"],
      [0, "0"],
      [Number.NaN, "NaN"],
      [Number.POSITIVE_INFINITY, "+Inf"],
      [Number.NEGATIVE_INFINITY, "-Inf"],
    ])("formats %s as %s", (value, expected) => {
      expect(formatValue(value)).toBe(expected);
    });
  });

  describe("formatExposition", () => {
    it("renders readings, up and failures", () => {
      const body = formatExposition(snapshotOf([DESK]), [
        { deviceId: "B", alias: "Heater", consecutiveFailures: 2 },
        { deviceId: "A", alias: "Desk", consecutiveFailures: 0 },
      ]);

      expect(body).toBe(
        [
          "# HELP device_electric_potential_volts RMS voltage reported by the device.",
          "# TYPE device_electric_potential_volts gauge",
          'device_electric_potential_volts{device_alias="Desk",device_id="A"} 123.1',
          "# HELP device_electric_current_amperes RMS current reported by the device.",
          "# TYPE device_electric_current_amperes gauge",
          'device_electric_current_amperes{device_alias="Desk",device_id="A"} 0.25',
          "# HELP device_electric_power_watts Active power reported by the device.",
          "# TYPE device_electric_power_watts gauge",
          'device_electric_power_watts{device_alias="Desk",device_id="A"} 30',
          "# HELP device_electric_energy_joules_total Cumulative energy reported by the device.",
          "# TYPE device_electric_energy_joules_total counter",
          'device_electric_energy_joules_total{device_alias="Desk",device_id="A"} 1800000',
          "# HELP device_up Whether the device's latest reading is being exported (1) or not (0).",
          "# TYPE device_up gauge",
          'device_up{device_alias="Desk",device_id="A"} 1',
          'device_up{device_alias="Heater",device_id="B"} 0',
          "# HELP device_consecutive_failures Consecutive failed polls of the device.",
          "# TYPE device_consecutive_failures gauge",
          'device_consecutive_failures{device_alias="Desk",device_id="A"} 0',
          'device_consecutive_failures{device_alias="Heater",device_id="B"} 2',
          "",
        ].join("\n"),
      );
    });

    it("keeps headers when nothing is known", () => {
      const body = formatExposition(snapshotOf([]), []);
      const lines = body.trimEnd().split("\n");

      expect(lines).toHaveLength(12);
      expect(lines.every((line) => line.startsWith("# "))).toBe(true);
    });

    it("marks a snapshot entry missing from the known set as up", () => {
      const body = formatExposition(snapshotOf([DESK]), []);

      expect(body).toContain('\ndevice_up{device_alias="Desk",device_id="A"} 1\n');
    });

    it("escapes aliases in every series", () => {
      const body = formatExposition(
        snapshotOf([{ ...DESK, alias: 'Lamp "2"\nhall' }]),
        [],
      );

      expect(body).toContain(
        'device_electric_power_watts{device_alias="Lamp \\"2\\"\\nhall",device_id="A"} 30\n',
      );
    });
  });
});
