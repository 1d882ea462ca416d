/**
 * Device Transform Tests
 *
 * Tests for response parsing and unit scaling.
 */
import { describe, expect, it } from "vitest";

import { detectProfile, parseRealtimeResponse } from "../transform.js";

const OBSERVED_AT = 1_700_000_000_000;

describe("Device Transform", () => {
  // ===========================================================================
  // Profile Detection
  // ===========================================================================

  describe("detectProfile", () => {
    it("detects base units", () => {
      expect(
        detectProfile({ current: 0.1, voltage: 230, power: 23, total: 1.2 }),
      ).toBe("base-units");
    });

    it("detects milli-units", () => {
      expect(
        detectProfile({
          current_ma: 100,
          voltage_mv: 230000,
          power_mw: 23000,
          total_wh: 1200,
        }),
      ).toBe("milli-units");
    });

    it("returns null when both conventions are present", () => {
      expect(
        detectProfile({
          current: 0,
          voltage: 0,
          power: 0,
          total: 0,
          current_ma: 100,
          voltage_mv: 230000,
          power_mw: 23000,
          total_wh: 1200,
        }),
      ).toBeNull();
    });

    it("returns null for a block that mixes conventions", () => {
      expect(
        detectProfile({ current: 0.1, voltage: 230, power: 23, total_wh: 1200 }),
      ).toBeNull();
    });

    it("returns null for an incomplete block", () => {
      expect(detectProfile({ current: 0.1, voltage: 230 })).toBeNull();
    });
  });

  // ===========================================================================
  // Response Parsing
  // ===========================================================================

  describe("parseRealtimeResponse", () => {
    it("maps base-unit fields and converts kWh to joules", () => {
      const response = {
        emeter: {
          get_realtime: {
            current: 0.25,
            voltage: 123.1,
            power: 30.0,
            total: 0.5,
            err_code: 0,
          },
        },
      };

      const result = parseRealtimeResponse(response, "auto", OBSERVED_AT);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({
          currentAmperes: 0.25,
          voltageVolts: 123.1,
          powerWatts: 30,
          energyJoulesTotal: 1_800_000,
          observedAt: OBSERVED_AT,
        });
      }
    });

    it("scales milli-unit fields and converts Wh to joules", () => {
      const response = {
        emeter: {
          get_realtime: {
            current_ma: 250,
            voltage_mv: 123100,
            power_mw: 30000,
            total_wh: 12,
          },
        },
      };

      const result = parseRealtimeResponse(response, "auto", OBSERVED_AT);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({
          currentAmperes: 0.25,
          voltageVolts: 123.1,
          powerWatts: 30,
          energyJoulesTotal: 43_200,
          observedAt: OBSERVED_AT,
        });
      }
    });

    it("falls back to milli-unit fields when base-unit fields read zero", () => {
      const response = {
        emeter: {
          get_realtime: {
            current: 0,
            voltage: 0,
            power: 0,
            total: 0,
            current_ma: 250,
            voltage_mv: 123100,
            power_mw: 30000,
            total_wh: 1000,
          },
        },
      };

      const result = parseRealtimeResponse(response, "auto", OBSERVED_AT);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({
          currentAmperes: 0.25,
          voltageVolts: 123.1,
          powerWatts: 30,
          energyJoulesTotal: 3_600_000,
          observedAt: OBSERVED_AT,
        });
      }
    });

    it("resolves each quantity on its own for a mixed block", () => {
      const response = {
        emeter: {
          get_realtime: { current: 0.25, voltage: 123.1, power: 30, total_wh: 2 },
        },
      };

      const result = parseRealtimeResponse(response, "auto", OBSERVED_AT);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({
          currentAmperes: 0.25,
          voltageVolts: 123.1,
          powerWatts: 30,
          energyJoulesTotal: 7200,
          observedAt: OBSERVED_AT,
        });
      }
    });

    it("keeps a zero base-unit value when no other field reports it", () => {
      const response = {
        emeter: {
          get_realtime: { current: 0, voltage: 230.5, power: 0, total: 1 },
        },
      };

      const result = parseRealtimeResponse(response, "auto", OBSERVED_AT);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.currentAmperes).toBe(0);
        expect(result.value.powerWatts).toBe(0);
        expect(result.value.energyJoulesTotal).toBe(3_600_000);
      }
    });

    it("ignores identity fields next to the emeter block", () => {
      const response = {
        system: { get_sysinfo: { deviceId: "A", alias: "Desk" } },
        emeter: {
          get_realtime: { current: 1, voltage: 230, power: 230, total: 0 },
        },
      };

      const result = parseRealtimeResponse(response, "base-units", OBSERVED_AT);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.powerWatts).toBe(230);
        expect(result.value.energyJoulesTotal).toBe(0);
      }
    });

    it("produces an immutable reading", () => {
      const response = {
        emeter: {
          get_realtime: { current: 1, voltage: 230, power: 230, total: 0 },
        },
      };

      const result = parseRealtimeResponse(response, "auto", OBSERVED_AT);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(Object.isFrozen(result.value)).toBe(true);
      }
    });

    it("names the missing fields when an explicit profile does not match", () => {
      const response = {
        emeter: {
          get_realtime: { current: 1, voltage: 230, power: 230, total: 0 },
        },
      };

      const result = parseRealtimeResponse(response, "milli-units", OBSERVED_AT);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.type).toBe("UNEXPECTED_SCHEMA");
        expect(result.error.message).toBe(
          "Missing milli-units fields: current_ma, voltage_mv, power_mw, total_wh",
        );
      }
    });

    it("names the quantities no field reports", () => {
      const response = {
        emeter: { get_realtime: { current_ma: 10, voltage_mv: 230000 } },
      };

      const result = parseRealtimeResponse(response, "auto", OBSERVED_AT);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.type).toBe("UNEXPECTED_SCHEMA");
        expect(result.error.message).toBe(
          "Realtime block has no field for: power, energy",
        );
      }
    });

    it("fails when the device reports an error code", () => {
      const response = {
        emeter: { get_realtime: { err_code: -1, err_msg: "module not support" } },
      };

      const result = parseRealtimeResponse(response, "auto", OBSERVED_AT);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe("Device reported err_code -1");
      }
    });

    it("fails when the emeter block is missing", () => {
      const result = parseRealtimeResponse(
        { system: { get_sysinfo: {} } },
        "auto",
        OBSERVED_AT,
      );

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.type).toBe("UNEXPECTED_SCHEMA");
      }
    });

    it("fails when a telemetry field has the wrong type", () => {
      const response = {
        emeter: {
          get_realtime: { current: "1", voltage: 230, power: 230, total: 0 },
        },
      };

      const result = parseRealtimeResponse(response, "auto", OBSERVED_AT);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.type).toBe("UNEXPECTED_SCHEMA");
      }
    });
  });
});
