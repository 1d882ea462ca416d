/**
 * Discovery Transform Tests
 *
 * Tests for reply validation and candidate building.
 */
import { describe, expect, it } from "vitest";

import {
  hasEnergyMeter,
  parseDiscoveryReply,
  toCandidate,
} from "../transform.js";

const PLUG_REPLY = {
  system: {
    get_sysinfo: {
      deviceId: "8006ABC",
      alias: "Fridge",
      model: "HS110(EU)",
      hw_ver: "2.0",
      relay_state: 1,
    },
  },
  emeter: {
    get_realtime: {
      current_ma: 250,
      voltage_mv: 230000,
      power_mw: 57500,
      total_wh: 100,
      err_code: 0,
    },
  },
};

describe("Discovery Transform", () => {
  describe("parseDiscoveryReply", () => {
    it("accepts a reply with sysinfo identity", () => {
      const reply = parseDiscoveryReply(PLUG_REPLY);

      expect(reply?.system.get_sysinfo.deviceId).toBe("8006ABC");
    });

    it("rejects a reply without deviceId", () => {
      expect(
        parseDiscoveryReply({ system: { get_sysinfo: { alias: "x" } } }),
      ).toBeNull();
    });

    it("rejects a non-object payload", () => {
      expect(parseDiscoveryReply([1, 2, 3])).toBeNull();
    });
  });

  describe("hasEnergyMeter", () => {
    it("is true for a realtime block without error", () => {
      const reply = parseDiscoveryReply(PLUG_REPLY);

      expect(reply && hasEnergyMeter(reply)).toBe(true);
    });

    it("is false when the module is not supported", () => {
      const reply = parseDiscoveryReply({
        system: { get_sysinfo: { deviceId: "B", alias: "Lamp" } },
        emeter: { err_code: -2001, err_msg: "Module not support" },
      });

      expect(reply && hasEnergyMeter(reply)).toBe(false);
    });

    it("is false when the emeter block is missing", () => {
      const reply = parseDiscoveryReply({
        system: { get_sysinfo: { deviceId: "B", alias: "Lamp" } },
      });

      expect(reply && hasEnergyMeter(reply)).toBe(false);
    });
  });

  describe("toCandidate", () => {
    it("builds a candidate keyed by deviceId with the source host", () => {
      const reply = parseDiscoveryReply(PLUG_REPLY);
      if (!reply) {
        throw new Error("reply should parse");
      }

      expect(toCandidate(reply, "192.168.1.40", 9999)).toEqual({
        deviceId: "8006ABC",
        alias: "Fridge",
        address: { host: "192.168.1.40", port: 9999 },
        profile: "milli-units",
        model: "HS110(EU)",
      });
    });

    it("falls back to auto profile when realtime fields are incomplete", () => {
      const reply = parseDiscoveryReply({
        system: { get_sysinfo: { deviceId: "C", alias: "Heater" } },
        emeter: { get_realtime: { err_code: 0 } },
      });
      if (!reply) {
        throw new Error("reply should parse");
      }

      expect(toCandidate(reply, "10.0.0.5", 9999)).toMatchObject({
        profile: "auto",
        model: null,
      });
    });

    it("leaves the profile to auto when a reply mixes conventions", () => {
      const reply = parseDiscoveryReply({
        system: { get_sysinfo: { deviceId: "D", alias: "Kettle" } },
        emeter: {
          get_realtime: {
            current: 0,
            voltage: 0,
            power: 0,
            total: 0,
            current_ma: 10,
            voltage_mv: 230000,
            power_mw: 2300,
            total_wh: 5,
          },
        },
      });
      if (!reply) {
        throw new Error("reply should parse");
      }

      expect(toCandidate(reply, "10.0.0.6", 9999)).toMatchObject({
        profile: "auto",
      });
    });

    it("returns null for devices without an energy meter", () => {
      const reply = parseDiscoveryReply({
        system: { get_sysinfo: { deviceId: "B", alias: "Lamp" } },
        emeter: { err_code: -2001 },
      });
      if (!reply) {
        throw new Error("reply should parse");
      }

      expect(toCandidate(reply, "10.0.0.6", 9999)).toBeNull();
    });
  });
});
