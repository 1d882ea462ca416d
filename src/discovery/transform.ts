/**
 * Discovery Module - Pure Transformations
 *
 * Turns decoded discovery replies into device candidates.
 * No side effects, no I/O - just data in, data out.
 */
import type { JsonValue } from "../codec/index.js";
import {
  type DeviceCandidate,
  type DeviceProfile,
  detectProfile,
} from "../device/index.js";
import { type DiscoveryReply, DiscoveryReplySchema } from "./schema.js";

/**
 * Validate a decoded reply.
 *
 * @returns Parsed reply or null if it lacks sysinfo identity
 */
export function parseDiscoveryReply(payload: JsonValue): DiscoveryReply | null {
  const parsed = DiscoveryReplySchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
}

/**
 * Whether the replying device has a working energy meter.
 * Plain switches and bulbs answer the emeter query with an error code.
 */
export function hasEnergyMeter(reply: DiscoveryReply): boolean {
  const emeter = reply.emeter;
  if (!emeter?.get_realtime) {
    return false;
  }
  if (emeter.err_code !== undefined && emeter.err_code !== 0) {
    return false;
  }
  return (emeter.get_realtime.err_code ?? 0) === 0;
}

/**
 * Build a candidate from a reply and the address it arrived from.
 *
 * @returns Candidate, or null when the device cannot report energy
 */
export function toCandidate(
  reply: DiscoveryReply,
  host: string,
  port: number,
): DeviceCandidate | null {
  if (!hasEnergyMeter(reply)) {
    return null;
  }

  const sysinfo = reply.system.get_sysinfo;
  const realtime = reply.emeter?.get_realtime;
  const detected = realtime ? detectProfile(realtime) : null;
  const profile: DeviceProfile = detected ?? "auto";

  return {
    deviceId: sysinfo.deviceId,
    alias: sysinfo.alias,
    address: { host, port },
    profile,
    model: sysinfo.model ?? null,
  };
}
