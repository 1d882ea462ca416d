/**
 * Directory Module - Pure Transformations
 *
 * Address parsing and entry-to-candidate conversion.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { DeviceAddress, DeviceCandidate } from "../device/index.js";
import { type DirectoryError, invalidFormat } from "./errors.js";
import type { DirectoryEntry } from "./schema.js";

function parsePort(raw: string): number | null {
  if (!/^\d+$/.test(raw)) {
    return null;
  }
  const port = Number.parseInt(raw, 10);
  return port >= 1 && port <= 65535 ? port : null;
}

/**
 * Parse "host", "host:port", "[v6]" or "[v6]:port".
 *
 * @example
 * parseAddress("192.168.1.20:9999", 9999) // { host: "192.168.1.20", port: 9999 }
 * parseAddress("plug.lan", 9999)          // { host: "plug.lan", port: 9999 }
 */
export function parseAddress(
  raw: string,
  defaultPort: number,
): DeviceAddress | null {
  const value = raw.trim();
  if (value === "") {
    return null;
  }

  const bracketed = /^\[([^\]]+)\](?::(.*))?$/.exec(value);
  if (bracketed) {
    const host = bracketed[1] ?? "";
    const portRaw = bracketed[2];
    if (portRaw === undefined) {
      return { host, port: defaultPort };
    }
    const port = parsePort(portRaw);
    return port === null ? null : { host, port };
  }

  const colons = value.split(":").length - 1;
  if (colons === 0) {
    return { host: value, port: defaultPort };
  }
  if (colons > 1) {
    // Bare IPv6 literal, no port.
    return { host: value, port: defaultPort };
  }

  const separator = value.lastIndexOf(":");
  const host = value.slice(0, separator);
  const port = parsePort(value.slice(separator + 1));
  if (host === "" || port === null) {
    return null;
  }
  return { host, port };
}

/**
 * Convert directory entries to candidates.
 *
 * @returns Candidates, or INVALID_FORMAT naming the first bad address
 */
export function toCandidates(
  entries: ReadonlyArray<DirectoryEntry>,
  defaultPort: number,
): Result<DeviceCandidate[], DirectoryError> {
  const candidates: DeviceCandidate[] = [];

  for (const entry of entries) {
    const address = parseAddress(entry.address, defaultPort);
    if (!address) {
      return err(
        invalidFormat(
          `Device ${entry.deviceId} has invalid address "${entry.address}"`,
        ),
      );
    }
    candidates.push({
      deviceId: entry.deviceId,
      alias: entry.alias,
      address,
      profile: entry.profile,
      model: entry.model ?? null,
    });
  }

  return ok(candidates);
}
