/**
 * Directory Module - Schemas and Types
 *
 * A directory supplies known devices and their addresses without a
 * broadcast, e.g. for devices on another subnet.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import { type DeviceCandidate, DeviceProfileSchema } from "../device/index.js";
import type { DirectoryError } from "./errors.js";

/**
 * One device as listed in a directory file.
 */
export const DirectoryEntrySchema = z.object({
  deviceId: z.string().min(1).describe("Vendor-assigned stable identity"),
  alias: z.string().describe("Display name"),
  address: z.string().min(1).describe("host or host:port"),
  profile: DeviceProfileSchema.default("auto").describe(
    "Reporting profile; auto detects from the response",
  ),
  model: z.string().optional().describe("Hardware model"),
});

export type DirectoryEntry = z.infer<typeof DirectoryEntrySchema>;

export const DirectoryFileSchema = z.array(DirectoryEntrySchema);

/**
 * Source of known devices. Failures are values and never fatal.
 */
export type DirectoryProvider = Readonly<{
  name: string;
  listDevices: () => Promise<Result<DeviceCandidate[], DirectoryError>>;
}>;
