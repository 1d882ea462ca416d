/**
 * Discovery Module - Schemas and Types
 *
 * Shapes of the broadcast query and the replies devices send back.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

import type { JsonObject } from "../codec/index.js";
import { RealtimeSchema } from "../device/index.js";

/**
 * Broadcast query: identity plus realtime energy, so one pass tells us both
 * who is out there and which reporting convention each device uses.
 */
export const DISCOVERY_QUERY: JsonObject = {
  system: { get_sysinfo: {} },
  emeter: { get_realtime: {} },
};

export const SysinfoSchema = z.object({
  deviceId: z.string().min(1).describe("Vendor-assigned stable identity"),
  alias: z.string().describe("User-assigned display name"),
  model: z.string().optional().describe("Hardware model, e.g. HS110(EU)"),
  hw_ver: z.string().optional().describe("Hardware revision"),
});

export const DiscoveryReplySchema = z.object({
  system: z.object({
    get_sysinfo: SysinfoSchema,
  }),
  emeter: z
    .object({
      get_realtime: RealtimeSchema.optional(),
      err_code: z.number().optional(),
    })
    .optional(),
});

export type DiscoveryReply = z.infer<typeof DiscoveryReplySchema>;

/**
 * Options for one discovery pass.
 */
export type DiscoverOptions = Readonly<{
  /** Broadcast (or unicast) destination for the query */
  broadcastAddress: string;
  /** Device protocol port, used for both the query and the TCP address */
  port: number;
  /** How long to collect replies (ms) */
  timeoutMs: number;
}>;
