/**
 * Discovery Module - Public API
 *
 * UDP broadcast discovery of devices on the local network.
 */

// Types
export type { DiscoverOptions, DiscoveryReply } from "./schema.js";
export { DISCOVERY_QUERY, DiscoveryReplySchema } from "./schema.js";
export type { DiscoveryError } from "./errors.js";

// Error utilities
export { formatDiscoveryError, socketError } from "./errors.js";

// Service functions (side effects)
export { discover } from "./service.js";

// Pure transformations
export { hasEnergyMeter, parseDiscoveryReply, toCandidate } from "./transform.js";
