/**
 * Codec Module - Public API
 *
 * Wire codec shared by discovery (UDP) and device queries (TCP).
 */

// Types
export type { ExtractedFrame, JsonObject, JsonValue } from "./schema.js";
export { FRAME_HEADER_BYTES, INITIAL_KEY, MAX_FRAME_BYTES } from "./schema.js";

// Errors
export type { CodecError } from "./errors.js";
export { formatCodecError } from "./errors.js";

// Pure transformations
export {
  KeystreamCipher,
  decode,
  decodeDatagram,
  decrypt,
  encode,
  encodeDatagram,
  encrypt,
  extractFrame,
} from "./transform.js";
