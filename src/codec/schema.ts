/**
 * Codec Module - Schemas and Types
 *
 * Data shapes carried by the device wire protocol.
 */

/**
 * Any value that survives a JSON round trip.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | ReadonlyArray<JsonValue>
  | { readonly [key: string]: JsonValue };

/**
 * Object-shaped JSON payload (every request and response envelope is one).
 */
export type JsonObject = { readonly [key: string]: JsonValue };

/**
 * A complete frame split off the front of a receive buffer.
 */
export type ExtractedFrame = Readonly<{
  /** Header plus body of the first frame */
  frame: Buffer;
  /** Bytes following the frame (start of the next one, if any) */
  rest: Buffer;
}>;

// =============================================================================
// Protocol Constants
// =============================================================================

/** Seed for the running-key cipher. */
export const INITIAL_KEY = 0xab;

/** Size of the big-endian length prefix on TCP frames. */
export const FRAME_HEADER_BYTES = 4;

/** Largest body a device is allowed to declare. */
export const MAX_FRAME_BYTES = 1024 * 1024;
