/**
 * Codec Module - Pure Transformations
 *
 * Running-key XOR cipher and length-prefixed framing used by both the UDP
 * discovery datagrams and the TCP device queries. No I/O here.
 *
 * Cipher: every output byte becomes the key for the next input byte, seeded
 * with INITIAL_KEY. Encryption keys off the ciphertext it just produced,
 * decryption keys off the ciphertext it just read, so both directions advance
 * the key identically.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type CodecError,
  frameTooLarge,
  invalidJson,
  truncated,
} from "./errors.js";
import {
  type ExtractedFrame,
  FRAME_HEADER_BYTES,
  INITIAL_KEY,
  type JsonValue,
  MAX_FRAME_BYTES,
} from "./schema.js";

// =============================================================================
// Cipher
// =============================================================================

/**
 * Stateful keystream carrying the current key byte.
 * One instance covers one message; create a fresh one per message.
 */
export class KeystreamCipher {
  private key: number;

  constructor(initialKey: number = INITIAL_KEY) {
    this.key = initialKey & 0xff;
  }

  /** Current key byte (the last ciphertext byte seen). */
  get currentKey(): number {
    return this.key;
  }

  encryptByte(plain: number): number {
    const cipher = (plain ^ this.key) & 0xff;
    this.key = cipher;
    return cipher;
  }

  decryptByte(cipher: number): number {
    const plain = (cipher ^ this.key) & 0xff;
    this.key = cipher & 0xff;
    return plain;
  }
}

/**
 * Encrypt a byte sequence.
 *
 * @example
 * encrypt(Buffer.from("{}")) // <Buffer d0 ad>
 */
export function encrypt(plain: Uint8Array): Buffer {
  const cipher = new KeystreamCipher();
  const out = Buffer.alloc(plain.length);

  for (let i = 0; i < plain.length; i++) {
    out[i] = cipher.encryptByte(plain[i] ?? 0);
  }

  return out;
}

/**
 * Decrypt a byte sequence produced by encrypt().
 */
export function decrypt(ciphertext: Uint8Array): Buffer {
  const cipher = new KeystreamCipher();
  const out = Buffer.alloc(ciphertext.length);

  for (let i = 0; i < ciphertext.length; i++) {
    out[i] = cipher.decryptByte(ciphertext[i] ?? 0);
  }

  return out;
}

// =============================================================================
// JSON Body
// =============================================================================

function serialize(payload: JsonValue): Buffer {
  return Buffer.from(JSON.stringify(payload), "utf8");
}

function parseBody(plain: Buffer): Result<JsonValue, CodecError> {
  const text = plain.toString("utf8");

  try {
    const value: JsonValue = JSON.parse(text);
    return ok(value);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(
      invalidJson(`Body of ${plain.length} bytes is not valid JSON`, cause),
    );
  }
}

// =============================================================================
// Datagrams (UDP, unframed)
// =============================================================================

/**
 * Encode a payload for a UDP datagram. Datagrams carry no length prefix.
 */
export function encodeDatagram(payload: JsonValue): Buffer {
  return encrypt(serialize(payload));
}

/**
 * Decode a UDP datagram body.
 */
export function decodeDatagram(
  datagram: Uint8Array,
): Result<JsonValue, CodecError> {
  return parseBody(decrypt(datagram));
}

// =============================================================================
// Frames (TCP, length-prefixed)
// =============================================================================

/**
 * Encode a payload as a TCP frame: 4-byte big-endian body length, then the
 * encrypted body.
 *
 * @example
 * encode({}) // <Buffer 00 00 00 02 d0 ad>
 */
export function encode(payload: JsonValue): Buffer {
  const body = encodeDatagram(payload);
  const header = Buffer.alloc(FRAME_HEADER_BYTES);
  header.writeUInt32BE(body.length, 0);
  return Buffer.concat([header, body]);
}

/**
 * Decode one complete TCP frame. Bytes beyond the declared length are ignored.
 *
 * @returns TRUNCATED when fewer bytes are present than declared,
 *          INVALID_JSON when the decrypted body does not parse.
 */
export function decode(frame: Uint8Array): Result<JsonValue, CodecError> {
  const buffer = Buffer.from(frame.buffer, frame.byteOffset, frame.byteLength);

  if (buffer.length < FRAME_HEADER_BYTES) {
    return err(truncated(FRAME_HEADER_BYTES, buffer.length));
  }

  const declared = buffer.readUInt32BE(0);
  const available = buffer.length - FRAME_HEADER_BYTES;

  if (available < declared) {
    return err(truncated(declared, available));
  }

  const body = buffer.subarray(
    FRAME_HEADER_BYTES,
    FRAME_HEADER_BYTES + declared,
  );

  return parseBody(decrypt(body));
}

/**
 * Split the first complete frame off a receive buffer.
 *
 * @returns ok(null) while more bytes are needed, ok(frame) once one is
 *          complete, or FRAME_TOO_LARGE when the header declares more than
 *          the limit allows.
 */
export function extractFrame(
  buffer: Buffer,
  limitBytes: number = MAX_FRAME_BYTES,
): Result<ExtractedFrame | null, CodecError> {
  if (buffer.length < FRAME_HEADER_BYTES) {
    return ok(null);
  }

  const declared = buffer.readUInt32BE(0);
  if (declared > limitBytes) {
    return err(frameTooLarge(declared, limitBytes));
  }

  const total = FRAME_HEADER_BYTES + declared;
  if (buffer.length < total) {
    return ok(null);
  }

  return ok({
    frame: buffer.subarray(0, total),
    rest: buffer.subarray(total),
  });
}
