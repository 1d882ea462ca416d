/**
 * Codec Transform Tests
 *
 * Tests for the cipher and framing functions.
 */
import { describe, expect, it } from "vitest";

import type { JsonValue } from "../schema.js";
import {
  KeystreamCipher,
  decode,
  decodeDatagram,
  decrypt,
  encode,
  encodeDatagram,
  encrypt,
  extractFrame,
} from "../transform.js";

function frameWith(declared: number, body: Buffer): Buffer {
  const header = Buffer.alloc(4);
  header.writeUInt32BE(declared, 0);
  return Buffer.concat([header, body]);
}

describe("Codec Transform", () => {
  // ===========================================================================
  // Cipher
  // ===========================================================================

  describe("KeystreamCipher", () => {
    it("starts from the fixed seed key", () => {
      expect(new KeystreamCipher().currentKey).toBe(0xab);
    });

    it("advances the key to the ciphertext byte just produced", () => {
      const cipher = new KeystreamCipher();

      expect(cipher.encryptByte(0x7b)).toBe(0xd0);
      expect(cipher.currentKey).toBe(0xd0);
      expect(cipher.encryptByte(0x7d)).toBe(0xad);
      expect(cipher.currentKey).toBe(0xad);
    });

    it("advances the key to the ciphertext byte just read when decrypting", () => {
      const cipher = new KeystreamCipher();

      expect(cipher.decryptByte(0xd0)).toBe(0x7b);
      expect(cipher.currentKey).toBe(0xd0);
    });
  });

  describe("encrypt / decrypt", () => {
    it("encrypts a known vector", () => {
      expect(encrypt(Buffer.from("{}"))).toEqual(Buffer.from([0xd0, 0xad]));
    });

    it("decrypts a known vector", () => {
      expect(decrypt(Buffer.from([0xd0, 0xad])).toString("utf8")).toBe("{}");
    });

    it("handles empty input", () => {
      expect(encrypt(Buffer.alloc(0)).length).toBe(0);
      expect(decrypt(Buffer.alloc(0)).length).toBe(0);
    });

    it("restores arbitrary bytes", () => {
      const bytes = Buffer.from([0x00, 0xff, 0xab, 0x10, 0xab, 0xab]);

      expect(decrypt(encrypt(bytes))).toEqual(bytes);
    });
  });

  // ===========================================================================
  // Frames
  // ===========================================================================

  describe("encode", () => {
    it("prefixes the encrypted body with a big-endian length", () => {
      expect(encode({})).toEqual(Buffer.from([0, 0, 0, 2, 0xd0, 0xad]));
    });

    it("measures the length in bytes, not characters", () => {
      const frame = encode({ alias: "Küche" });
      const body = frame.subarray(4);

      expect(frame.readUInt32BE(0)).toBe(body.length);
      expect(body.length).toBe(Buffer.byteLength('{"alias":"Küche"}'));
    });
  });

  describe("decode", () => {
    const payloads: ReadonlyArray<JsonValue> = [
      { system: { get_sysinfo: {} }, emeter: { get_realtime: {} } },
      {
        emeter: {
          get_realtime: {
            current_ma: 250,
            voltage_mv: 123100,
            power_mw: 30000,
            total_wh: 12,
            err_code: 0,
          },
        },
      },
      { alias: "Küche ☕", tags: ["a", 1, true, null], nested: { x: -1.5 } },
    ];

    it.each(payloads)("round-trips %j", (payload) => {
      const result = decode(encode(payload));

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual(payload);
      }
    });

    it("fails with TRUNCATED when the body is shorter than declared", () => {
      const frame = frameWith(10, encrypt(Buffer.from("{}")));

      const result = decode(frame);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toMatchObject({
          type: "TRUNCATED",
          expectedBytes: 10,
          receivedBytes: 2,
        });
      }
    });

    it("fails with TRUNCATED when the header itself is incomplete", () => {
      const result = decode(Buffer.from([0, 0]));

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toMatchObject({
          type: "TRUNCATED",
          expectedBytes: 4,
          receivedBytes: 2,
        });
      }
    });

    it("fails with INVALID_JSON when the body does not parse", () => {
      const body = encrypt(Buffer.from("not json"));

      const result = decode(frameWith(body.length, body));

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.type).toBe("INVALID_JSON");
      }
    });

    it("fails with INVALID_JSON when the body was never encrypted", () => {
      const body = Buffer.from('{"plain":true}');

      const result = decode(frameWith(body.length, body));

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.type).toBe("INVALID_JSON");
      }
    });

    it("ignores bytes past the declared length", () => {
      const frame = Buffer.concat([encode({ a: 1 }), Buffer.from([1, 2, 3])]);

      const result = decode(frame);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({ a: 1 });
      }
    });
  });

  describe("extractFrame", () => {
    it("waits for the header", () => {
      const result = extractFrame(Buffer.from([0, 0, 0]));

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toBeNull();
      }
    });

    it("waits for the full body", () => {
      const partial = encode({ a: 1 }).subarray(0, 6);

      const result = extractFrame(partial);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toBeNull();
      }
    });

    it("splits a complete frame from trailing bytes", () => {
      const first = encode({ a: 1 });
      const second = encode({ b: 2 });

      const result = extractFrame(Buffer.concat([first, second]));

      expect(result.isOk()).toBe(true);
      if (result.isOk() && result.value) {
        expect(result.value.frame).toEqual(first);
        expect(result.value.rest).toEqual(second);
      }
    });

    it("rejects a declared length above the limit", () => {
      const result = extractFrame(frameWith(2048, Buffer.alloc(0)), 1024);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toMatchObject({
          type: "FRAME_TOO_LARGE",
          declaredBytes: 2048,
          limitBytes: 1024,
        });
      }
    });
  });

  // ===========================================================================
  // Datagrams
  // ===========================================================================

  describe("encodeDatagram / decodeDatagram", () => {
    it("carries no length prefix", () => {
      expect(encodeDatagram({})).toEqual(Buffer.from([0xd0, 0xad]));
    });

    it("decodes a datagram", () => {
      const payload = { system: { get_sysinfo: { alias: "Desk" } } };

      const result = decodeDatagram(encodeDatagram(payload));

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual(payload);
      }
    });

    it("fails with INVALID_JSON on an empty datagram", () => {
      const result = decodeDatagram(Buffer.alloc(0));

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.type).toBe("INVALID_JSON");
      }
    });
  });
});
