/**
 * Codec Module - Error Types
 *
 * Typed error unions for encode/decode operations.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while decoding device traffic.
 */
export type CodecError =
  | {
      readonly type: "TRUNCATED";
      readonly message: string;
      readonly expectedBytes: number;
      readonly receivedBytes: number;
    }
  | {
      readonly type: "INVALID_JSON";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "FRAME_TOO_LARGE";
      readonly message: string;
      readonly declaredBytes: number;
      readonly limitBytes: number;
    };

/**
 * Create a TRUNCATED error.
 */
export function truncated(
  expectedBytes: number,
  receivedBytes: number,
): CodecError {
  return {
    type: "TRUNCATED",
    message: `Expected ${expectedBytes} bytes, received ${receivedBytes}`,
    expectedBytes,
    receivedBytes,
  };
}

/**
 * Create an INVALID_JSON error.
 */
export function invalidJson(message: string, cause?: Error): CodecError {
  if (cause) {
    return { type: "INVALID_JSON", message, cause };
  }
  return { type: "INVALID_JSON", message };
}

/**
 * Create a FRAME_TOO_LARGE error.
 */
export function frameTooLarge(
  declaredBytes: number,
  limitBytes: number,
): CodecError {
  return {
    type: "FRAME_TOO_LARGE",
    message: `Declared frame length ${declaredBytes} exceeds ${limitBytes}`,
    declaredBytes,
    limitBytes,
  };
}

/**
 * Format a CodecError for logging.
 */
export function formatCodecError(error: CodecError): string {
  switch (error.type) {
    case "TRUNCATED":
      return `Truncated frame: ${error.message}`;
    case "INVALID_JSON":
      return `Invalid JSON: ${error.message}`;
    case "FRAME_TOO_LARGE":
      return `Frame too large: ${error.message}`;
  }
}
