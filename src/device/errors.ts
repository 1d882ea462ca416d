/**
 * Device Module - Error Types
 *
 * Typed error unions for a single device poll.
 * Errors are values, not exceptions.
 */
import type { CodecError } from "../codec/index.js";

/**
 * Reasons a poll attempt can fail.
 */
export type PollError =
  | {
      readonly type: "UNREACHABLE";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "PROTOCOL";
      readonly message: string;
      readonly codecError?: CodecError;
    }
  | {
      readonly type: "UNEXPECTED_SCHEMA";
      readonly message: string;
      readonly responseData?: unknown;
    };

export type PollErrorKind = PollError["type"];

/**
 * Create an UNREACHABLE error.
 */
export function unreachable(message: string, cause?: Error): PollError {
  if (cause) {
    return { type: "UNREACHABLE", message, cause };
  }
  return { type: "UNREACHABLE", message };
}

/**
 * Create a TIMEOUT error.
 */
export function timeout(message: string, timeoutMs: number): PollError {
  return { type: "TIMEOUT", message, timeoutMs };
}

/**
 * Create a PROTOCOL error.
 */
export function protocolError(
  message: string,
  codecError?: CodecError,
): PollError {
  if (codecError) {
    return { type: "PROTOCOL", message, codecError };
  }
  return { type: "PROTOCOL", message };
}

/**
 * Create an UNEXPECTED_SCHEMA error.
 */
export function unexpectedSchema(
  message: string,
  responseData?: unknown,
): PollError {
  return { type: "UNEXPECTED_SCHEMA", message, responseData };
}

/**
 * Format a PollError for logging.
 */
export function formatPollError(error: PollError): string {
  switch (error.type) {
    case "UNREACHABLE":
      return `Unreachable: ${error.message}`;
    case "TIMEOUT":
      return `Timeout after ${error.timeoutMs}ms: ${error.message}`;
    case "PROTOCOL":
      return `Protocol error: ${error.message}`;
    case "UNEXPECTED_SCHEMA":
      return `Unexpected response: ${error.message}`;
  }
}
