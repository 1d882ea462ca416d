/**
 * Device Module - Service Layer
 *
 * One TCP round trip per query: connect, write a framed request, read one
 * framed response. The socket is destroyed on every exit path.
 */
import * as net from "node:net";
import { type Result, err } from "neverthrow";

import {
  type JsonValue,
  decode,
  encode,
  extractFrame,
  formatCodecError,
} from "../codec/index.js";
import { createLogger } from "../logger.js";
import {
  type PollError,
  formatPollError,
  protocolError,
  timeout,
  unreachable,
} from "./errors.js";
import type {
  DeviceAddress,
  DeviceProfile,
  PollOutcome,
  QueryTimeouts,
} from "./schema.js";
import { parseRealtimeResponse } from "./transform.js";

const log = createLogger("device");

export type QueryOptions = QueryTimeouts &
  Readonly<{
    /** Reporting profile used to map the response */
    profile?: DeviceProfile;
    /** Clock for the reading timestamp */
    now?: () => number;
  }>;

/**
 * Format an address for logs and error messages.
 */
export function formatAddress(address: DeviceAddress): string {
  return address.host.includes(":")
    ? `[${address.host}]:${address.port}`
    : `${address.host}:${address.port}`;
}

// =============================================================================
// Raw Query
// =============================================================================

/**
 * Send one encoded payload and decode the framed response.
 *
 * @returns Decoded JSON, or UNREACHABLE (connect failure or connect timeout),
 *          TIMEOUT (no complete response within readTimeoutMs), PROTOCOL
 *          (undecodable or truncated response)
 */
export function sendQuery(
  address: DeviceAddress,
  payload: JsonValue,
  timeouts: QueryTimeouts,
): Promise<Result<JsonValue, PollError>> {
  const target = formatAddress(address);

  return new Promise((resolve) => {
    const socket = net.createConnection({
      host: address.host,
      port: address.port,
    });
    let received = Buffer.alloc(0);
    let connected = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (result: Result<JsonValue, PollError>) => {
      if (settled) {
        return;
      }
      settled = true;
      if (timer) {
        clearTimeout(timer);
        timer = undefined;
      }
      socket.destroy();
      resolve(result);
    };

    const arm = (ms: number, onExpire: () => void) => {
      if (timer) {
        clearTimeout(timer);
      }
      timer = setTimeout(onExpire, ms);
    };

    arm(timeouts.connectTimeoutMs, () => {
      finish(
        err(
          unreachable(
            `Connect to ${target} timed out after ${timeouts.connectTimeoutMs}ms`,
          ),
        ),
      );
    });

    socket.once("connect", () => {
      connected = true;
      arm(timeouts.readTimeoutMs, () => {
        finish(
          err(
            timeout(
              `No complete response from ${target} (${received.length} bytes received)`,
              timeouts.readTimeoutMs,
            ),
          ),
        );
      });
      socket.write(encode(payload));
    });

    socket.on("data", (chunk: Buffer) => {
      received = Buffer.concat([received, chunk]);

      const extracted = extractFrame(received);
      if (extracted.isErr()) {
        finish(
          err(protocolError(formatCodecError(extracted.error), extracted.error)),
        );
        return;
      }
      if (extracted.value === null) {
        return;
      }

      finish(
        decode(extracted.value.frame).mapErr((error) =>
          protocolError(formatCodecError(error), error),
        ),
      );
    });

    socket.once("end", () => {
      // Peer closed before a full frame arrived.
      finish(
        decode(received).mapErr((error) =>
          protocolError(
            `Connection closed by ${target}: ${formatCodecError(error)}`,
            error,
          ),
        ),
      );
    });

    socket.on("error", (error: Error) => {
      finish(
        err(
          unreachable(
            connected
              ? `Connection to ${target} lost: ${error.message}`
              : `Connect to ${target} failed: ${error.message}`,
            error,
          ),
        ),
      );
    });

    socket.once("close", () => {
      finish(err(unreachable(`Connection to ${target} closed`)));
    });
  });
}

// =============================================================================
// Telemetry Query
// =============================================================================

/**
 * Query a device and map its response to a Reading.
 *
 * @param address - Device location
 * @param payload - Request body (normally TELEMETRY_QUERY)
 * @param options - Timeouts, reporting profile and clock
 * @returns PollOutcome - never rejects
 */
export async function queryDevice(
  address: DeviceAddress,
  payload: JsonValue,
  options: QueryOptions,
): Promise<PollOutcome> {
  const now = options.now ?? Date.now;
  const profile = options.profile ?? "auto";

  const response = await sendQuery(address, payload, options);
  const outcome = response.andThen((body) =>
    parseRealtimeResponse(body, profile, now()),
  );

  if (outcome.isErr()) {
    log.debug(
      { address: formatAddress(address), error: formatPollError(outcome.error) },
      "Device query failed",
    );
  } else {
    log.debug(
      { address: formatAddress(address), powerWatts: outcome.value.powerWatts },
      "Device queried successfully",
    );
  }

  return outcome;
}
