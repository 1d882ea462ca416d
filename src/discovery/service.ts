/**
 * Discovery Module - Service Layer
 *
 * One UDP broadcast, then a bounded window collecting unicast replies.
 * No state survives between passes; the poller owns the known-device set.
 */
import * as dgram from "node:dgram";
import { type Result, err, ok } from "neverthrow";

import { decodeDatagram, encodeDatagram, formatCodecError } from "../codec/index.js";
import type { DeviceCandidate } from "../device/index.js";
import { createLogger } from "../logger.js";
import { type DiscoveryError, socketError } from "./errors.js";
import { DISCOVERY_QUERY, type DiscoverOptions } from "./schema.js";
import { parseDiscoveryReply, toCandidate } from "./transform.js";

const log = createLogger("discovery");

/**
 * Broadcast a discovery query and collect candidates until the window closes.
 *
 * Replies that fail to decode or validate are dropped and logged. Several
 * replies from one source address collapse into one candidate (last wins).
 *
 * @returns Candidates seen in this pass, or SOCKET_ERROR if the socket failed
 */
export function discover(
  options: DiscoverOptions,
): Promise<Result<DeviceCandidate[], DiscoveryError>> {
  const query = encodeDatagram(DISCOVERY_QUERY);

  return new Promise((resolve) => {
    const candidates = new Map<string, DeviceCandidate>();
    const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });
    let timer: NodeJS.Timeout | undefined;
    let settled = false;

    const finish = (result: Result<DeviceCandidate[], DiscoveryError>) => {
      if (settled) {
        return;
      }
      settled = true;
      if (timer) {
        clearTimeout(timer);
        timer = undefined;
      }
      socket.removeAllListeners("message");
      try {
        socket.close();
      } catch (error) {
        log.debug({ error }, "Discovery socket was not open");
      }
      resolve(result);
    };

    socket.on("error", (error: Error) => {
      finish(err(socketError(error.message, error)));
    });

    socket.on("message", (msg: Buffer, rinfo: dgram.RemoteInfo) => {
      const decoded = decodeDatagram(msg);
      if (decoded.isErr()) {
        log.warn(
          { from: rinfo.address, error: formatCodecError(decoded.error) },
          "Dropping undecodable discovery reply",
        );
        return;
      }

      const reply = parseDiscoveryReply(decoded.value);
      if (!reply) {
        log.warn({ from: rinfo.address }, "Dropping discovery reply without sysinfo");
        return;
      }

      const candidate = toCandidate(reply, rinfo.address, options.port);
      if (!candidate) {
        log.debug(
          { from: rinfo.address, deviceId: reply.system.get_sysinfo.deviceId },
          "Skipping device without energy meter",
        );
        return;
      }

      candidates.set(rinfo.address, candidate);
    });

    socket.bind(0, () => {
      socket.setBroadcast(true);
      timer = setTimeout(() => {
        const found = Array.from(candidates.values());
        log.debug({ count: found.length }, "Discovery window closed");
        finish(ok(found));
      }, options.timeoutMs);

      socket.send(query, options.port, options.broadcastAddress, (error) => {
        if (error) {
          finish(err(socketError(`Broadcast failed: ${error.message}`, error)));
        }
      });
    });
  });
}
