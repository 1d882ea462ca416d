/**
 * API routes for the smart-plug exporter.
 *
 * - /metrics - Prometheus scrape endpoint
 * - /api/health - Health check
 * - /api/devices - Known-device inventory
 * - / - Landing page
 *
 * Every handler reads the current snapshot reference and never waits on
 * the poller.
 */
import { Hono } from "hono";

import { createLogger } from "../logger.js";
import { EXPOSITION_CONTENT_TYPE, formatExposition } from "../metrics/index.js";
import type { Poller } from "../poller/index.js";
import type { SnapshotStore } from "../snapshot/index.js";
import { LandingPage } from "../ui/pages/Landing.js";
import { toDeviceView, toHealthView } from "./views.js";

const log = createLogger("api");

export type RouteDeps = Readonly<{
  poller: Pick<Poller, "getDevices" | "getDevice" | "getStatus">;
  store: Pick<SnapshotStore, "getSnapshot">;
  appName: string;
  version: string;
}>;

/**
 * Build the route table over a poller and its snapshot store.
 */
export function createRoutes(deps: RouteDeps): Hono {
  const { poller, store } = deps;
  const routes = new Hono();

  // ===========================================================================
  // Scrape
  // ===========================================================================

  routes.get("/metrics", (c) => {
    const snapshot = store.getSnapshot();
    const body = formatExposition(snapshot, poller.getDevices());

    log.debug(
      {
        requestId: c.get("requestId"),
        generation: snapshot.generation,
        devices: snapshot.entries.size,
      },
      "Scrape served",
    );

    return c.body(body, 200, { "Content-Type": EXPOSITION_CONTENT_TYPE });
  });

  // ===========================================================================
  // Health Check
  // ===========================================================================

  /**
   * Health endpoint - returns exporter status.
   * Reports "starting" until the first snapshot is published.
   */
  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      ...toHealthView(store.getSnapshot(), poller.getStatus()),
      timestamp: new Date().toISOString(),
      requestId,
      version: deps.version,
    });
  });

  // ===========================================================================
  // Devices
  // ===========================================================================

  routes.get("/api/devices", (c) => {
    const snapshot = store.getSnapshot();
    return c.json({
      devices: poller.getDevices().map((record) => toDeviceView(record, snapshot)),
      requestId: c.get("requestId"),
    });
  });

  routes.get("/api/devices/:deviceId", (c) => {
    const requestId = c.get("requestId");
    const deviceId = c.req.param("deviceId");
    const record = poller.getDevice(deviceId);

    if (!record) {
      log.debug({ requestId, deviceId }, "Unknown device requested");
      return c.json({ error: `Unknown device ${deviceId}`, requestId }, 404);
    }

    return c.json({
      device: toDeviceView(record, store.getSnapshot()),
      requestId,
    });
  });

  // ===========================================================================
  // Landing Page
  // ===========================================================================

  routes.get("/", (c) => {
    const snapshot = store.getSnapshot();
    return c.html(
      <LandingPage
        appName={deps.appName}
        version={deps.version}
        devices={poller.getDevices().map((record) => toDeviceView(record, snapshot))}
      />,
    );
  });

  return routes;
}
