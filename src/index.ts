#!/usr/bin/env node
/**
 * Smart-Plug Exporter - Application Entry Point
 *
 * Wires discovery, the directory file, the poller and the snapshot store
 * together and serves them over HTTP:
 * - /metrics scrape endpoint
 * - Health and inventory endpoints
 * - Request ID tracing
 * - Global error handling
 * - Background candidate and poll loops
 */
import { serve } from "@hono/node-server";

import { createApp } from "./api/app.js";
import {
  config,
  getDeviceClientConfig,
  getDiscoveryConfig,
  getPollerConfig,
} from "./config.js";
import { createFileDirectoryProvider } from "./directory/index.js";
import { discover } from "./discovery/index.js";
import { createLogger } from "./logger.js";
import { createPoller } from "./poller/index.js";
import { createSnapshotStore } from "./snapshot/index.js";

const log = createLogger("api");

const VERSION = "0.1.0";

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  SMART-PLUG PROMETHEUS EXPORTER");
console.log("========================================");
console.log("");

const pollerConfig = getPollerConfig();
const discoveryConfig = getDiscoveryConfig();
const deviceClientConfig = getDeviceClientConfig();

log.info(
  {
    port: config.PORT,
    host: config.HOST,
    env: config.NODE_ENV,
    devicePort: config.DEVICE_PORT,
    ...pollerConfig,
    ...deviceClientConfig,
  },
  "Configuration loaded",
);

if (discoveryConfig) {
  log.info(
    {
      broadcastAddress: discoveryConfig.broadcastAddress,
      timeoutMs: discoveryConfig.timeoutMs,
    },
    "UDP discovery: ENABLED",
  );
} else {
  log.info("UDP discovery: DISABLED");
}

if (config.DIRECTORY_FILE) {
  log.info({ path: config.DIRECTORY_FILE }, "Device directory: ENABLED");
} else {
  log.info("Device directory: DISABLED");
}

if (!discoveryConfig && !config.DIRECTORY_FILE) {
  log.warn("No device source configured; no devices will be polled");
}

console.log("");

// =============================================================================
// POLLER
// =============================================================================

const store = createSnapshotStore();

const poller = createPoller({
  config: pollerConfig,
  timeouts: deviceClientConfig,
  store,
  ...(discoveryConfig ? { discover: () => discover(discoveryConfig) } : {}),
  ...(config.DIRECTORY_FILE
    ? {
        directory: createFileDirectoryProvider(
          config.DIRECTORY_FILE,
          config.DEVICE_PORT,
        ),
      }
    : {}),
});

// Runs in the background until stop()
poller.start().catch((error) => {
  log.error({ error }, "Poller crashed");
});

// =============================================================================
// HTTP SERVER
// =============================================================================

const app = createApp({
  poller,
  store,
  appName: config.APP_NAME,
  version: VERSION,
});

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  },
  (info) => {
    log.info(
      { port: info.port, address: info.address, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on ${info.address}:${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

let shuttingDown = false;

const shutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  await poller.stop();

  await new Promise<void>((resolve) => {
    server.close((error) => {
      if (error) {
        log.warn({ error: error.message }, "HTTP server close reported an error");
      }
      resolve();
    });
  });

  log.info("Shutdown complete");
  process.exit(0);
};

const onSignal = (signal: string) => {
  shutdown(signal).catch((error) => {
    log.error({ error }, "Shutdown failed");
    process.exit(1);
  });
};

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
