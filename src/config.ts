/**
 * Typed configuration - all config lives in the environment, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Smart-plug exporter configuration covering:
 * - HTTP server settings
 * - UDP discovery
 * - Device directory file
 * - Polling schedule, concurrency and timeouts
 * - Health thresholds
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional path - empty string becomes undefined
 */
const optionalPath = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

export const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().int().positive().default(9233).describe("HTTP server port"),
  HOST: z.string().default("0.0.0.0").describe("HTTP listen address"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("smartplug-exporter").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Discovery
  // ==========================================================================
  DISCOVERY_ENABLED: envBoolean(true).describe(
    "Enable UDP broadcast discovery",
  ),
  DISCOVERY_BROADCAST_ADDRESS: z
    .string()
    .default("255.255.255.255")
    .describe("Broadcast address for discovery queries"),
  DISCOVERY_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(500)
    .describe("How long to collect discovery replies (ms)"),
  DISCOVERY_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(60_000)
    .describe("Interval between candidate refreshes (ms)"),
  DEVICE_PORT: z.coerce
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(9999)
    .describe("Well-known device protocol port (UDP and TCP)"),

  // ==========================================================================
  // Device Directory
  // ==========================================================================
  DIRECTORY_FILE: optionalPath.describe(
    "JSON file listing known devices (deviceId, alias, address)",
  ),

  // ==========================================================================
  // Polling
  // ==========================================================================
  POLL_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(15_000)
    .describe("Interval between poll cycles (ms)"),
  POLL_CONCURRENCY: z.coerce
    .number()
    .int()
    .positive()
    .default(8)
    .describe("Maximum device queries in flight"),
  CONNECT_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(2000)
    .describe("TCP connect timeout per device (ms)"),
  READ_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(3000)
    .describe("Response read timeout per device (ms)"),

  // ==========================================================================
  // Health Thresholds
  // ==========================================================================
  UNREACHABLE_AFTER_FAILURES: z.coerce
    .number()
    .int()
    .positive()
    .default(3)
    .describe("Consecutive failures before a device is marked unreachable"),
  REACHABLE_AFTER_SUCCESSES: z.coerce
    .number()
    .int()
    .positive()
    .default(1)
    .describe("Consecutive successes before a device is reachable again"),
  STALE_AFTER_MS: z.coerce
    .number()
    .positive()
    .default(120_000)
    .describe("Age after which a reading is no longer exported (ms)"),
  DEVICE_EXPIRY_CYCLES: z.coerce
    .number()
    .int()
    .positive()
    .default(5)
    .describe("Candidate cycles a device may be missing before removal"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Discovery configuration for the discovery service.
 * Returns null if discovery is disabled.
 */
export function getDiscoveryConfig(
  source: Config = config,
): Readonly<{
  broadcastAddress: string;
  port: number;
  timeoutMs: number;
}> | null {
  if (!source.DISCOVERY_ENABLED) {
    return null;
  }

  return {
    broadcastAddress: source.DISCOVERY_BROADCAST_ADDRESS,
    port: source.DEVICE_PORT,
    timeoutMs: source.DISCOVERY_TIMEOUT_MS,
  };
}

/**
 * Timeouts handed to the device client for every query.
 */
export function getDeviceClientConfig(
  source: Config = config,
): Readonly<{ connectTimeoutMs: number; readTimeoutMs: number }> {
  return {
    connectTimeoutMs: source.CONNECT_TIMEOUT_MS,
    readTimeoutMs: source.READ_TIMEOUT_MS,
  };
}

/**
 * Scheduling and health thresholds for the polling orchestrator.
 */
export function getPollerConfig(source: Config = config): Readonly<{
  pollIntervalMs: number;
  candidateIntervalMs: number;
  concurrency: number;
  unreachableAfterFailures: number;
  reachableAfterSuccesses: number;
  staleAfterMs: number;
  expiryCycles: number;
}> {
  return {
    pollIntervalMs: source.POLL_INTERVAL_MS,
    candidateIntervalMs: source.DISCOVERY_INTERVAL_MS,
    concurrency: source.POLL_CONCURRENCY,
    unreachableAfterFailures: source.UNREACHABLE_AFTER_FAILURES,
    reachableAfterSuccesses: source.REACHABLE_AFTER_SUCCESSES,
    staleAfterMs: source.STALE_AFTER_MS,
    expiryCycles: source.DEVICE_EXPIRY_CYCLES,
  };
}
