/**
 * Poller Module - Service Layer
 *
 * Owns the known-device set. Each refresh cycle fans the queries out over a
 * bounded worker pool, joins every outcome, folds them into the records and
 * publishes one new snapshot. Cycles never overlap.
 */
import { type Result, err } from "neverthrow";

import {
  type DeviceAddress,
  type DeviceCandidate,
  type PollOutcome,
  type QueryOptions,
  TELEMETRY_QUERY,
  formatAddress,
  formatPollError,
  queryDevice,
  timeout,
  unreachable,
} from "../device/index.js";
import type { JsonValue } from "../codec/index.js";
import { type DirectoryProvider, formatDirectoryError } from "../directory/index.js";
import { type DiscoveryError, formatDiscoveryError } from "../discovery/index.js";
import {
  createLogger,
  logHealthTransition,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { SnapshotStore } from "../snapshot/index.js";
import type {
  CandidateSource,
  CycleSummary,
  DeviceRecord,
  PollerConfig,
  PollerStatus,
} from "./schema.js";
import {
  applyOutcome,
  buildSnapshotEntries,
  countByHealth,
  mergeCandidates,
} from "./transform.js";

const log = createLogger("poller");

/** Slack added to connect + read timeouts before a query is abandoned. */
const QUERY_DEADLINE_GRACE_MS = 250;

// =============================================================================
// Dependencies
// =============================================================================

export type DeviceQuery = (
  address: DeviceAddress,
  payload: JsonValue,
  options: QueryOptions,
) => Promise<PollOutcome>;

export type DiscoverFn = () => Promise<Result<DeviceCandidate[], DiscoveryError>>;

export type PollerDeps = Readonly<{
  config: PollerConfig;
  timeouts: Readonly<{ connectTimeoutMs: number; readTimeoutMs: number }>;
  store: SnapshotStore;
  /** Defaults to the TCP device client */
  query?: DeviceQuery;
  /** Broadcast discovery pass, omitted when discovery is disabled */
  discover?: DiscoverFn;
  directory?: DirectoryProvider;
  now?: () => number;
}>;

export type Poller = Readonly<{
  /** Merge one source's sightings into the known-device set */
  ingestCandidates: (
    candidates: ReadonlyArray<DeviceCandidate>,
    source?: CandidateSource,
  ) => void;
  /** Poll every known device once and publish a snapshot */
  refreshCycle: () => Promise<CycleSummary>;
  /** Collect candidates from discovery and the directory */
  refreshCandidates: () => Promise<void>;
  /** Run the candidate and poll loops until stop() */
  start: () => Promise<void>;
  stop: () => Promise<void>;
  getDevices: () => ReadonlyArray<DeviceRecord>;
  getDevice: (deviceId: string) => DeviceRecord | null;
  getStatus: () => PollerStatus;
}>;

// =============================================================================
// Bounded Fan-out
// =============================================================================

/**
 * Run worker over every item with at most `limit` in flight. Results keep
 * the order of items.
 */
export async function runBounded<T, R>(
  items: ReadonlyArray<T>,
  limit: number,
  worker: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const lanes = Array.from(
    { length: Math.max(1, Math.min(limit, items.length)) },
    async () => {
      for (;;) {
        const index = next++;
        if (index >= items.length) {
          return;
        }
        const item = items[index];
        if (item === undefined) {
          return;
        }
        results[index] = await worker(item);
      }
    },
  );
  await Promise.all(lanes);

  return results;
}

/**
 * Resolve with the outcome, or TIMEOUT if the query outlives its deadline.
 * A query that throws is treated as unreachable.
 */
async function queryWithDeadline(
  query: DeviceQuery,
  record: DeviceRecord,
  options: QueryOptions,
  deadlineMs: number,
): Promise<PollOutcome> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<PollOutcome>((resolve) => {
    timer = setTimeout(() => {
      resolve(
        err(
          timeout(
            `Query to ${formatAddress(record.address)} abandoned after ${deadlineMs}ms`,
            deadlineMs,
          ),
        ),
      );
    }, deadlineMs);
  });

  try {
    return await Promise.race([
      query(record.address, TELEMETRY_QUERY, options),
      deadline,
    ]);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(
      unreachable(
        `Query to ${formatAddress(record.address)} threw: ${message}`,
        error instanceof Error ? error : undefined,
      ),
    );
  } finally {
    clearTimeout(timer);
  }
}

// =============================================================================
// Poller
// =============================================================================

/**
 * Create a poller over an initially empty known-device set.
 */
export function createPoller(deps: PollerDeps): Poller {
  const { config, timeouts, store } = deps;
  const query = deps.query ?? queryDevice;
  const now = deps.now ?? Date.now;
  const deadlineMs =
    timeouts.connectTimeoutMs + timeouts.readTimeoutMs + QUERY_DEADLINE_GRACE_MS;

  let records: ReadonlyMap<string, DeviceRecord> = new Map();
  let inFlight: Promise<CycleSummary> | null = null;
  let cycles = 0;
  let lastCycleAt: number | null = null;
  let lastCycleDurationMs: number | null = null;

  let stopRequested = false;
  let running: Promise<void> | null = null;
  const wakers = new Set<() => void>();

  // ===========================================================================
  // Candidates
  // ===========================================================================

  function ingestCandidates(
    candidates: ReadonlyArray<DeviceCandidate>,
    source: CandidateSource = "directory",
  ): void {
    const merged = mergeCandidates(
      records,
      candidates,
      source,
      now(),
      config.expiryCycles,
    );
    records = merged.records;

    for (const deviceId of merged.added) {
      const record = records.get(deviceId);
      log.info(
        {
          deviceId,
          alias: record?.alias,
          address: record ? formatAddress(record.address) : undefined,
          source,
        },
        "Device discovered",
      );
    }
    for (const deviceId of merged.updated) {
      const record = records.get(deviceId);
      log.info(
        {
          deviceId,
          alias: record?.alias,
          address: record ? formatAddress(record.address) : undefined,
          source,
        },
        "Device details updated",
      );
    }
    for (const deviceId of merged.removed) {
      log.info({ deviceId, source }, "Device expired from known set");
    }
  }

  async function refreshCandidates(): Promise<void> {
    const tasks: Promise<void>[] = [];

    if (deps.discover) {
      const discover = deps.discover;
      tasks.push(
        discover().then((result) => {
          if (result.isErr()) {
            log.warn(
              { error: formatDiscoveryError(result.error) },
              "Discovery pass failed, keeping known devices",
            );
            return;
          }
          ingestCandidates(result.value, "discovery");
        }),
      );
    }

    if (deps.directory) {
      const directory = deps.directory;
      tasks.push(
        directory.listDevices().then((result) => {
          if (result.isErr()) {
            log.warn(
              {
                directory: directory.name,
                error: formatDirectoryError(result.error),
              },
              "Directory lookup failed, keeping known devices",
            );
            return;
          }
          ingestCandidates(result.value, "directory");
        }),
      );
    }

    await Promise.all(tasks);
  }

  // ===========================================================================
  // Refresh Cycle
  // ===========================================================================

  async function runCycle(): Promise<CycleSummary> {
    const startedAt = now();
    const targets = [...records.values()];

    const outcomes = await runBounded(
      targets,
      config.concurrency,
      async (record) => {
        const outcome = await queryWithDeadline(
          query,
          record,
          { ...timeouts, profile: record.profile, now },
          deadlineMs,
        );
        return { deviceId: record.deviceId, outcome };
      },
    );

    // Records may have changed while queries were in flight; fold into
    // whatever is current and skip devices removed meanwhile.
    const next = new Map(records);
    let succeeded = 0;
    let failed = 0;

    for (const { deviceId, outcome } of outcomes) {
      const record = next.get(deviceId);
      if (!record) {
        continue;
      }

      const updated = applyOutcome(record, outcome, config);
      next.set(deviceId, updated);

      if (outcome.isOk()) {
        succeeded++;
      } else {
        failed++;
        log.debug(
          {
            deviceId,
            alias: record.alias,
            consecutiveFailures: updated.consecutiveFailures,
            error: formatPollError(outcome.error),
          },
          "Device poll failed",
        );
      }

      if (updated.health !== record.health) {
        logHealthTransition(log, deviceId, record.health, updated.health, {
          alias: record.alias,
          consecutiveFailures: updated.consecutiveFailures,
          lastFailure: updated.lastFailure
            ? formatPollError(updated.lastFailure)
            : undefined,
        });
      }
    }

    records = next;

    const finishedAt = now();
    const snapshot = store.publish(
      buildSnapshotEntries(records.values(), finishedAt, config.staleAfterMs),
      finishedAt,
    );

    cycles++;
    lastCycleAt = finishedAt;
    lastCycleDurationMs = finishedAt - startedAt;

    return {
      polled: targets.length,
      succeeded,
      failed,
      exported: snapshot.entries.size,
      durationMs: lastCycleDurationMs,
      generation: snapshot.generation,
    };
  }

  function refreshCycle(): Promise<CycleSummary> {
    if (inFlight) {
      log.debug("Refresh cycle already running, joining it");
      return inFlight;
    }

    inFlight = runCycle().finally(() => {
      inFlight = null;
    });
    return inFlight;
  }

  // ===========================================================================
  // Loops
  // ===========================================================================

  function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        wakers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      wakers.add(wake);
    });
  }

  async function loop(
    operation: string,
    intervalMs: number,
    task: () => Promise<unknown>,
    delayFirst: boolean,
  ): Promise<void> {
    if (delayFirst && !stopRequested) {
      await sleep(intervalMs);
    }

    while (!stopRequested) {
      const startedAt = now();
      try {
        await task();
      } catch (error) {
        logOperationFailed(log, operation, error);
      }

      if (stopRequested) {
        break;
      }
      await sleep(Math.max(0, intervalMs - (now() - startedAt)));
    }
  }

  async function runLoops(): Promise<void> {
    const startTime = Date.now();
    logOperationStart(log, "pollerLoops", {
      pollIntervalMs: config.pollIntervalMs,
      candidateIntervalMs: config.candidateIntervalMs,
      concurrency: config.concurrency,
    });

    // First sighting before the first poll.
    try {
      await refreshCandidates();
    } catch (error) {
      logOperationFailed(log, "refreshCandidates", error);
    }

    await Promise.all([
      loop("refreshCandidates", config.candidateIntervalMs, refreshCandidates, true),
      loop(
        "refreshCycle",
        config.pollIntervalMs,
        async () => {
          const summary = await refreshCycle();
          log.debug(summary, "Refresh cycle complete");
        },
        false,
      ),
    ]);

    logOperationComplete(log, "pollerLoops", startTime, { cycles });
  }

  function start(): Promise<void> {
    if (running) {
      log.warn("Poller already running");
      return running;
    }

    stopRequested = false;
    running = runLoops().finally(() => {
      running = null;
    });
    return running;
  }

  async function stop(): Promise<void> {
    if (!running) {
      log.warn("Poller not running");
      return;
    }

    log.info("Stopping poller...");
    stopRequested = true;
    for (const wake of [...wakers]) {
      wake();
    }
    await running;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  function getStatus(): PollerStatus {
    const counts = countByHealth(records.values());
    return {
      running: running !== null,
      knownDevices: records.size,
      reachable: counts.REACHABLE,
      unreachable: counts.UNREACHABLE,
      cycles,
      lastCycleAt,
      lastCycleDurationMs,
    };
  }

  return {
    ingestCandidates,
    refreshCycle,
    refreshCandidates,
    start,
    stop,
    getDevices: () =>
      [...records.values()].sort((a, b) => a.deviceId.localeCompare(b.deviceId)),
    getDevice: (deviceId) => records.get(deviceId) ?? null,
    getStatus,
  };
}
