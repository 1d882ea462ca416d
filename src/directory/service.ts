/**
 * Directory Module - Service Layer
 *
 * File-backed directory provider: a JSON array of devices, re-read on every
 * lookup so edits take effect on the next candidate cycle.
 */
import { readFile } from "node:fs/promises";
import { type Result, err } from "neverthrow";

import type { DeviceCandidate } from "../device/index.js";
import { createLogger } from "../logger.js";
import {
  type DirectoryError,
  directoryUnavailable,
  invalidFormat,
} from "./errors.js";
import { type DirectoryProvider, DirectoryFileSchema } from "./schema.js";
import { toCandidates } from "./transform.js";

const log = createLogger("directory");

/**
 * Read and validate a directory file.
 *
 * @param path - JSON file path
 * @param defaultPort - Port for addresses that omit one
 */
export async function readDirectoryFile(
  path: string,
  defaultPort: number,
): Promise<Result<DeviceCandidate[], DirectoryError>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(directoryUnavailable(`Cannot read ${path}: ${cause.message}`, cause));
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(invalidFormat(`${path} is not valid JSON: ${message}`));
  }

  const parsed = DirectoryFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown";
    return err(invalidFormat(`${path} does not match the directory schema (${where})`));
  }

  const candidates = toCandidates(parsed.data, defaultPort);
  if (candidates.isOk()) {
    log.debug({ path, count: candidates.value.length }, "Directory file read");
  }
  return candidates;
}

/**
 * Create a directory provider backed by a JSON file.
 */
export function createFileDirectoryProvider(
  path: string,
  defaultPort: number,
): DirectoryProvider {
  return {
    name: `file:${path}`,
    listDevices: () => readDirectoryFile(path, defaultPort),
  };
}
