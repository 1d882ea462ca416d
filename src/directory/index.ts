/**
 * Directory Module - Public API
 *
 * Device Directory Provider interface and the file-backed implementation.
 */

// Types
export type {
  DirectoryEntry,
  DirectoryProvider,
} from "./schema.js";
export { DirectoryEntrySchema, DirectoryFileSchema } from "./schema.js";
export type { DirectoryError } from "./errors.js";

// Error utilities
export {
  directoryUnavailable,
  formatDirectoryError,
  invalidFormat,
} from "./errors.js";

// Service functions (side effects)
export { createFileDirectoryProvider, readDirectoryFile } from "./service.js";

// Pure transformations
export { parseAddress, toCandidates } from "./transform.js";
