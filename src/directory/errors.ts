/**
 * Directory Module - Error Types
 *
 * Typed error unions for directory lookups.
 * Errors are values, not exceptions.
 */

/**
 * Errors from a directory provider.
 */
export type DirectoryError =
  | {
      readonly type: "UNAVAILABLE";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "INVALID_FORMAT";
      readonly message: string;
    };

/**
 * Create an UNAVAILABLE error.
 */
export function directoryUnavailable(
  message: string,
  cause?: Error,
): DirectoryError {
  if (cause) {
    return { type: "UNAVAILABLE", message, cause };
  }
  return { type: "UNAVAILABLE", message };
}

/**
 * Create an INVALID_FORMAT error.
 */
export function invalidFormat(message: string): DirectoryError {
  return { type: "INVALID_FORMAT", message };
}

/**
 * Format a DirectoryError for logging.
 */
export function formatDirectoryError(error: DirectoryError): string {
  switch (error.type) {
    case "UNAVAILABLE":
      return `Directory unavailable: ${error.message}`;
    case "INVALID_FORMAT":
      return `Directory format invalid: ${error.message}`;
  }
}
