/**
 * Discovery Module - Error Types
 *
 * Typed error unions for discovery passes.
 * Errors are values, not exceptions.
 */

/**
 * Errors that abort a discovery pass. Bad replies never do.
 */
export type DiscoveryError = {
  readonly type: "SOCKET_ERROR";
  readonly message: string;
  readonly cause?: Error;
};

/**
 * Create a SOCKET_ERROR.
 */
export function socketError(message: string, cause?: Error): DiscoveryError {
  if (cause) {
    return { type: "SOCKET_ERROR", message, cause };
  }
  return { type: "SOCKET_ERROR", message };
}

/**
 * Format a DiscoveryError for logging.
 */
export function formatDiscoveryError(error: DiscoveryError): string {
  return `Discovery socket error: ${error.message}`;
}
