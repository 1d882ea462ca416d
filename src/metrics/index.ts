/**
 * Metrics Module - Public API
 *
 * Prometheus text exposition of the latest snapshot.
 */

// Types
export type { ExposedDevice, Labels, MetricType, ReadingFamily } from "./schema.js";
export {
  EXPOSITION_CONTENT_TYPE,
  FAILURES_FAMILY,
  READING_FAMILIES,
  UP_FAMILY,
} from "./schema.js";

// Pure transformations
export {
  escapeHelp,
  escapeLabelValue,
  formatExposition,
  formatLabels,
  formatValue,
} from "./transform.js";
