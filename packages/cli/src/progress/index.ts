/**
 * Progress and output exports
 */

export { ProgressReporter } from './reporter.js';
export { createColorFns, PLAIN_COLORS } from './colors.js';
export {
  formatDuration,
  formatFileSize,
  formatPercent,
  formatTimestamp,
  formatConfigDisplay,
  formatStatsDisplay,
  formatMetadataDisplay,
  formatOutcome,
  type StatsDisplayInput,
} from './formatters.js';
export type { ColorFn, ColorFunctions, ProgressReporterOptions } from './types.js';
