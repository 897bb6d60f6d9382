/**
 * Progress module exports
 */

export type { ProgressReporterOptions, InputSummary } from './reporter.js';
export { ProgressReporter } from './reporter.js';
export {
  formatConfigDisplay,
  formatDuration,
  formatEta,
  formatFileSize,
  formatPercentage,
  formatProgressBar,
  sortedCounts,
} from './formatters.js';
export { TimeEstimator } from './time-estimator.js';
