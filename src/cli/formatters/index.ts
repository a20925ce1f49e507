/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  StageProgressDisplay,
  STAGE_LABELS,
  createSpinner,
  createStageProgress,
  formatDuration,
  type StageStatus,
  type StageDisplay,
  type SpinnerOptions,
} from './progress.js';

// Build summary formatters
export {
  formatBuildSummary,
  formatErrorSummary,
  formatQuickSummary,
  formatPlan,
  formatTimingBreakdown,
  shortKey,
  formatFileSize,
  SHORT_KEY_LENGTH,
} from './build-summary.js';
