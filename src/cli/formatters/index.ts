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
  createSpinner,
  formatDuration,
  formatProgressLine,
  type SpinnerOptions,
} from './progress.js';

// Run summary formatters
export { formatRunSummary, formatQuickSummary, countDecisions } from './run-summary.js';

// Paper card
export { formatPaperCard, formatPanel, wrapText } from './paper.js';
