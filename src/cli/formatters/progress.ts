/**
 * Progress Formatters
 *
 * CLI progress display utilities:
 * - Spinner shown while a paper is being summarized
 * - Per-paper progress line after each decision
 *
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { DecisionCode } from '../../schemas/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Output stream (defaults to stdout) */
  stream?: NodeJS.WriteStream;
}

// ============================================================================
// Decision Labels
// ============================================================================

const DECISION_STYLES: Record<DecisionCode, (text: string) => string> = {
  k: chalk.green,
  r: chalk.red,
  s: chalk.yellow,
};

const DECISION_LABELS: Record<DecisionCode, string> = {
  k: 'keep',
  r: 'remove',
  s: 'skip',
};

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Summarizing...');
 * spinner.start();
 *
 * try {
 *   await summarize(paper);
 *   spinner.succeed('Summary ready');
 * } catch (err) {
 *   spinner.fail('Summary failed');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  /**
   * Create a new progress spinner.
   *
   * @param text - Initial spinner text
   * @param options - Spinner options
   */
  constructor(text: string, options: SpinnerOptions = {}) {
    const stream = options.stream ?? process.stdout;

    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: stream.isTTY === true,
      stream,
    });
  }

  /**
   * Start the spinner.
   *
   * @param text - Optional text to display
   */
  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  /**
   * Stop spinner with failure state.
   */
  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @param ms - Duration in milliseconds
 * @returns Formatted duration string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * One line per processed paper.
 *
 * @example
 * ```
 * [2/5] remove  Attention Is All You Need
 * ```
 */
export function formatProgressLine(
  index: number,
  total: number,
  decision: DecisionCode,
  title: string
): string {
  const counter = chalk.dim(`[${index}/${total}]`);
  const label = DECISION_STYLES[decision](DECISION_LABELS[decision].padEnd(7));
  return `${counter} ${label} ${title}`;
}

/**
 * Create a spinner for a single operation.
 *
 * @param text - Spinner text
 * @param options - Spinner options
 * @returns Progress spinner
 */
export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
