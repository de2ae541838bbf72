/**
 * Run Summary Formatters
 *
 * CLI output printed at the end of each triage run.
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { RunResult } from '../../pipeline/types.js';
import type { DecisionCode } from '../../schemas/index.js';
import { formatDuration } from './progress.js';

/**
 * Number of log entries per decision code.
 */
export function countDecisions(result: Pick<RunResult, 'entries'>): Record<DecisionCode, number> {
  const counts: Record<DecisionCode, number> = { k: 0, r: 0, s: 0 };
  for (const entry of result.entries) {
    counts[entry.decision]++;
  }
  return counts;
}

/**
 * Format a complete run summary.
 *
 * @param result - Outcome of the run
 * @param dryRun - Whether the run was a dry run
 * @returns Formatted string for terminal output
 *
 * @example
 * ```
 * === Triage Complete ===
 * Papers:   3
 * Kept:     1
 * Removed:  1
 * Skipped:  1
 * Digest:   digests/digest-2026-01-15-143512.md
 * Email:    sent
 * Duration: 12.3s
 * ```
 */
export function formatRunSummary(result: RunResult, dryRun: boolean): string {
  const lines: string[] = [];
  const counts = countDecisions(result);

  lines.push(chalk.bold(dryRun ? '=== Triage Complete (dry run) ===' : '=== Triage Complete ==='));
  lines.push(`Papers:   ${result.entries.length}`);
  lines.push(`Kept:     ${counts.k}`);
  lines.push(`Removed:  ${counts.r}${dryRun && counts.r > 0 ? chalk.dim(' (not moved)') : ''}`);
  lines.push(`Skipped:  ${counts.s}`);

  if (result.digestPath) {
    lines.push(`Digest:   ${chalk.cyan(result.digestPath)}`);
  }
  if (result.emailSent) {
    lines.push('Email:    sent');
  }

  lines.push(`Duration: ${formatDuration(result.durationMs)}`);

  return lines.join('\n');
}

/**
 * One-line status for scheduled runs.
 *
 * @example
 * ```
 * 3 papers triaged (k=1 r=1 s=1) in 12.3s
 * ```
 */
export function formatQuickSummary(result: RunResult): string {
  const counts = countDecisions(result);
  const papers = `${result.entries.length} paper${result.entries.length === 1 ? '' : 's'}`;
  return `${papers} triaged (k=${counts.k} r=${counts.r} s=${counts.s}) in ${formatDuration(result.durationMs)}`;
}
