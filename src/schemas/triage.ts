/**
 * Triage Schema
 *
 * Decisions, actions and the persisted log entry format.
 */

import { z } from 'zod';
import { ISO8601TimestampSchema } from './common.js';
import type { PaperCandidate } from './paper.js';

/**
 * Triage decision values
 *
 * - keep: leave the paper where it is
 * - remove: move the paper into the archive directory
 * - skip: undecided, revisit on a later run
 */
export const DecisionSchema = z.enum(['keep', 'remove', 'skip']);

export type Decision = z.infer<typeof DecisionSchema>;

/**
 * One-letter decision codes, as recorded in the log, digest and email.
 */
export const DecisionCodeSchema = z.enum(['k', 'r', 's']);

export type DecisionCode = z.infer<typeof DecisionCodeSchema>;

export const DECISION_CODES: Record<Decision, DecisionCode> = {
  keep: 'k',
  remove: 'r',
  skip: 's',
} as const;

export const DECISIONS_BY_CODE: Record<DecisionCode, Decision> = {
  k: 'keep',
  r: 'remove',
  s: 'skip',
} as const;

/**
 * A candidate with its summary and decision.
 */
export interface Action {
  readonly candidate: PaperCandidate;
  readonly summary: string;
  readonly decision: Decision;
}

/**
 * Column order of the CSV log. Changing it breaks existing logs.
 */
export const LOG_FIELDS = ['timestamp', 'title', 'path', 'summary', 'decision', 'dry_run'] as const;

export type LogField = (typeof LOG_FIELDS)[number];

/**
 * One row of the triage log.
 */
export const LogEntrySchema = z.object({
  timestamp: ISO8601TimestampSchema,
  title: z.string(),
  path: z.string().min(1),
  summary: z.string(),
  decision: DecisionCodeSchema,
  dryRun: z.boolean(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;
