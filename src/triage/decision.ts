/**
 * Decision Resolver
 *
 * Decides, once per run, whether papers are triaged interactively or with
 * a fixed decision. Precedence, highest first:
 *
 * 1. per-run override (`--auto-decision`)
 * 2. configured automatic mode (`autoDecision.enabled` + `autoDecision.default`)
 * 3. interactive prompt
 *
 * @module triage/decision
 */

import { ConfigError } from '../config/index.js';
import type { Decision, RunConfig } from '../schemas/index.js';

/**
 * How decisions are made for a run.
 */
export type DecisionMode =
  | { kind: 'fixed'; decision: Decision; source: 'override' | 'config' }
  | { kind: 'interactive' };

const DECISION_ALIASES = new Map<string, Decision>([
  ['k', 'keep'],
  ['keep', 'keep'],
  ['r', 'remove'],
  ['remove', 'remove'],
  ['s', 'skip'],
  ['skip', 'skip'],
]);

/**
 * Parse a decision from its one-letter or full-word form (any case).
 *
 * @param value - Raw value, e.g. "R" or "Remove"
 * @returns The decision, or null if unrecognized
 */
export function parseDecision(value: string): Decision | null {
  return DECISION_ALIASES.get(value.trim().toLowerCase()) ?? null;
}

/**
 * Normalize a configured decision
 *
 * @param value - Raw value
 * @throws ConfigError if the value is not a recognized decision
 */
export function normalizeDecision(value: string): Decision {
  const decision = parseDecision(value);
  if (!decision) {
    throw new ConfigError(
      `Unsupported automatic decision '${value}' (expected keep, remove, skip or k, r, s)`
    );
  }
  return decision;
}

/**
 * Resolve the decision mode of a run
 *
 * Must be called before any file is touched: an invalid configured
 * decision is fatal.
 *
 * @param config - Run configuration
 * @throws ConfigError if automatic mode is enabled with an unrecognized decision
 */
export function resolveDecisionMode(
  config: Pick<RunConfig, 'decisionOverride' | 'autoDecision'>
): DecisionMode {
  if (config.decisionOverride) {
    return { kind: 'fixed', decision: config.decisionOverride, source: 'override' };
  }

  if (config.autoDecision.enabled) {
    return {
      kind: 'fixed',
      decision: normalizeDecision(config.autoDecision.default),
      source: 'config',
    };
  }

  return { kind: 'interactive' };
}
