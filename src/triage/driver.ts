/**
 * Triage Driver
 *
 * Produces one action per candidate, in order: a summary (memoized per
 * path for the lifetime of the driver) and a decision (fixed, or asked of
 * the interactive decider). The driver never moves files.
 *
 * @module triage/driver
 */

import type { Action, Decision, PaperCandidate } from '../schemas/index.js';
import {
  silentLogger,
  type InteractiveDecider,
  type Logger,
  type Summarizer,
} from '../pipeline/types.js';
import type { DecisionMode } from './decision.js';

/**
 * Dependencies of a triage driver.
 */
export interface TriageDriverOptions {
  summarize: Summarizer;
  decider: InteractiveDecider;
  mode: DecisionMode;
  dryRun: boolean;
  logger?: Logger;
}

/**
 * Per-run triage driver. Create one per run and let it go afterwards;
 * the summary cache lives and dies with the instance.
 *
 * @example
 * ```typescript
 * const driver = new TriageDriver({ summarize, decider, mode, dryRun: false });
 * for await (const action of driver.actions(candidates)) {
 *   await record(action);
 * }
 * ```
 */
export class TriageDriver {
  private readonly summaries = new Map<string, string>();
  private readonly logger: Logger;

  constructor(private readonly options: TriageDriverOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Summary for a candidate, computed at most once per path.
   */
  async summaryFor(candidate: PaperCandidate): Promise<string> {
    const cached = this.summaries.get(candidate.path);
    if (cached !== undefined) {
      this.logger.debug(`Using cached summary for ${candidate.path}`);
      return cached;
    }

    const summary = await this.options.summarize(candidate);
    this.summaries.set(candidate.path, summary);
    return summary;
  }

  /**
   * Decision for a candidate under the run's decision mode.
   */
  async decisionFor(candidate: PaperCandidate, summary: string): Promise<Decision> {
    const { mode } = this.options;
    if (mode.kind === 'fixed') {
      return mode.decision;
    }
    return this.options.decider.decide(candidate, summary, this.options.dryRun);
  }

  /**
   * Yield actions one by one, in candidate order. The next candidate is
   * not summarized until the consumer asks for it.
   */
  async *actions(candidates: readonly PaperCandidate[]): AsyncGenerator<Action> {
    for (const candidate of candidates) {
      const summary = await this.summaryFor(candidate);
      const decision = await this.decisionFor(candidate, summary);
      yield { candidate, summary, decision };
    }
  }

  /**
   * Triage every candidate and collect the ordered action list.
   */
  async triageAll(candidates: readonly PaperCandidate[]): Promise<Action[]> {
    const result: Action[] = [];
    for await (const action of this.actions(candidates)) {
      result.push(action);
    }
    return result;
  }

  /**
   * Number of distinct paths summarized so far.
   */
  get cachedSummaryCount(): number {
    return this.summaries.size;
  }
}
