/**
 * Terminal Decider
 *
 * Interactive decision prompt shown for each paper when no fixed decision
 * applies. Choosing "open" opens the PDF with the system viewer and asks
 * again; only keep, remove or skip end the prompt.
 *
 * @module cli/decider
 */

import { expand } from '@inquirer/prompts';
import chalk from 'chalk';
import open from 'open';
import type { Decision, PaperCandidate } from '../schemas/index.js';
import type { InteractiveDecider } from '../pipeline/types.js';
import { parseDecision } from '../triage/decision.js';
import { formatPaperCard } from './formatters/paper.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Reads one raw answer from the operator.
 */
export type AskFn = (message: string) => Promise<string>;

/**
 * Opens a file with the system viewer.
 */
export type OpenFn = (filePath: string) => Promise<void>;

/**
 * Terminal decider dependencies; all default to the real terminal.
 */
export interface TerminalDeciderOptions {
  ask?: AskFn;
  openFile?: OpenFn;
  write?: (text: string) => void;
}

export const DECISION_PROMPT = 'Choose action [k]eep/[r]emove/[s]kip/[o]pen';

// ============================================================================
// Defaults
// ============================================================================

/**
 * Single-key prompt with keep as the default answer.
 */
export const askWithExpand: AskFn = (message) =>
  expand({
    message,
    default: 'k',
    choices: [
      { key: 'k', name: 'Keep', value: 'k' },
      { key: 'r', name: 'Remove (move to archive)', value: 'r' },
      { key: 's', name: 'Skip', value: 's' },
      { key: 'o', name: 'Open the PDF', value: 'o' },
    ],
  });

/**
 * Open with the platform viewer (open, xdg-open or start).
 */
export const openWithSystemViewer: OpenFn = async (filePath) => {
  await open(filePath);
};

// ============================================================================
// TerminalDecider Class
// ============================================================================

export class TerminalDecider implements InteractiveDecider {
  private readonly ask: AskFn;
  private readonly openFile: OpenFn;
  private readonly write: (text: string) => void;
  private index = 0;

  constructor(options: TerminalDeciderOptions = {}) {
    this.ask = options.ask ?? askWithExpand;
    this.openFile = options.openFile ?? openWithSystemViewer;
    this.write = options.write ?? ((text) => console.log(text));
  }

  async decide(candidate: PaperCandidate, summary: string, dryRun: boolean): Promise<Decision> {
    this.index++;
    this.write(chalk.bold(`\n── Paper ${this.index} ──`));
    this.write(formatPaperCard(candidate, summary, dryRun));

    for (;;) {
      // empty answer takes the default, keep
      const choice = (await this.ask(DECISION_PROMPT)).trim().toLowerCase() || 'k';

      if (choice === 'o' || choice === 'open') {
        try {
          await this.openFile(candidate.path);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          this.write(chalk.red(`Failed to open ${candidate.path}: ${reason}`));
        }
        continue;
      }

      const decision = parseDecision(choice);
      if (decision) {
        return decision;
      }

      this.write(chalk.red('Invalid choice. Use k, r, s, or o.'));
    }
  }
}
