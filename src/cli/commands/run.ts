/**
 * Run Command
 *
 * Triage every PDF in the configured folders once, or keep running on the
 * weekly schedule.
 *
 * @module cli/commands/run
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigError } from '../../config/index.js';
import { loadTriageConfig, resolveRunConfig } from '../../storage/config.js';
import { getDefaultConfigPath, resolveUserPath } from '../../storage/paths.js';
import { runTriage } from '../../pipeline/run.js';
import { WeeklyScheduler } from '../../pipeline/scheduler.js';
import { normalizeDecision } from '../../triage/decision.js';
import {
  createSummarizer,
  SummarizerConfigError,
  type SummarizerOptions,
} from '../../summarize/index.js';
import { smtpTransport } from '../../notify/index.js';
import type {
  EmailTransport,
  InteractiveDecider,
  RunResult,
  Summarizer,
} from '../../pipeline/types.js';
import type { RunConfig, RunOverrides, TriageConfig } from '../../schemas/index.js';
import { TerminalDecider } from '../decider.js';
import { createSpinner, formatProgressLine } from '../formatters/progress.js';
import { formatQuickSummary, formatRunSummary } from '../formatters/run-summary.js';
import { BaseCommand, EXIT_CODES, getBaseCommand } from '../base-command.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the run command.
 */
export interface RunCommandOptions {
  /** Configuration document path */
  config?: string;
  dryRun?: boolean;
  maxPages?: number;
  maxChars?: number;
  archive?: string;
  logPath?: string;
  digestDir?: string;
  /** Force the weekly scheduler */
  schedule?: boolean;
  /** Run once even when the schedule is enabled */
  once?: boolean;
  /** keep, remove, skip (or k, r, s) for every paper */
  autoDecision?: string;
}

/**
 * Collaborators of the run command. Defaults talk to the terminal, the
 * configured model endpoint and SMTP.
 */
export interface RunDependencies {
  decider?: InteractiveDecider;
  transport?: EmailTransport;
  createSummarizer?: (config: RunConfig, options: SummarizerOptions) => Summarizer;
  env?: NodeJS.ProcessEnv;
  /** Directory relative paths resolve against */
  cwd?: string;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Command-line options as run overrides.
 *
 * @throws ConfigError if --auto-decision is not recognized
 */
export function toOverrides(options: RunCommandOptions): RunOverrides {
  return {
    dryRun: options.dryRun === true,
    maxPages: options.maxPages,
    maxChars: options.maxChars,
    archiveDir: options.archive,
    logPath: options.logPath,
    digestDir: options.digestDir,
    decision: options.autoDecision !== undefined ? normalizeDecision(options.autoDecision) : undefined,
  };
}

/**
 * Path of the configuration document for this invocation.
 */
export function configPathFor(options: Pick<RunCommandOptions, 'config'>, deps: RunDependencies = {}): string {
  return options.config
    ? resolveUserPath(options.config, deps.cwd)
    : getDefaultConfigPath(deps.env);
}

/**
 * Whether this invocation runs on the weekly schedule.
 */
export function shouldSchedule(options: RunCommandOptions, config: TriageConfig): boolean {
  if (options.schedule) return true;
  return config.schedule.enabled && !options.once;
}

// ============================================================================
// Single Run
// ============================================================================

/**
 * Load the configuration document from the path the options and environment
 * name.
 */
async function loadDocument(
  options: RunCommandOptions,
  base: BaseCommand,
  deps: RunDependencies
): Promise<TriageConfig> {
  const configPath = configPathFor(options, deps);
  base.debug(`Loading configuration from ${configPath}`);
  return loadTriageConfig(configPath, base.logger);
}

/**
 * Triage once.
 *
 * @param options - Command options
 * @param base - Base command for output
 * @param deps - Collaborators
 * @param loaded - Configuration document already read by the caller; read from disk when absent
 * @returns What the run did
 * @throws ConfigError or SummarizerConfigError before any file is touched
 */
export async function runOnce(
  options: RunCommandOptions,
  base: BaseCommand,
  deps: RunDependencies = {},
  loaded?: TriageConfig
): Promise<RunResult> {
  const logger = base.logger;
  const document = loaded ?? (await loadDocument(options, base, deps));
  const config = resolveRunConfig(document, toOverrides(options), deps.cwd);

  const summarizerFactory = deps.createSummarizer ?? createSummarizer;
  const inner = summarizerFactory(config, { logger, env: deps.env });

  const spinner = createSpinner('Summarizing...');
  const summarize: Summarizer = async (candidate) => {
    spinner.start(`Summarizing ${chalk.cyan(candidate.title)}`);
    try {
      const summary = await inner(candidate);
      spinner.succeed(`Summarized ${candidate.title}`);
      return summary;
    } catch (error) {
      spinner.fail(`Summary failed for ${candidate.title}`);
      throw error;
    }
  };

  if (config.dryRun) {
    base.info(chalk.yellow('Dry run: no files will be moved.'));
  }

  const result = await runTriage({
    config,
    summarize,
    decider: deps.decider ?? new TerminalDecider(),
    transport: deps.transport ?? smtpTransport,
    logger,
    env: deps.env,
    onAction: (entry, index, total) => {
      base.info(formatProgressLine(index, total, entry.decision, entry.title));
    },
  });

  if (result.entries.length > 0) {
    base.blank();
    base.info(formatRunSummary(result, config.dryRun));
  }

  return result;
}

// ============================================================================
// Scheduled Runs
// ============================================================================

/**
 * Start the weekly scheduler. Every tick reloads the configuration.
 * SIGINT and SIGTERM stop it, after which the process exits normally.
 *
 * @param loaded - Configuration document already read by the caller; read from disk when absent
 * @returns The started scheduler
 */
export async function startSchedule(
  options: RunCommandOptions,
  base: BaseCommand,
  deps: RunDependencies = {},
  loaded?: TriageConfig
): Promise<WeeklyScheduler> {
  const document = loaded ?? (await loadDocument(options, base, deps));
  // Surface a bad --auto-decision now rather than at the first tick
  toOverrides(options);

  const scheduler = new WeeklyScheduler({
    schedule: document.schedule,
    logger: base.logger,
    job: async () => {
      const result = await runOnce(options, base, deps);
      base.info(formatQuickSummary(result));
    },
  });

  const shutdown = () => {
    scheduler.stop();
    base.info('Scheduler stopped.');
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  scheduler.start();
  const { dayOfWeek, hour, minute } = document.schedule;
  const at = `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
  base.info(`Scheduler started (${dayOfWeek} ${at}). Press Ctrl+C to exit.`);
  base.debug(`Next run at ${scheduler.scheduledAt.toString()}`);

  return scheduler;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Parse a numeric option. Range checks happen with the rest of the
 * configuration.
 */
function toNumber(value: string): number {
  return Number(value);
}

/**
 * Register the run command (the default command).
 *
 * @param program - Commander program instance
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run', { isDefault: true })
    .description('Triage PDFs in the configured folders')
    .option('-c, --config <path>', 'Configuration file (default: triage.config.json)')
    .option('--dry-run', 'Record decisions without moving files')
    .option('--max-pages <n>', 'Pages of text to read per PDF', toNumber)
    .option('--max-chars <n>', 'Characters of text to send to the model', toNumber)
    .option('--archive <dir>', 'Archive directory for removed papers')
    .option('--log-path <path>', 'CSV log path')
    .option('--digest-dir <dir>', 'Directory for Markdown digests')
    .option('--schedule', 'Keep running and triage on the weekly schedule')
    .option('--once', 'Run once even if the schedule is enabled')
    .option('--auto-decision <decision>', 'Apply keep, remove or skip to every paper')
    .action(async (options: RunCommandOptions, cmd: Command) => {
      await handleRun(options, getBaseCommand(cmd));
    });
}

/**
 * Handle the run command.
 *
 * @param options - Command options
 * @param base - Base command for output
 * @param deps - Collaborators
 */
export async function handleRun(
  options: RunCommandOptions,
  base: BaseCommand,
  deps: RunDependencies = {}
): Promise<void> {
  try {
    const document = await loadDocument(options, base, deps);
    if (shouldSchedule(options, document)) {
      await startSchedule(options, base, deps, document);
      return;
    }
    await runOnce(options, base, deps, document);
  } catch (error) {
    if (error instanceof ConfigError || error instanceof SummarizerConfigError) {
      base.error(error.message, EXIT_CODES.USAGE_ERROR);
    }
    if (error instanceof Error && error.name === 'ExitPromptError') {
      base.info('Cancelled.');
      base.exitWith(EXIT_CODES.CANCELLED);
    }
    if (error instanceof Error) {
      base.error(error.message, error);
    }
    throw error;
  }
}
