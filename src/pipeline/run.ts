/**
 * Triage Run
 *
 * One end-to-end triage pass: metadata lookup, discovery, per-paper
 * summary and decision, archival and logging, then digest and email.
 *
 * Each paper is fully handled (summarized, decided, moved if removed,
 * logged) before the next paper is summarized.
 *
 * @module pipeline/run
 */

import { buildMetadataLookup } from '../metadata/index.js';
import { discoverPapers } from '../discovery/index.js';
import { resolveDecisionMode, TriageDriver } from '../triage/index.js';
import { archivePaper } from '../storage/archive.js';
import { appendLogEntry } from '../storage/triage-log.js';
import { writeDigest } from '../storage/digest.js';
import { dispatchDigest } from '../notify/index.js';
import { DECISION_CODES, type Action, type LogEntry } from '../schemas/index.js';
import { silentLogger, type RunContext, type RunResult } from './types.js';

/**
 * Build the log entry for an action.
 */
export function toLogEntry(action: Action, dryRun: boolean, now: Date): LogEntry {
  return {
    timestamp: now.toISOString(),
    title: action.candidate.title,
    path: action.candidate.path,
    summary: action.summary,
    decision: DECISION_CODES[action.decision],
    dryRun,
  };
}

/**
 * Run the triage pipeline once.
 *
 * @param ctx - Run context with configuration and collaborators
 * @returns What the run did
 * @throws ConfigError if the configured automatic decision is not recognized
 */
export async function runTriage(ctx: RunContext): Promise<RunResult> {
  const startTime = Date.now();
  const { config } = ctx;
  const logger = ctx.logger ?? silentLogger;
  const now = ctx.now ?? (() => new Date());

  // Fatal configuration problems surface before anything is touched
  const mode = resolveDecisionMode(config);

  const lookup = await buildMetadataLookup(config.metadataSources, logger);
  const candidates = await discoverPapers(config.inputFolders, lookup, logger);

  const result: RunResult = {
    candidates,
    entries: [],
    archived: [],
    digestPath: null,
    emailSent: false,
    durationMs: 0,
  };

  if (candidates.length === 0) {
    logger.info(`No PDFs found in configured folders.${config.dryRun ? ' (dry-run)' : ''}`);
    result.durationMs = Date.now() - startTime;
    return result;
  }

  logger.debug(
    mode.kind === 'fixed'
      ? `Applying ${mode.decision} to every paper (${mode.source})`
      : 'Asking for a decision on each paper'
  );

  const driver = new TriageDriver({
    summarize: ctx.summarize,
    decider: ctx.decider,
    mode,
    dryRun: config.dryRun,
    logger,
  });

  for await (const action of driver.actions(candidates)) {
    if (action.decision === 'remove' && !config.dryRun) {
      const target = await archivePaper(action.candidate.path, config.archiveDir);
      logger.info(`Moved ${action.candidate.path} to ${target}`);
      result.archived.push(target);
    }

    const entry = toLogEntry(action, config.dryRun, now());
    await appendLogEntry(config.logPath, entry);
    result.entries.push(entry);
    ctx.onAction?.(entry, result.entries.length, candidates.length);
  }

  if (config.digestEnabled) {
    result.digestPath = await writeDigest(config.digestDir, result.entries, now());
    logger.info(`Wrote digest ${result.digestPath}`);
  }

  const sent = await dispatchDigest({
    email: config.email,
    entries: result.entries,
    digestPath: result.digestPath,
    transport: ctx.transport,
    logger,
    env: ctx.env,
    now: now(),
  });
  result.emailSent = sent.ok;

  result.durationMs = Date.now() - startTime;
  return result;
}
