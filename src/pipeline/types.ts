/**
 * Pipeline Type Definitions
 *
 * Contracts between the triage pipeline and its collaborators: text
 * extraction, summarization, interactive decisions and email transport.
 *
 * @module pipeline/types
 */

import type { Decision, LogEntry, PaperCandidate, RunConfig } from '../schemas/index.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline modules.
 * Allows modules to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Extracts text from the first pages of a PDF.
 */
export type TextExtractor = (
  filePath: string,
  limits: { maxPages: number; maxChars: number }
) => Promise<string>;

/**
 * Produces a short summary for a paper.
 * Never rejects for remote failures; a placeholder string is returned instead.
 */
export type Summarizer = (candidate: PaperCandidate) => Promise<string>;

/**
 * Asks an operator for a decision on one paper.
 */
export interface InteractiveDecider {
  decide(candidate: PaperCandidate, summary: string, dryRun: boolean): Promise<Decision>;
}

/**
 * Minimal message shape handed to the email transport.
 */
export interface EmailMessage {
  subject: string;
  from: string;
  to: string[];
  text: string;
  attachments: Array<{ filename: string; path: string; contentType: string }>;
}

/**
 * SMTP connection settings for one send.
 */
export interface TransportOptions {
  host: string;
  port: number;
  useTls: boolean;
  username?: string;
  password?: string;
}

/**
 * Delivers one message. Rejects on transport or authentication errors.
 */
export type EmailTransport = (message: EmailMessage, options: TransportOptions) => Promise<void>;

// ============================================================================
// Run Context
// ============================================================================

/**
 * Everything a single triage run needs.
 */
export interface RunContext {
  /** Resolved configuration for this run */
  config: RunConfig;

  /** Summary producer (extraction + model call) */
  summarize: Summarizer;

  /** Operator prompt, used when no fixed decision applies */
  decider: InteractiveDecider;

  /** Email delivery */
  transport: EmailTransport;

  /** Optional logger for pipeline output */
  logger?: Logger;

  /** Environment used to look up credentials (defaults to process.env) */
  env?: NodeJS.ProcessEnv;

  /** Clock used for log timestamps and digest names */
  now?: () => Date;

  /** Called after each paper is fully processed */
  onAction?: (entry: LogEntry, index: number, total: number) => void;
}

// ============================================================================
// Run Result
// ============================================================================

/**
 * Outcome of one triage run.
 */
export interface RunResult {
  /** Discovered candidates, in discovery order */
  candidates: PaperCandidate[];

  /** Log entries written, one per candidate, same order */
  entries: LogEntry[];

  /** Paths the removed papers were moved to */
  archived: string[];

  /** Digest written this run, if any */
  digestPath: string | null;

  /** Whether the email digest was handed to the transport successfully */
  emailSent: boolean;

  /** Wall-clock duration */
  durationMs: number;
}
