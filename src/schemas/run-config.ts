/**
 * Run Configuration Schema
 *
 * The configuration document (`triage.config.json`) and the resolved,
 * read-only configuration a single run works from.
 */

import { z } from 'zod';
import { MetadataSourceSchema, type MetadataSource } from './paper.js';
import type { Decision } from './triage.js';

// ============================================================================
// Nested Config Schemas
// ============================================================================

/**
 * Digest settings
 */
export const DigestConfigSchema = z.object({
  enabled: z.boolean().default(false),
});

export type DigestConfig = z.infer<typeof DigestConfigSchema>;

/**
 * Email settings for the weekly digest
 */
export const EmailConfigSchema = z.object({
  enabled: z.boolean().default(false),
  smtpHost: z.string().default('localhost'),
  smtpPort: z.coerce.number().int().positive().default(587),
  /** Require STARTTLS before authenticating */
  useTls: z.boolean().default(true),
  username: z.string().optional(),
  /** Name of the environment variable holding the SMTP password */
  passwordEnv: z.string().optional(),
  sender: z.string().default('paper-triage@example.com'),
  recipients: z.array(z.string()).default([]),
  /** Supports {count} and {date} placeholders */
  subject: z.string().default('Weekly paper triage digest'),
});

export type EmailConfig = z.infer<typeof EmailConfigSchema>;

/**
 * Day names accepted by the weekly scheduler
 */
export const DayOfWeekSchema = z.enum(['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat']);

export type DayOfWeek = z.infer<typeof DayOfWeekSchema>;

/**
 * Weekly schedule settings (local time)
 */
export const ScheduleConfigSchema = z.object({
  enabled: z.boolean().default(false),
  dayOfWeek: z
    .string()
    .transform((value) => value.trim().toLowerCase().slice(0, 3))
    .pipe(DayOfWeekSchema)
    .default('sun'),
  hour: z.number().int().min(0).max(23).default(9),
  minute: z.number().int().min(0).max(59).default(0),
});

export type ScheduleConfig = z.infer<typeof ScheduleConfigSchema>;

/**
 * Automatic decision settings.
 * `default` is normalized later so that a bad value can be reported as a
 * configuration error of the run rather than of the document.
 */
export const AutoDecisionConfigSchema = z.object({
  enabled: z.boolean().default(false),
  default: z.string().default('keep'),
});

export type AutoDecisionConfig = z.infer<typeof AutoDecisionConfigSchema>;

/**
 * OpenAI-compatible chat endpoint used for summaries
 */
export const SummarizerConfigSchema = z.object({
  /** Defaults to a local Ollama server */
  baseUrl: z.string().url().default('http://localhost:11434/v1'),
  /** Name of the environment variable holding the API key */
  apiKeyEnv: z.string().optional(),
  temperature: z.number().min(0).max(2).default(0.2),
});

export type SummarizerConfig = z.infer<typeof SummarizerConfigSchema>;

// ============================================================================
// Config Document Schema
// ============================================================================

/**
 * The configuration document. Every field has a default, so an empty
 * document (or no document at all) yields a complete configuration.
 */
export const TriageConfigSchema = z.object({
  inputFolders: z.array(z.string()).default([]),
  archiveDir: z.string().default('archive'),
  model: z.string().min(1).default('llama3.2:latest'),
  maxPages: z.number().int().positive().default(3),
  maxChars: z.number().int().positive().default(4000),
  metadataSources: z.array(MetadataSourceSchema).default([]),
  logPath: z.string().default('triage_log.csv'),
  digestDir: z.string().default('digests'),
  digest: DigestConfigSchema.default({}),
  email: EmailConfigSchema.default({}),
  schedule: ScheduleConfigSchema.default({}),
  autoDecision: AutoDecisionConfigSchema.default({}),
  summarizer: SummarizerConfigSchema.default({}),
});

export type TriageConfig = z.infer<typeof TriageConfigSchema>;

// ============================================================================
// Resolved Run Configuration
// ============================================================================

/**
 * Per-invocation overrides coming from the command line.
 */
export interface RunOverrides {
  dryRun?: boolean;
  maxPages?: number;
  maxChars?: number;
  archiveDir?: string;
  logPath?: string;
  digestDir?: string;
  /** Fixed decision for every paper, beats autoDecision */
  decision?: Decision;
}

/**
 * Resolved configuration for one run. Paths are absolute.
 */
export interface RunConfig {
  readonly inputFolders: readonly string[];
  readonly archiveDir: string;
  readonly model: string;
  readonly maxPages: number;
  readonly maxChars: number;
  readonly metadataSources: readonly MetadataSource[];
  readonly logPath: string;
  readonly digestDir: string;
  readonly digestEnabled: boolean;
  readonly email: Readonly<EmailConfig>;
  readonly autoDecision: Readonly<AutoDecisionConfig>;
  readonly summarizer: Readonly<SummarizerConfig>;
  readonly dryRun: boolean;
  readonly decisionOverride?: Decision;
}
