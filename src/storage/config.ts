/**
 * Config Storage
 *
 * Loads the triage configuration document (JSON) and resolves it, together
 * with command-line overrides, into the read-only configuration of one run.
 *
 * @module storage/config
 */

import * as fs from 'node:fs/promises';
import { ConfigError } from '../config/index.js';
import {
  TriageConfigSchema,
  type RunConfig,
  type RunOverrides,
  type TriageConfig,
} from '../schemas/index.js';
import type { Logger } from '../pipeline/types.js';
import { hasErrorCode } from './atomic.js';
import { resolveUserPath } from './paths.js';

/**
 * Default configuration when no config file exists
 */
export const DEFAULT_TRIAGE_CONFIG: TriageConfig = TriageConfigSchema.parse({});

/**
 * Load the configuration document
 *
 * Returns the defaults (with a warning) if the file doesn't exist. Nested
 * sections are merged one level deep over their defaults.
 *
 * @param configPath - Path to the JSON document
 * @param logger - Optional logger for the missing-file warning
 * @returns The validated configuration
 * @throws ConfigError if the file exists but is not valid JSON or fails validation
 */
export async function loadTriageConfig(configPath: string, logger?: Logger): Promise<TriageConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      logger?.warn(`Config file ${configPath} not found. Using defaults.`);
      return DEFAULT_TRIAGE_CONFIG;
    }
    throw error;
  }

  let data: unknown;
  try {
    data = content.trim() === '' ? {} : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in config file: ${configPath}`, { cause: error });
  }

  const parsed = TriageConfigSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${configPath}: ${issues}`);
  }

  return parsed.data;
}

/**
 * Check a numeric override coming from the command line.
 */
function positiveInteger(name: string, value: number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got ${value})`);
  }
  return value;
}

/**
 * Resolve the configuration of one run
 *
 * Applies command-line overrides on top of the document and resolves every
 * path to an absolute one. Relative paths are taken relative to `baseDir`.
 *
 * @param config - Loaded configuration document
 * @param overrides - Command-line overrides
 * @param baseDir - Directory relative paths are resolved against
 * @returns Frozen run configuration
 */
export function resolveRunConfig(
  config: TriageConfig,
  overrides: RunOverrides = {},
  baseDir: string = process.cwd()
): RunConfig {
  const resolve = (p: string) => resolveUserPath(p, baseDir);

  const runConfig: RunConfig = {
    inputFolders: config.inputFolders.map(resolve),
    archiveDir: resolve(overrides.archiveDir ?? config.archiveDir),
    model: config.model,
    maxPages: positiveInteger('maxPages', overrides.maxPages) ?? config.maxPages,
    maxChars: positiveInteger('maxChars', overrides.maxChars) ?? config.maxChars,
    metadataSources: config.metadataSources.map((source) => ({
      ...source,
      path: resolve(source.path),
    })),
    logPath: resolve(overrides.logPath ?? config.logPath),
    digestDir: resolve(overrides.digestDir ?? config.digestDir),
    digestEnabled: config.digest.enabled,
    email: { ...config.email, recipients: [...config.email.recipients] },
    autoDecision: { ...config.autoDecision },
    summarizer: { ...config.summarizer },
    dryRun: overrides.dryRun ?? false,
    decisionOverride: overrides.decision,
  };

  return Object.freeze(runConfig);
}
