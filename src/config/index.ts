/**
 * Configuration Module
 *
 * Loads and validates the environment variables the triage tool reads.
 * Uses Zod for runtime validation.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Configuration document location (defaults to ./triage.config.json)
  PAPER_TRIAGE_CONFIG: z.string().optional(),

  // Summarizer API key, used when summarizer.apiKeyEnv is not configured
  PAPER_TRIAGE_API_KEY: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Error raised for invalid configuration. Fatal to the run, and always
 * raised before any paper is touched.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Parse and validate the environment
 *
 * @param source - Environment to read (defaults to process.env)
 * @throws ConfigError if a variable has an invalid value
 */
export function readEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment variables: ${issues}`);
  }

  return parseResult.data;
}

/**
 * Look up a secret by environment variable name. Empty values count as unset.
 */
export function getSecret(name: string, source: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = source[name];
  return value && value.trim() !== '' ? value : undefined;
}
