/**
 * Path Resolution Utilities
 *
 * Consistent path handling for user-supplied locations (input folders,
 * archive, log and digest paths) and for generated file names.
 *
 * Default layout, relative to the working directory:
 * ```
 * ./
 * ├── triage.config.json             # Configuration document
 * ├── triage_log.csv                 # Append-only decision log
 * ├── archive/                       # Papers decided as "remove"
 * │   ├── paper.pdf
 * │   └── paper-1.pdf                # Name collision suffix
 * └── digests/
 *     └── digest-2026-01-04-090000.md
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';
import { readEnv } from '../config/index.js';

/**
 * Default configuration document name.
 */
export const DEFAULT_CONFIG_FILE = 'triage.config.json';

/**
 * Expand a leading `~` and resolve to an absolute path.
 *
 * @param input - User-supplied path
 * @param base - Directory relative paths are resolved against
 * @returns Absolute path
 * @example
 * ```typescript
 * resolveUserPath('~/papers'); // '/Users/username/papers'
 * resolveUserPath('archive', '/srv/triage'); // '/srv/triage/archive'
 * ```
 */
export function resolveUserPath(input: string, base: string = process.cwd()): string {
  if (input === '~') {
    return os.homedir();
  }
  if (input.startsWith('~/') || input.startsWith('~\\')) {
    return path.join(os.homedir(), input.slice(2));
  }
  return path.resolve(base, input);
}

/**
 * Gets the configuration document path.
 *
 * Uses the `PAPER_TRIAGE_CONFIG` environment variable if set,
 * otherwise `triage.config.json` in the working directory.
 */
export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const envPath = readEnv(env).PAPER_TRIAGE_CONFIG;
  return resolveUserPath(envPath && envPath.trim() !== '' ? envPath : DEFAULT_CONFIG_FILE);
}

/**
 * Compact UTC timestamp used in digest file names.
 *
 * @example
 * ```typescript
 * formatCompactTimestamp(new Date('2026-01-04T09:05:07Z')); // '2026-01-04-090507'
 * ```
 */
export function formatCompactTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)}-${iso.slice(11, 13)}${iso.slice(14, 16)}${iso.slice(17, 19)}`;
}

/**
 * Gets the digest file path for a run started at `date`.
 *
 * @param digestDir - Digest directory
 * @param date - Run timestamp
 */
export function getDigestFilePath(digestDir: string, date: Date): string {
  return path.join(digestDir, `digest-${formatCompactTimestamp(date)}.md`);
}
