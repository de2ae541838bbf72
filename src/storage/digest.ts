/**
 * Digest Storage
 *
 * Renders a run's log entries as a Markdown digest and writes it to a
 * timestamped file. Each run gets its own file; existing digests are never
 * overwritten.
 *
 * @module storage/digest
 */

import * as fs from 'node:fs/promises';
import type { LogEntry } from '../schemas/index.js';
import { uniqueTarget } from './atomic.js';
import { getDigestFilePath } from './paths.js';

export const DIGEST_TITLE = '# Weekly Paper Digest';

export const EMPTY_SUMMARY_PLACEHOLDER = '(no summary)';

/**
 * Render log entries as Markdown.
 *
 * @example
 * ```markdown
 * # Weekly Paper Digest
 *
 * ## Attention Is All You Need
 * - Decision: **k**
 * - File: `/papers/attention.pdf`
 *
 * Introduces the Transformer...
 * ```
 */
export function renderDigest(entries: readonly LogEntry[]): string {
  const lines: string[] = [DIGEST_TITLE, ''];

  for (const entry of entries) {
    lines.push(`## ${entry.title}`);
    lines.push(`- Decision: **${entry.decision}**`);
    lines.push(`- File: \`${entry.path}\``);
    lines.push('');
    lines.push(entry.summary.trim() !== '' ? entry.summary : EMPTY_SUMMARY_PLACEHOLDER);
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Write the digest for one run
 *
 * @param digestDir - Directory for digest files (created if missing)
 * @param entries - The run's log entries
 * @param now - Run timestamp used in the file name
 * @returns Path of the written digest
 */
export async function writeDigest(
  digestDir: string,
  entries: readonly LogEntry[],
  now: Date = new Date()
): Promise<string> {
  await fs.mkdir(digestDir, { recursive: true });
  const digestPath = await uniqueTarget(getDigestFilePath(digestDir, now));
  await fs.writeFile(digestPath, renderDigest(entries), { encoding: 'utf-8', flag: 'wx' });
  return digestPath;
}
