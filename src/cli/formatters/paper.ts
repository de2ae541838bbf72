/**
 * Paper Formatters
 *
 * Terminal rendering of one paper while it awaits a decision.
 *
 * @module cli/formatters/paper
 */

import chalk from 'chalk';
import type { PaperCandidate } from '../../schemas/index.js';

/**
 * Metadata fields never shown to the operator.
 */
const HIDDEN_METADATA_FIELDS = new Set(['fileKey']);

/**
 * Capitalize a metadata field name for display.
 */
function label(key: string): string {
  return key.charAt(0).toUpperCase() + key.slice(1);
}

/**
 * Wrap text to a maximum width, keeping existing line breaks.
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];

  for (const paragraph of text.split('\n')) {
    let current = '';
    for (const word of paragraph.split(/\s+/).filter((w) => w.length > 0)) {
      if (current && current.length + word.length + 1 > width) {
        lines.push(current);
        current = word;
      } else {
        current = current ? `${current} ${word}` : word;
      }
    }
    lines.push(current);
  }

  return lines;
}

/**
 * Draw a titled box around text.
 *
 * @example
 * ```
 * ┌─ Summary ─────────────┐
 * │ Proposes a method ... │
 * └───────────────────────┘
 * ```
 */
export function formatPanel(title: string, text: string, width = 72): string {
  const body = wrapText(text, width - 4);
  const inner = Math.max(title.length + 3, ...body.map((line) => line.length)) + 2;

  const top = `┌─ ${title} ${'─'.repeat(Math.max(0, inner - title.length - 3))}┐`;
  const rows = body.map((line) => `│ ${line.padEnd(inner - 2)} │`);
  const bottom = `└${'─'.repeat(inner)}┘`;

  return [top, ...rows, bottom].join('\n');
}

/**
 * Render a paper card: title, path, metadata, summary and dry-run notice.
 *
 * @param candidate - Paper being triaged
 * @param summary - Summary text
 * @param dryRun - Whether the run is a dry run
 * @returns Multi-line string for the terminal
 */
export function formatPaperCard(candidate: PaperCandidate, summary: string, dryRun: boolean): string {
  const rows: Array<[string, string]> = [
    ['Title', candidate.title],
    ['Path', candidate.path],
  ];

  for (const [key, value] of Object.entries(candidate.metadata)) {
    if (HIDDEN_METADATA_FIELDS.has(key) || value === undefined || value === '') {
      continue;
    }
    rows.push([label(key), String(value)]);
  }

  const keyWidth = Math.max(...rows.map(([key]) => key.length));
  const lines = rows.map(([key, value]) => `${chalk.dim(key.padEnd(keyWidth))}  ${value}`);

  lines.push('');
  lines.push(formatPanel('Summary', summary || 'No summary available.'));

  if (dryRun) {
    lines.push(chalk.yellow('Dry-run: files will not be moved or modified.'));
  }

  return lines.join('\n');
}
