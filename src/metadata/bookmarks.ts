/**
 * Bookmarks Parser
 *
 * Reads a JSON bookmark list. Accepted shapes:
 *
 * ```json
 * [{ "title": "Paper", "path": "/papers/paper.pdf" }]
 * { "bookmarks": [{ "title": "Paper", "file": "paper.pdf" }] }
 * ```
 *
 * @module metadata/bookmarks
 */

import { z } from 'zod';
import { err, ok, type MetadataRecord } from '../schemas/index.js';
import { readJson } from '../storage/atomic.js';
import { MetadataParseError, fileKeyOf, fileNameOf, stemOf, type ParseResult } from './types.js';

/**
 * Fields are loosely typed: a null or non-string value counts as absent.
 */
const BookmarkEntrySchema = z.object({
  title: z.unknown(),
  path: z.unknown(),
  file: z.unknown(),
});

function textOf(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Pull the entry list out of a parsed document.
 */
function entriesOf(data: unknown): unknown[] | null {
  if (Array.isArray(data)) {
    return data;
  }
  if (data !== null && typeof data === 'object') {
    if (!('bookmarks' in data) || data.bookmarks === undefined || data.bookmarks === null) {
      return [];
    }
    return Array.isArray(data.bookmarks) ? data.bookmarks : null;
  }
  return null;
}

/**
 * Parse a bookmarks document already loaded in memory.
 *
 * @param data - Parsed JSON
 * @param sourcePath - Path recorded as each record's source
 */
export function parseBookmarksData(data: unknown, sourcePath: string): ParseResult {
  const entries = entriesOf(data);
  if (!entries) {
    return err(
      new MetadataParseError(
        `Bookmarks file must be a list or an object with a "bookmarks" list: ${sourcePath}`,
        sourcePath
      )
    );
  }

  const records: MetadataRecord[] = [];
  for (const raw of entries) {
    const parsed = BookmarkEntrySchema.safeParse(raw);
    if (!parsed.success) {
      continue;
    }

    const entry = parsed.data;
    const filePath = textOf(entry.path) ?? textOf(entry.file) ?? '';
    const fileName = fileNameOf(filePath);
    if (!fileName) {
      continue;
    }

    records.push({
      fileKey: fileKeyOf(filePath),
      title: textOf(entry.title) ?? stemOf(fileName),
      source: sourcePath,
    });
  }

  return ok(records);
}

/**
 * Parse a bookmarks JSON file
 *
 * @param sourcePath - Path to the JSON file
 * @returns Records, or the parse error
 */
export async function parseBookmarks(sourcePath: string): Promise<ParseResult> {
  let data: unknown;
  try {
    data = await readJson(sourcePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(
      new MetadataParseError(`Failed to read bookmarks ${sourcePath}: ${reason}`, sourcePath, {
        cause: error,
      })
    );
  }

  return parseBookmarksData(data, sourcePath);
}
