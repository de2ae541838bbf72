/**
 * Metadata Lookup Builder
 *
 * Merges every configured metadata source into one filename-keyed lookup.
 * Sources are processed in the order given; when two sources describe the
 * same file, the later one wins outright (no field merge).
 *
 * @module metadata/lookup
 */

import {
  MetadataSourceTypeSchema,
  type MetadataLookup,
  type MetadataParserKind,
  type MetadataRecord,
  type MetadataSource,
} from '../schemas/index.js';
import { silentLogger, type Logger } from '../pipeline/types.js';
import { pathExists } from '../storage/atomic.js';
import { parseBookmarks } from './bookmarks.js';
import { parseReferenceExport } from './reference-export.js';
import type { ParseResult } from './types.js';

/**
 * Map a configured source type to its parser.
 *
 * @param type - Source type from the configuration (defaults to bookmarks)
 * @returns Parser tag, or null for an unrecognized type
 */
export function resolveParserKind(type: string | undefined): MetadataParserKind | null {
  const normalized = (type ?? '').trim().toLowerCase() || 'bookmarks';
  const parsed = MetadataSourceTypeSchema.safeParse(normalized);
  if (!parsed.success) return null;

  switch (parsed.data) {
    case 'bookmarks':
      return 'bookmarks';
    case 'zotero':
    case 'mendeley':
      return 'reference-export';
  }
}

/**
 * Run the parser for a tag.
 */
function parseSource(kind: MetadataParserKind, sourcePath: string): Promise<ParseResult> {
  switch (kind) {
    case 'bookmarks':
      return parseBookmarks(sourcePath);
    case 'reference-export':
      return parseReferenceExport(sourcePath);
  }
}

/**
 * Build the metadata lookup for a run
 *
 * Missing files, unknown types and parse failures are logged and skipped.
 *
 * @param sources - Source descriptors, in processing order
 * @param logger - Logger for skipped sources
 * @returns Lookup from lowercased filename to record
 */
export async function buildMetadataLookup(
  sources: readonly MetadataSource[],
  logger: Logger = silentLogger
): Promise<MetadataLookup> {
  const lookup = new Map<string, MetadataRecord>();

  for (const source of sources) {
    if (!(await pathExists(source.path))) {
      logger.warn(`Metadata source not found: ${source.path}`);
      continue;
    }

    const kind = resolveParserKind(source.type);
    if (!kind) {
      logger.warn(`Unknown metadata source type '${source.type}' for ${source.path}`);
      continue;
    }

    const result = await parseSource(kind, source.path);
    if (!result.ok) {
      logger.error(result.error.message);
      continue;
    }

    for (const record of result.value) {
      lookup.set(record.fileKey, record);
    }
    logger.debug(`Loaded ${result.value.length} metadata records from ${source.path}`);
  }

  return lookup;
}
