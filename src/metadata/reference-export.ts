/**
 * Reference Export Parser
 *
 * Reads CSV exports from reference managers (Zotero, Mendeley). The
 * attachment column name differs between tools and versions, so several
 * names are tried in order. Multi-attachment cells are semicolon-separated;
 * only the first attachment is used.
 *
 * @module metadata/reference-export
 */

import * as fs from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { err, ok, type MetadataRecord } from '../schemas/index.js';
import { MetadataParseError, fileKeyOf, fileNameOf, stemOf, type ParseResult } from './types.js';

/**
 * Attachment columns, in lookup order.
 */
export const ATTACHMENT_COLUMNS = ['File Attachments', 'Attachments', 'file', 'path'] as const;

const CsvRowsSchema = z.array(z.record(z.string()));

/**
 * First non-empty value among the given columns.
 */
function firstValue(row: Record<string, string>, columns: readonly string[]): string | undefined {
  for (const column of columns) {
    const value = row[column];
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return undefined;
}

/**
 * Parse reference-export CSV text.
 *
 * @param content - CSV text with a header row
 * @param sourcePath - Path recorded as each record's source
 */
export function parseReferenceExportText(content: string, sourcePath: string): ParseResult {
  let rows: Array<Record<string, string>>;
  try {
    rows = CsvRowsSchema.parse(
      parse(content, {
        columns: true,
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      })
    );
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(
      new MetadataParseError(`Failed to parse reference export ${sourcePath}: ${reason}`, sourcePath, {
        cause: error,
      })
    );
  }

  const records: MetadataRecord[] = [];
  for (const row of rows) {
    const attachments = firstValue(row, ATTACHMENT_COLUMNS);
    if (!attachments) {
      continue;
    }

    const attachment = attachments.split(';', 1)[0]?.trim() ?? '';
    const fileName = fileNameOf(attachment);
    if (!fileName) {
      continue;
    }

    records.push({
      fileKey: fileKeyOf(attachment),
      title: firstValue(row, ['Title', 'title']) ?? stemOf(fileName),
      authors: firstValue(row, ['Author', 'Authors']),
      year: firstValue(row, ['Year']),
      source: sourcePath,
    });
  }

  return ok(records);
}

/**
 * Parse a reference-export CSV file
 *
 * @param sourcePath - Path to the CSV export
 * @returns Records, or the parse error
 */
export async function parseReferenceExport(sourcePath: string): Promise<ParseResult> {
  let content: string;
  try {
    content = await fs.readFile(sourcePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(
      new MetadataParseError(`Failed to read reference export ${sourcePath}: ${reason}`, sourcePath, {
        cause: error,
      })
    );
  }

  return parseReferenceExportText(content, sourcePath);
}
