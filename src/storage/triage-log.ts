/**
 * Triage Log Storage
 *
 * The triage log is an append-only CSV file shared by every run. The header
 * row is written once, when the file is created; later runs only append.
 *
 * @module storage/triage-log
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { LOG_FIELDS, LogEntrySchema, type LogEntry, type LogField } from '../schemas/index.js';
import { fileExists, hasErrorCode } from './atomic.js';

/**
 * Convert a log entry to its CSV row.
 */
function toRow(entry: LogEntry): Record<LogField, string> {
  return {
    timestamp: entry.timestamp,
    title: entry.title,
    path: entry.path,
    summary: entry.summary,
    decision: entry.decision,
    dry_run: String(entry.dryRun),
  };
}

/**
 * Append one entry to the triage log
 *
 * Creates the parent directory and the file (with header) when missing.
 *
 * @param logPath - CSV log path
 * @param entry - Entry to append
 */
export async function appendLogEntry(logPath: string, entry: LogEntry): Promise<void> {
  const validated = LogEntrySchema.parse(entry);
  await fs.mkdir(path.dirname(logPath), { recursive: true });

  const isNew = !(await fileExists(logPath));
  const csv = stringify([toRow(validated)], {
    header: isNew,
    columns: [...LOG_FIELDS],
  });

  await fs.appendFile(logPath, csv, 'utf-8');
}

const CsvRecordsSchema = z.array(z.record(z.string()));

/**
 * Load every entry from the triage log
 *
 * @param logPath - CSV log path
 * @returns Entries in file order, empty if the log does not exist
 * @throws Error if the log exists but a row is malformed
 */
export async function readLogEntries(logPath: string): Promise<LogEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(logPath, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return [];
    }
    throw error;
  }

  const records = CsvRecordsSchema.parse(
    parse(content, { columns: true, skip_empty_lines: true })
  );

  return records.map((record) =>
    LogEntrySchema.parse({
      timestamp: record.timestamp,
      title: record.title,
      path: record.path,
      summary: record.summary,
      decision: record.decision,
      dryRun: record.dry_run?.toLowerCase() === 'true',
    })
  );
}
