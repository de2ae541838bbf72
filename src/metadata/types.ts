/**
 * Metadata Types
 *
 * Errors and helpers shared by the metadata source parsers.
 *
 * @module metadata/types
 */

import type { MetadataRecord, Result } from '../schemas/index.js';

/**
 * Raised (as a Result error) when one metadata source cannot be parsed.
 */
export class MetadataParseError extends Error {
  constructor(
    message: string,
    public readonly sourcePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MetadataParseError';
  }
}

/**
 * Result of parsing one metadata source.
 */
export type ParseResult = Result<MetadataRecord[], MetadataParseError>;

/**
 * Final path segment, accepting both `/` and `\` separators so that
 * exports written on another platform still join.
 *
 * @example
 * ```typescript
 * fileNameOf('C:\\Zotero\\storage\\AB12\\Paper.pdf'); // 'Paper.pdf'
 * ```
 */
export function fileNameOf(filePath: string): string {
  const parts = filePath.trim().split(/[\\/]/);
  return parts[parts.length - 1] ?? '';
}

/**
 * File name without its last extension.
 */
export function stemOf(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot > 0 ? fileName.slice(0, dot) : fileName;
}

/**
 * Join key used between metadata records and files on disk.
 */
export function fileKeyOf(filePath: string): string {
  return fileNameOf(filePath).toLowerCase();
}
