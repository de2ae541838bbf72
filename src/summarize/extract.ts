/**
 * PDF Text Extraction
 *
 * Reads text from the first pages of a PDF, bounded by page and character
 * limits.
 *
 * @module summarize/extract
 */

import * as fs from 'node:fs/promises';
import pdfParse from 'pdf-parse';
import { silentLogger, type Logger, type TextExtractor } from '../pipeline/types.js';

/**
 * PDF parser signature (the part of pdf-parse used here).
 */
export type PdfParser = (buffer: Buffer, options: { max: number }) => Promise<{ text: string }>;

/**
 * Create a text extractor.
 *
 * Unreadable PDFs are logged and yield an empty string.
 *
 * @param logger - Logger for unreadable files
 * @param parsePdf - PDF parser (defaults to pdf-parse)
 */
export function createTextExtractor(
  logger: Logger = silentLogger,
  parsePdf: PdfParser = pdfParse
): TextExtractor {
  return async (filePath, limits) => {
    if (limits.maxPages <= 0) {
      throw new RangeError('maxPages must be positive');
    }

    let text: string;
    try {
      const buffer = await fs.readFile(filePath);
      const data = await parsePdf(buffer, { max: limits.maxPages });
      text = data.text;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(`Unable to read PDF ${filePath}: ${reason}`);
      return '';
    }

    return truncateText(text.trim(), limits.maxChars);
  };
}

/**
 * Cut text to at most `maxChars` characters.
 */
export function truncateText(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}
