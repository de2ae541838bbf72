/**
 * PDF Walker
 *
 * Recursive folder enumeration for PDF files.
 *
 * @module discovery/walker
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { silentLogger, type Logger } from '../pipeline/types.js';

/**
 * Whether a file name carries the PDF extension (any case).
 */
export function isPdfFile(fileName: string): boolean {
  return path.extname(fileName).toLowerCase() === '.pdf';
}

/**
 * Byte-order string comparison, independent of locale.
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function collect(dir: string, found: string[], logger: Logger): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Unable to read folder ${dir}: ${reason}`);
    return;
  }

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await collect(fullPath, found, logger);
    } else if (entry.isFile() && isPdfFile(entry.name)) {
      found.push(fullPath);
    }
  }
}

/**
 * List every PDF below a folder, sorted by full path
 *
 * Symbolic links are not followed. A folder that cannot be read is logged and
 * skipped; the rest of the tree is still listed.
 *
 * @param folder - Absolute folder path
 * @returns Absolute file paths in lexicographic order
 */
export async function listPdfFiles(folder: string, logger: Logger = silentLogger): Promise<string[]> {
  const found: string[] = [];
  await collect(path.resolve(folder), found, logger);
  return found.sort(comparePaths);
}
