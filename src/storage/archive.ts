/**
 * Archive Storage Operations
 *
 * Papers decided as "remove" are moved into the archive directory. File
 * names are preserved; on a collision the first free `-N` suffix is used.
 *
 * @module storage/archive
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { moveFile, uniqueTarget } from './atomic.js';

/**
 * Move a paper into the archive directory
 *
 * @param filePath - Paper to move
 * @param archiveDir - Archive directory (created if missing)
 * @returns Path the paper now lives at
 */
export async function archivePaper(filePath: string, archiveDir: string): Promise<string> {
  await fs.mkdir(archiveDir, { recursive: true });
  const target = await uniqueTarget(path.join(archiveDir, path.basename(filePath)));
  await moveFile(filePath, target);
  return target;
}
