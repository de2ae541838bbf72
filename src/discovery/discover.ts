/**
 * Discovery Engine
 *
 * Walks the configured folders for PDFs and joins each file against the
 * metadata lookup. Output order is folder order, then path order; a file
 * reached through two folders is emitted once, at its first occurrence.
 *
 * Two different files sharing a name in different folders are both kept
 * and get the same metadata record, since the lookup is keyed by filename.
 *
 * @module discovery/discover
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { MetadataLookup, PaperCandidate } from '../schemas/index.js';
import { silentLogger, type Logger } from '../pipeline/types.js';
import { dirExists } from '../storage/atomic.js';
import { fileKeyOf, stemOf } from '../metadata/types.js';
import { listPdfFiles } from './walker.js';

/**
 * Identity of a file on disk, following symbolic links where possible.
 */
async function identityOf(filePath: string): Promise<string> {
  try {
    return await fs.realpath(filePath);
  } catch {
    return path.resolve(filePath);
  }
}

/**
 * Build an immutable candidate.
 */
export function createCandidate(filePath: string, lookup: MetadataLookup): PaperCandidate {
  const fileName = path.basename(filePath);
  const metadata = lookup.get(fileKeyOf(fileName));

  return Object.freeze({
    path: filePath,
    title: metadata?.title || stemOf(fileName),
    metadata: Object.freeze({ ...(metadata ?? {}) }),
  });
}

/**
 * Discover paper candidates
 *
 * @param folders - Absolute folder paths, in priority order
 * @param lookup - Metadata lookup for the run
 * @param logger - Logger for missing and unreadable folders
 * @returns Candidates with unique resolved paths
 */
export async function discoverPapers(
  folders: readonly string[],
  lookup: MetadataLookup = new Map(),
  logger: Logger = silentLogger
): Promise<PaperCandidate[]> {
  const candidates: PaperCandidate[] = [];
  const seen = new Set<string>();

  for (const folder of folders) {
    if (!(await dirExists(folder))) {
      logger.warn(`Input folder does not exist: ${folder}`);
      continue;
    }

    for (const filePath of await listPdfFiles(folder, logger)) {
      const identity = await identityOf(filePath);
      if (seen.has(identity)) {
        logger.debug(`Skipping duplicate path: ${filePath}`);
        continue;
      }
      seen.add(identity);
      candidates.push(createCandidate(filePath, lookup));
    }
  }

  return candidates;
}
