/**
 * Paper Schemas
 *
 * Metadata sources, metadata records and discovered paper candidates.
 */

import { z } from 'zod';

// ============================================================================
// Metadata Sources
// ============================================================================

/**
 * Metadata source type as written in the configuration.
 *
 * - bookmarks: JSON bookmark list
 * - zotero / mendeley: reference-manager CSV export
 */
export const MetadataSourceTypeSchema = z.enum(['bookmarks', 'zotero', 'mendeley']);

export type MetadataSourceType = z.infer<typeof MetadataSourceTypeSchema>;

/**
 * Source descriptor from the configuration. The type is kept as a free
 * string here; unrecognized types are reported and skipped at build time
 * instead of failing the whole configuration.
 */
export const MetadataSourceSchema = z.object({
  type: z.string().optional(),
  path: z.string().min(1),
});

export type MetadataSource = z.infer<typeof MetadataSourceSchema>;

/**
 * Parser tag selected from a source type.
 * zotero and mendeley exports share one tabular parser.
 */
export type MetadataParserKind = 'bookmarks' | 'reference-export';

// ============================================================================
// Metadata Records
// ============================================================================

export const MetadataRecordSchema = z.object({
  /** Lowercased filename used to join against files on disk */
  fileKey: z.string().min(1),
  title: z.string(),
  authors: z.string().optional(),
  year: z.string().optional(),
  /** Path of the export this record came from */
  source: z.string(),
});

export type MetadataRecord = z.infer<typeof MetadataRecordSchema>;

/**
 * Filename-keyed lookup built once per run.
 */
export type MetadataLookup = ReadonlyMap<string, MetadataRecord>;

// ============================================================================
// Paper Candidates
// ============================================================================

/**
 * A discovered PDF awaiting a decision.
 * Identity is the resolved absolute path.
 */
export interface PaperCandidate {
  readonly path: string;
  readonly title: string;
  readonly metadata: Readonly<Partial<MetadataRecord>>;
}
