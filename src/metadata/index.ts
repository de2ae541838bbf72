/**
 * Metadata Module
 *
 * Bibliographic metadata from bookmark lists and reference-manager exports.
 *
 * @module metadata
 */

export { buildMetadataLookup, resolveParserKind } from './lookup.js';
export { parseBookmarks, parseBookmarksData } from './bookmarks.js';
export {
  parseReferenceExport,
  parseReferenceExportText,
  ATTACHMENT_COLUMNS,
} from './reference-export.js';
export { MetadataParseError, fileKeyOf, fileNameOf, stemOf, type ParseResult } from './types.js';
