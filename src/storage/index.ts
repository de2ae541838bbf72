/**
 * Storage Layer
 *
 * File-based persistence for the configuration document, the CSV triage
 * log, Markdown digests and archived papers.
 *
 * @module storage
 */

// Path utilities
export {
  DEFAULT_CONFIG_FILE,
  resolveUserPath,
  getDefaultConfigPath,
  formatCompactTimestamp,
  getDigestFilePath,
} from './paths.js';

// File operations
export {
  hasErrorCode,
  readJson,
  fileExists,
  dirExists,
  pathExists,
  uniqueTarget,
  moveFile,
} from './atomic.js';

// Config operations
export { DEFAULT_TRIAGE_CONFIG, loadTriageConfig, resolveRunConfig } from './config.js';

// Triage log
export { appendLogEntry, readLogEntries } from './triage-log.js';

// Digests
export { DIGEST_TITLE, EMPTY_SUMMARY_PLACEHOLDER, renderDigest, writeDigest } from './digest.js';

// Archive
export { archivePaper } from './archive.js';
