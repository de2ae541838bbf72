/**
 * Discovery Module
 *
 * Finds PDF papers in input folders and attaches their metadata.
 *
 * @module discovery
 */

export { discoverPapers, createCandidate } from './discover.js';
export { listPdfFiles, isPdfFile, comparePaths } from './walker.js';
