/**
 * Summarize Module
 *
 * @module summarize
 */

export * from './client.js';
export * from './extract.js';
export * from './prompts.js';
export * from './summarizer.js';
