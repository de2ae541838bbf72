/**
 * Notify Module
 *
 * @module notify
 */

export * from './dispatcher.js';
export * from './email.js';
