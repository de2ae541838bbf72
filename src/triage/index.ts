/**
 * Triage Module
 *
 * Decision resolution and the per-run triage driver.
 *
 * @module triage
 */

export {
  parseDecision,
  normalizeDecision,
  resolveDecisionMode,
  type DecisionMode,
} from './decision.js';
export { TriageDriver, type TriageDriverOptions } from './driver.js';
