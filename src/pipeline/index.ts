/**
 * Pipeline
 *
 * One triage run end to end, and the weekly scheduler that repeats it.
 *
 * @module pipeline
 */

export {
  silentLogger,
  type Logger,
  type TextExtractor,
  type Summarizer,
  type InteractiveDecider,
  type EmailMessage,
  type TransportOptions,
  type EmailTransport,
  type RunContext,
  type RunResult,
} from './types.js';

export { runTriage, toLogEntry } from './run.js';

export {
  WeeklyScheduler,
  DAY_INDEX,
  TICK_INTERVAL_MS,
  type WeeklySchedulerOptions,
} from './scheduler.js';
