/**
 * Zod Schemas for All Data Types
 *
 * Central export point for all schema definitions used in the pipeline.
 */

// ============================================================================
// Common Types
// ============================================================================

export { ISO8601TimestampSchema, ok, err, type ISO8601Timestamp, type Result } from './common.js';

// ============================================================================
// Papers and Metadata
// ============================================================================

export {
  MetadataSourceTypeSchema,
  MetadataSourceSchema,
  MetadataRecordSchema,
  type MetadataSourceType,
  type MetadataSource,
  type MetadataParserKind,
  type MetadataRecord,
  type MetadataLookup,
  type PaperCandidate,
} from './paper.js';

// ============================================================================
// Triage Decisions and Log
// ============================================================================

export {
  DecisionSchema,
  DecisionCodeSchema,
  DECISION_CODES,
  DECISIONS_BY_CODE,
  LOG_FIELDS,
  LogEntrySchema,
  type Decision,
  type DecisionCode,
  type Action,
  type LogField,
  type LogEntry,
} from './triage.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  TriageConfigSchema,
  DigestConfigSchema,
  EmailConfigSchema,
  ScheduleConfigSchema,
  DayOfWeekSchema,
  AutoDecisionConfigSchema,
  SummarizerConfigSchema,
  type TriageConfig,
  type DigestConfig,
  type EmailConfig,
  type ScheduleConfig,
  type DayOfWeek,
  type AutoDecisionConfig,
  type SummarizerConfig,
  type RunOverrides,
  type RunConfig,
} from './run-config.js';
