/**
 * Summary Prompts
 *
 * Prompt templates for one- or two-line paper summaries.
 *
 * @module summarize/prompts
 */

// ============================================================================
// System Prompt
// ============================================================================

export const SUMMARY_SYSTEM_PROMPT =
  'You help researchers triage papers. Keep answers terse and factual.';

// ============================================================================
// User Prompt Template
// ============================================================================

export const SUMMARY_PROMPT =
  'Summarize this academic paper in 1-2 concise lines: clearly describe the problem, ' +
  'method/approach, dataset or domain context, and key findings or implications. ' +
  'Highlight anything notable about limitations or future work if space allows.';

/**
 * Build the user prompt for a paper's extracted text.
 *
 * @param text - Text from the first pages of the paper
 */
export function buildSummaryPrompt(text: string): string {
  return `${SUMMARY_PROMPT}\n\n${text}`;
}
