/**
 * Paper Summarizer
 *
 * Turns a paper candidate into a one- or two-line summary: text extraction
 * followed by one chat completion. Remote failures never abort a run; they
 * yield a placeholder summary instead.
 *
 * @module summarize/summarizer
 */

import { getSecret, readEnv } from '../config/index.js';
import type { RunConfig } from '../schemas/index.js';
import { silentLogger, type Logger, type Summarizer, type TextExtractor } from '../pipeline/types.js';
import { createChatCompletion, type ChatCompletionFn } from './client.js';
import { createTextExtractor } from './extract.js';
import { SUMMARY_SYSTEM_PROMPT, buildSummaryPrompt } from './prompts.js';

// ============================================================================
// Constants
// ============================================================================

export const NO_TEXT_SUMMARY = 'No extractable text found in the PDF.';
export const FAILED_SUMMARY = 'Summarizer call failed. Check model endpoint and runtime.';
export const EMPTY_RESPONSE_SUMMARY = '(no response)';

/** Environment variable consulted when summarizer.apiKeyEnv is not set */
export const DEFAULT_API_KEY_ENV = 'PAPER_TRIAGE_API_KEY';

/** Local servers ignore the key but the SDK requires one */
const LOCAL_API_KEY = 'ollama';

/**
 * Raised when the configured summarizer credentials are missing.
 */
export class SummarizerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SummarizerConfigError';
  }
}

// ============================================================================
// Summaries
// ============================================================================

/**
 * Summarize extracted paper text.
 *
 * @param text - Extracted text
 * @param model - Model identifier
 * @param chat - Chat completion function
 * @param options - Sampling temperature and logger
 * @returns Summary or one of the placeholder strings
 */
export async function summarizeText(
  text: string,
  model: string,
  chat: ChatCompletionFn,
  options: { temperature?: number; logger?: Logger } = {}
): Promise<string> {
  const logger = options.logger ?? silentLogger;

  if (!text.trim()) {
    return NO_TEXT_SUMMARY;
  }

  let reply: string;
  try {
    reply = await chat(
      [
        { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
        { role: 'user', content: buildSummaryPrompt(text) },
      ],
      { model, temperature: options.temperature }
    );
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error(`Summarizer request failed for model ${model}: ${reason}`);
    return FAILED_SUMMARY;
  }

  return reply.trim() || EMPTY_RESPONSE_SUMMARY;
}

/**
 * Resolve the summarizer API key.
 *
 * @throws SummarizerConfigError if apiKeyEnv is configured but unset
 */
export function resolveApiKey(
  config: Pick<RunConfig, 'summarizer'>,
  env: NodeJS.ProcessEnv = process.env
): string {
  const { apiKeyEnv } = config.summarizer;

  if (apiKeyEnv) {
    const key = getSecret(apiKeyEnv, env);
    if (!key) {
      throw new SummarizerConfigError(
        `Summarizer API key variable ${apiKeyEnv} is not set`
      );
    }
    return key;
  }

  return getSecret(DEFAULT_API_KEY_ENV, readEnv(env)) ?? LOCAL_API_KEY;
}

/**
 * Options for {@link createSummarizer}.
 */
export interface SummarizerOptions {
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  extract?: TextExtractor;
  chat?: ChatCompletionFn;
}

/**
 * Build the summarizer for one run.
 * Credentials are checked here, before any paper is processed.
 *
 * @throws SummarizerConfigError on missing credentials
 */
export function createSummarizer(config: RunConfig, options: SummarizerOptions = {}): Summarizer {
  const logger = options.logger ?? silentLogger;
  const extract = options.extract ?? createTextExtractor(logger);
  const apiKey = resolveApiKey(config, options.env);
  const chat = options.chat ?? createChatCompletion(config.summarizer.baseUrl, apiKey);

  return async (candidate) => {
    const text = await extract(candidate.path, {
      maxPages: config.maxPages,
      maxChars: config.maxChars,
    });
    logger.debug(`Extracted ${text.length} characters from ${candidate.path}`);

    return summarizeText(text, config.model, chat, {
      temperature: config.summarizer.temperature,
      logger,
    });
  };
}
