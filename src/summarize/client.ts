/**
 * Chat Client
 *
 * Client for OpenAI-compatible chat completion endpoints used for paper
 * summaries. The default endpoint is a local Ollama server, which speaks
 * the same API under /v1.
 *
 * @module summarize/client
 */

import OpenAI from 'openai';

// ============================================================================
// Types
// ============================================================================

/**
 * Message in the chat conversation.
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Options for chat completion requests.
 */
export interface ChatOptions {
  model: string;
  temperature?: number;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Sends one chat request and returns the reply text (possibly empty).
 */
export type ChatCompletionFn = (messages: ChatMessage[], options: ChatOptions) => Promise<string>;

/**
 * Chat endpoint error with additional context.
 */
export class ChatApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'ChatApiError';
  }
}

/**
 * Default request timeout. Local models can be slow on first load.
 */
export const SUMMARY_TIMEOUT_MS = 120_000;

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * Create a chat completion function bound to one endpoint.
 *
 * @param baseUrl - OpenAI-compatible base URL
 * @param apiKey - API key (local servers accept any value)
 * @returns Chat completion function
 */
export function createChatCompletion(baseUrl: string, apiKey: string): ChatCompletionFn {
  const client = new OpenAI({ baseURL: baseUrl, apiKey, maxRetries: 0 });

  return async (messages, options) => {
    const timeoutMs = options.timeoutMs ?? SUMMARY_TIMEOUT_MS;

    try {
      const response = await client.chat.completions.create(
        {
          model: options.model,
          messages: messages.map((m) => ({
            role: m.role,
            content: m.content,
          })),
          temperature: options.temperature,
        },
        { timeout: timeoutMs }
      );

      return response.choices[0]?.message?.content ?? '';
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        const status = error.status ?? 500;
        const isRetryable = status === 408 || status === 429 || status >= 500;
        throw new ChatApiError(error.message, status, isRetryable);
      }

      throw new ChatApiError(
        error instanceof Error ? error.message : 'Unknown error',
        500,
        true
      );
    }
  };
}
