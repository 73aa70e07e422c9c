import type { LLMProvider } from '@/config/schema';

export type { LLMProvider };

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Options for LLM completion requests.
 * If not provided, provider uses the API's defaults.
 */
export interface CompletionOptions {
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Sampling temperature (0-2 for most providers) */
  temperature?: number;
  /** Cancels the in-flight request */
  abortSignal?: AbortSignal;
}

export interface LLMClient {
  /**
   * Generate a completion from the LLM.
   * @param messages - The conversation messages
   * @returns The assistant's response content as a string
   */
  complete(messages: Message[], options?: CompletionOptions): Promise<string>;

  /**
   * The model identifier being used.
   */
  readonly modelId: string;
}
