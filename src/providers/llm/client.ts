/**
 * Vercel AI SDK v6 LLM Client
 *
 * Wraps the AI SDK generateText function for the planner.
 * No streaming - plans need complete responses for parsing.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText } from 'ai';
import type { CompletionOptions, LLMClient, Message } from './types';

export class VercelLLMClient implements LLMClient {
  readonly modelId: string;

  constructor(
    private model: LanguageModelV3,
    private readonly defaults: Omit<CompletionOptions, 'abortSignal'> = {}
  ) {
    this.modelId = model.modelId;
  }

  async complete(messages: Message[], options: CompletionOptions = {}): Promise<string> {
    const { text } = await generateText({
      model: this.model,
      messages,
      maxOutputTokens: options.maxTokens ?? this.defaults.maxTokens,
      temperature: options.temperature ?? this.defaults.temperature,
      abortSignal: options.abortSignal,
      // Retries belong to the planner policy
      maxRetries: 0
    });

    return text;
  }
}
