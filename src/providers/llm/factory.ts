/**
 * LLM Client Factory
 *
 * Creates the reasoning model client using Vercel AI SDK v6 with direct
 * provider packages. All requests go directly to provider APIs.
 */

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { LanguageModelV3 } from '@ai-sdk/provider';
import type { LLMProvider } from '@/config/schema';
import { VercelLLMClient } from './client';
import type { LLMClient } from './types';

const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

export interface CreateLLMClientOptions {
  apiKey?: string;
  baseUrl?: string;
  /** Provider label for openai-compatible endpoints */
  providerName?: string;
  temperature?: number;
  maxTokens?: number;
}

export function createLLMClient(
  provider: LLMProvider,
  model: string,
  options: CreateLLMClientOptions = {}
): LLMClient {
  const languageModel = getLanguageModel(provider, model, options);
  return new VercelLLMClient(languageModel, {
    temperature: options.temperature,
    maxTokens: options.maxTokens
  });
}

function getLanguageModel(
  provider: LLMProvider,
  model: string,
  options: CreateLLMClientOptions
): LanguageModelV3 {
  switch (provider) {
    case 'openai': {
      const openai = createOpenAI({ apiKey: options.apiKey });
      return openai(model);
    }

    case 'anthropic': {
      const anthropic = createAnthropic({ apiKey: options.apiKey });
      return anthropic(model);
    }

    case 'google': {
      const google = createGoogleGenerativeAI({ apiKey: options.apiKey });
      return google(model);
    }

    case 'ollama': {
      // Use OpenAI-compatible API for Ollama (supports /v1/chat/completions)
      const ollamaProvider = createOpenAICompatible({
        name: 'ollama',
        baseURL: options.baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
        apiKey: 'ollama' // Required by SDK but not used by Ollama
      });
      return ollamaProvider.languageModel(model);
    }

    case 'openai-compatible': {
      if (!options.baseUrl) {
        throw new Error('baseUrl required for openai-compatible provider');
      }
      const openaiCompatible = createOpenAICompatible({
        name: options.providerName ?? 'openai-compatible',
        baseURL: options.baseUrl,
        apiKey: options.apiKey ?? ''
      });
      return openaiCompatible.languageModel(model);
    }

    default: {
      const _exhaustive: never = provider;
      throw new Error(`Unknown provider: ${_exhaustive}`);
    }
  }
}
