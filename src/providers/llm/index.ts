export { VercelLLMClient } from './client';
export { type CreateLLMClientOptions, createLLMClient } from './factory';
export { extractJSON, parseModelJSON } from './json';
export type { CompletionOptions, LLMClient, LLMProvider, Message } from './types';
