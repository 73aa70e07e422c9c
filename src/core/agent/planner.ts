/**
 * LLM Planner
 *
 * Asks the reasoning model for the next action and returns its JSON
 * unvalidated; the orchestrator owns validation and repair.
 */

import { parseModelJSON } from '@/providers/llm/json';
import type { LLMClient } from '@/providers/llm/types';
import { buildFinalizeMessages, buildPlanMessages } from './prompts';
import type { Planner, PlanRequest } from './types';

export interface LLMPlannerOptions {
  temperature?: number;
  maxTokens?: number;
}

export class LLMPlanner implements Planner {
  constructor(
    private readonly llm: LLMClient,
    private readonly options: LLMPlannerOptions = {}
  ) {}

  async plan(request: PlanRequest, signal: AbortSignal): Promise<unknown> {
    const text = await this.llm.complete(buildPlanMessages(request), {
      ...this.options,
      abortSignal: signal
    });
    return parseModelJSON(text);
  }

  async finalize(request: PlanRequest, signal: AbortSignal): Promise<string> {
    const text = await this.llm.complete(buildFinalizeMessages(request), {
      ...this.options,
      abortSignal: signal
    });
    return text.trim();
  }
}
