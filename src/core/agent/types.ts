/**
 * Agent Types
 *
 * Conversation state, plans, tool outcomes and the orchestrator's
 * explicit machine states.
 */

import type { AbortReason, ErrorDetail, OrchestrationError } from '../errors';
import type { ToolResult, ToolSpec } from '../tools';

// ═══════════════════════════════════════════════════════════════════════════════
// Conversation
// ═══════════════════════════════════════════════════════════════════════════════

export interface ToolCall {
  toolName: string;
  arguments: Record<string, unknown>;
  /** Attempts the Resilience Manager made for this call */
  attemptNumber: number;
}

/** Success, structured failure, or a thrown error folded into data. */
export type ToolOutcome = ToolResult;

export type HistoryEntry =
  | { kind: 'user'; content: string }
  | { kind: 'assistant'; content: string }
  | { kind: 'tool'; call: ToolCall; outcome: ToolOutcome };

export interface ConversationState {
  sessionId: string;
  history: HistoryEntry[];
  iterationCount: number;
}

export interface ToolTraceEntry {
  tool: string;
  arguments: Record<string, unknown>;
  ok: boolean;
  attempts: number;
  durationMs: number;
  /** Handler data on success */
  result?: unknown;
  error?: ErrorDetail;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Planning
// ═══════════════════════════════════════════════════════════════════════════════

export type Plan =
  | { type: 'final_answer'; answer: string }
  | { type: 'tool_call'; tool: string; arguments: Record<string, unknown> };

export interface PlanRequest {
  message: string;
  history: readonly HistoryEntry[];
  tools: readonly ToolSpec[];
  /** Why the previous plan was rejected */
  repairHint?: string;
}

/**
 * The reasoning collaborator. `plan` returns its raw output; the
 * orchestrator validates it.
 */
export interface Planner {
  plan(request: PlanRequest, signal: AbortSignal): Promise<unknown>;
  finalize(request: PlanRequest, signal: AbortSignal): Promise<string>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Machine
// ═══════════════════════════════════════════════════════════════════════════════

export type MachineState =
  | { kind: 'AwaitingPlan' }
  | { kind: 'ExecutingTool'; tool: string; arguments: Record<string, unknown> }
  | { kind: 'FoldingResult'; call: ToolCall; outcome: ToolOutcome; durationMs: number }
  | { kind: 'Completed'; answer: string }
  | { kind: 'Aborted'; error: OrchestrationError };

export interface AgentLimits {
  maxIterations: number;
  maxPlanRepairs: number;
  requestTimeoutMs: number;
}

export type OrchestrationResult =
  | {
      status: 'completed';
      answer: string;
      toolTrace: ToolTraceEntry[];
      iterations: number;
      /** Prior history plus this run's message, tool calls and answer */
      history: HistoryEntry[];
    }
  | {
      status: 'aborted';
      reason: AbortReason;
      detail: string;
      error: OrchestrationError;
      toolTrace: ToolTraceEntry[];
      iterations: number;
    };

export type AgentEvent =
  | { type: 'plan_rejected'; issue: string; repairs: number }
  | { type: 'tool_call'; tool: string; arguments: Record<string, unknown> }
  | { type: 'tool_outcome'; entry: ToolTraceEntry };
