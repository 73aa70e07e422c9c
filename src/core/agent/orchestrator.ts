/**
 * Agent Orchestrator
 *
 * Explicit state machine driving one request:
 *
 *   AwaitingPlan → ExecutingTool → FoldingResult → AwaitingPlan
 *                ↘ Completed / Aborted
 *
 * One tool call per iteration. The run ends with a final answer, when the
 * iteration budget is spent (forced finalize), when plan repairs run out,
 * or when the request deadline fires.
 */

import {
  AbortedError,
  type AbortReason,
  describeError,
  OrchestrationError,
  TimeoutError,
  toErrorDetail
} from '../errors';
import { type RandomSource, type RetryEvent, type RetryPolicy, withRetry } from '../resilience';
import type { ToolRegistry, ToolResult } from '../tools';
import { parsePlan } from './plan';
import type {
  AgentEvent,
  AgentLimits,
  ConversationState,
  HistoryEntry,
  MachineState,
  OrchestrationResult,
  Planner,
  PlanRequest,
  ToolTraceEntry
} from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface OrchestratorDeps {
  planner: Planner;
  registry: ToolRegistry;
  limits: AgentLimits;
  policies: {
    planner: RetryPolicy;
    tools: RetryPolicy;
  };
  random?: RandomSource;
  onRetry?: (event: RetryEvent) => void;
  onEvent?: (event: AgentEvent) => void;
  now?: () => number;
}

export interface RunInput {
  message: string;
  sessionId: string;
  /** Prior turns for this session */
  history?: readonly HistoryEntry[];
  /** Caller cancellation (e.g. client disconnect) */
  signal?: AbortSignal;
}

const USER_MESSAGES: Record<AbortReason, string> = {
  MALFORMED_PLAN: 'The assistant could not produce a valid plan for this request.',
  PLANNER_FAILED: 'The reasoning service is unavailable. Please try again later.',
  DEADLINE_EXCEEDED: 'The request took too long and was stopped.',
  CANCELLED: 'The request was cancelled.'
};

/**
 * Per-run bookkeeping. Lives only for one `run` call.
 */
interface RunContext {
  message: string;
  state: ConversationState;
  /** Fires on the request deadline or caller cancellation */
  signal: AbortSignal;
  trace: ToolTraceEntry[];
  repairs: number;
  repairHint?: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Orchestrator
// ═══════════════════════════════════════════════════════════════════════════════

export class Orchestrator {
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? Date.now;
  }

  async run(input: RunInput): Promise<OrchestrationResult> {
    const { requestTimeoutMs } = this.deps.limits;
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new TimeoutError('request', requestTimeoutMs)),
      requestTimeoutMs
    );
    const onCallerAbort = (): void => controller.abort(input.signal?.reason);
    if (input.signal?.aborted) onCallerAbort();
    else input.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const context: RunContext = {
      message: input.message,
      state: {
        sessionId: input.sessionId,
        history: [...(input.history ?? []), { kind: 'user', content: input.message }],
        iterationCount: 0
      },
      signal: controller.signal,
      trace: [],
      repairs: 0
    };

    try {
      return await this.drive(context);
    } finally {
      clearTimeout(timer);
      input.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async drive(context: RunContext): Promise<OrchestrationResult> {
    let machine: MachineState = { kind: 'AwaitingPlan' };

    for (;;) {
      if (context.signal.aborted && machine.kind !== 'Completed' && machine.kind !== 'Aborted') {
        machine = this.abortedBySignal(context);
      }

      switch (machine.kind) {
        case 'AwaitingPlan':
          machine = await this.awaitPlan(context);
          break;

        case 'ExecutingTool':
          machine = await this.executeTool(context, machine.tool, machine.arguments);
          break;

        case 'FoldingResult':
          machine = await this.foldResult(context, machine);
          break;

        case 'Completed':
          context.state.history.push({ kind: 'assistant', content: machine.answer });
          return {
            status: 'completed',
            answer: machine.answer,
            toolTrace: context.trace,
            iterations: context.state.iterationCount,
            history: context.state.history
          };

        case 'Aborted':
          return {
            status: 'aborted',
            reason: machine.error.code,
            detail: USER_MESSAGES[machine.error.code],
            error: machine.error,
            toolTrace: context.trace,
            iterations: context.state.iterationCount
          };
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // States
  // ─────────────────────────────────────────────────────────────────────────────

  private planRequest(context: RunContext): PlanRequest {
    return {
      message: context.message,
      history: context.state.history,
      tools: this.deps.registry.list(),
      repairHint: context.repairHint
    };
  }

  private async awaitPlan(context: RunContext): Promise<MachineState> {
    const request = this.planRequest(context);

    let raw: unknown;
    try {
      raw = await withRetry(
        ({ signal }) => this.deps.planner.plan(request, signal),
        this.deps.policies.planner,
        this.retryOptions('plan', context.signal)
      );
    } catch (error) {
      if (context.signal.aborted) return this.abortedBySignal(context);
      return {
        kind: 'Aborted',
        error: new OrchestrationError(
          'PLANNER_FAILED',
          `Planner failed: ${describeError(error)}`,
          error
        )
      };
    }

    const parsed = parsePlan(raw);
    if (!parsed.ok) {
      context.repairs += 1;
      this.deps.onEvent?.({ type: 'plan_rejected', issue: parsed.issue, repairs: context.repairs });
      if (context.repairs > this.deps.limits.maxPlanRepairs) {
        return {
          kind: 'Aborted',
          error: new OrchestrationError(
            'MALFORMED_PLAN',
            `Planner produced ${context.repairs} malformed plans; last issue: ${parsed.issue}`
          )
        };
      }
      context.repairHint = parsed.issue;
      return { kind: 'AwaitingPlan' };
    }

    context.repairHint = undefined;
    const { plan } = parsed;
    if (plan.type === 'final_answer') {
      return { kind: 'Completed', answer: plan.answer };
    }
    return { kind: 'ExecutingTool', tool: plan.tool, arguments: plan.arguments };
  }

  private async executeTool(
    context: RunContext,
    tool: string,
    args: Record<string, unknown>
  ): Promise<MachineState> {
    this.deps.onEvent?.({ type: 'tool_call', tool, arguments: args });
    const started = this.now();
    let attempts = 0;

    let outcome: ToolResult;
    try {
      outcome = await withRetry(
        ({ attempt, signal }) => {
          attempts = attempt;
          return this.deps.registry.invoke(tool, args, {
            signal,
            sessionId: context.state.sessionId,
            attempt
          });
        },
        this.deps.policies.tools,
        this.retryOptions(`tool(${tool})`, context.signal)
      );
    } catch (error) {
      if (context.signal.aborted) return this.abortedBySignal(context);
      outcome = { ok: false, error: toErrorDetail(error) };
    }

    return {
      kind: 'FoldingResult',
      call: { toolName: tool, arguments: args, attemptNumber: attempts },
      outcome,
      durationMs: this.now() - started
    };
  }

  private async foldResult(
    context: RunContext,
    folding: Extract<MachineState, { kind: 'FoldingResult' }>
  ): Promise<MachineState> {
    const { call, outcome } = folding;
    context.state.history.push({ kind: 'tool', call, outcome });

    const entry: ToolTraceEntry = {
      tool: call.toolName,
      arguments: call.arguments,
      ok: outcome.ok,
      attempts: call.attemptNumber,
      durationMs: folding.durationMs
    };
    if (outcome.ok) {
      entry.result = outcome.data;
    } else {
      entry.error = outcome.error;
    }
    context.trace.push(entry);
    this.deps.onEvent?.({ type: 'tool_outcome', entry });

    context.state.iterationCount += 1;
    if (context.state.iterationCount < this.deps.limits.maxIterations) {
      return { kind: 'AwaitingPlan' };
    }

    // Budget spent: one final-answer request, no more tools
    try {
      const answer = await withRetry(
        ({ signal }) => this.deps.planner.finalize(this.planRequest(context), signal),
        this.deps.policies.planner,
        this.retryOptions('finalize', context.signal)
      );
      return { kind: 'Completed', answer };
    } catch (error) {
      if (context.signal.aborted) return this.abortedBySignal(context);
      return {
        kind: 'Aborted',
        error: new OrchestrationError(
          'PLANNER_FAILED',
          `Finalize failed: ${describeError(error)}`,
          error
        )
      };
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────────────────────

  private retryOptions(operationName: string, signal: AbortSignal) {
    return {
      operationName,
      signal,
      random: this.deps.random,
      onRetry: this.deps.onRetry
    };
  }

  private abortedBySignal(context: RunContext): MachineState {
    const reason: unknown = context.signal.reason;
    if (reason instanceof TimeoutError) {
      return {
        kind: 'Aborted',
        error: new OrchestrationError(
          'DEADLINE_EXCEEDED',
          `Request exceeded ${reason.timeoutMs}ms`,
          new AbortedError('request', reason)
        )
      };
    }
    return {
      kind: 'Aborted',
      error: new OrchestrationError('CANCELLED', 'Request cancelled by caller', reason)
    };
  }
}
