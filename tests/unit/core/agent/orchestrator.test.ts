/**
 * Agent Orchestrator Tests
 *
 * Termination, plan repair, tool outcome folding and abort reasons.
 */

import { APICallError } from '@ai-sdk/provider';
import { describe, expect, test } from 'vitest';
import { type AgentEvent, type AgentLimits, Orchestrator, type Planner } from '@/core/agent';
import { TransientError } from '@/core/errors';
import { defineTool, fail, ok, ToolRegistry } from '@/core/tools';
import { ScriptedPlanner, testPolicy, untilAborted } from '@tests/helpers/mocks';

const LIMITS: AgentLimits = { maxIterations: 2, maxPlanRepairs: 1, requestTimeoutMs: 1000 };

function createRegistry(options: { flakyFailures?: number } = {}): ToolRegistry {
  let failuresLeft = options.flakyFailures ?? 0;
  const registry = new ToolRegistry();

  registry.register(
    defineTool({
      name: 'lookup',
      description: 'Look up a patient',
      argumentSchema: { patientId: { type: 'integer', required: true } },
      handler: async (args) => ok({ patientId: args.patientId, name: 'Test Patient' })
    })
  );
  registry.register(
    defineTool({
      name: 'flaky',
      description: 'Fails transiently before succeeding',
      argumentSchema: {},
      handler: async () => {
        if (failuresLeft > 0) {
          failuresLeft--;
          throw new TransientError('service busy');
        }
        return ok('recovered');
      }
    })
  );
  registry.register(
    defineTool({
      name: 'refuse',
      description: 'Always reports a structured failure',
      argumentSchema: {},
      handler: async () => fail('PATIENT_NOT_FOUND', 'Patient 9 not found')
    })
  );
  registry.seal();
  return registry;
}

function createOrchestrator(
  planner: Planner,
  options: { limits?: Partial<AgentLimits>; registry?: ToolRegistry; events?: AgentEvent[] } = {}
): Orchestrator {
  return new Orchestrator({
    planner,
    registry: options.registry ?? createRegistry(),
    limits: { ...LIMITS, ...options.limits },
    policies: { planner: testPolicy(), tools: testPolicy() },
    onEvent: options.events ? (event) => options.events?.push(event) : undefined
  });
}

const lookupCall = { type: 'tool_call', tool: 'lookup', arguments: { patientId: 1 } };

// ═══════════════════════════════════════════════════════════════════════════════
// Completion
// ═══════════════════════════════════════════════════════════════════════════════

describe('Orchestrator completion', () => {
  test('returns a direct final answer without tool calls', async () => {
    const planner = new ScriptedPlanner([{ type: 'final_answer', answer: 'Hello' }]);
    const result = await createOrchestrator(planner).run({ message: 'Hi', sessionId: 's1' });

    expect(result.status).toBe('completed');
    if (result.status === 'completed') {
      expect(result.answer).toBe('Hello');
      expect(result.iterations).toBe(0);
      expect(result.toolTrace).toEqual([]);
      expect(result.history).toEqual([
        { kind: 'user', content: 'Hi' },
        { kind: 'assistant', content: 'Hello' }
      ]);
    }
  });

  test('folds a tool result into history before the next plan', async () => {
    const planner = new ScriptedPlanner([lookupCall, { type: 'final_answer', answer: 'Found' }]);
    const result = await createOrchestrator(planner).run({ message: 'Who is 1?', sessionId: 's1' });

    expect(result.status).toBe('completed');
    expect(planner.requests).toHaveLength(2);
    expect(planner.requests[1]?.history[1]).toEqual({
      kind: 'tool',
      call: { toolName: 'lookup', arguments: { patientId: 1 }, attemptNumber: 1 },
      outcome: { ok: true, data: { patientId: 1, name: 'Test Patient' } }
    });
    if (result.status === 'completed') {
      expect(result.iterations).toBe(1);
      expect(result.toolTrace.map((entry) => [entry.tool, entry.ok, entry.attempts])).toEqual([
        ['lookup', true, 1]
      ]);
      expect(result.toolTrace[0]?.result).toEqual({ patientId: 1, name: 'Test Patient' });
    }
  });

  test('carries prior session history into the plan request', async () => {
    const planner = new ScriptedPlanner([{ type: 'final_answer', answer: 'Again' }]);
    await createOrchestrator(planner).run({
      message: 'Second',
      sessionId: 's1',
      history: [
        { kind: 'user', content: 'First' },
        { kind: 'assistant', content: 'Reply' }
      ]
    });

    expect(planner.requests[0]?.history.map((entry) => entry.kind)).toEqual(['user', 'assistant', 'user']);
    expect(planner.requests[0]?.message).toBe('Second');
  });

  test('forces a final answer once the iteration budget is spent', async () => {
    const planner = new ScriptedPlanner([lookupCall, lookupCall, lookupCall]);
    const result = await createOrchestrator(planner).run({ message: 'Loop', sessionId: 's1' });

    expect(planner.requests).toHaveLength(2);
    expect(planner.finalizeCalls).toBe(1);
    expect(result.status).toBe('completed');
    if (result.status === 'completed') {
      expect(result.answer).toBe('Final answer from gathered results');
      expect(result.iterations).toBe(2);
      expect(result.toolTrace).toHaveLength(2);
    }
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Tool Outcomes
// ═══════════════════════════════════════════════════════════════════════════════

describe('Orchestrator tool outcomes', () => {
  test('structured tool failure is folded, not fatal', async () => {
    const planner = new ScriptedPlanner([
      { type: 'tool_call', tool: 'refuse', arguments: {} },
      { type: 'final_answer', answer: 'No such patient' }
    ]);
    const result = await createOrchestrator(planner).run({ message: 'Find 9', sessionId: 's1' });

    expect(result.status).toBe('completed');
    expect(result.toolTrace[0]?.ok).toBe(false);
    expect(result.toolTrace[0]?.result).toBeUndefined();
    expect(result.toolTrace[0]?.error).toEqual({
      code: 'PATIENT_NOT_FOUND',
      message: 'Patient 9 not found'
    });
  });

  test('unknown tool becomes an error outcome for the planner', async () => {
    const planner = new ScriptedPlanner([
      { type: 'tool_call', tool: 'drop_tables', arguments: {} },
      { type: 'final_answer', answer: 'Cannot do that' }
    ]);
    const result = await createOrchestrator(planner).run({ message: 'Drop', sessionId: 's1' });

    expect(result.status).toBe('completed');
    expect(result.toolTrace[0]?.error?.code).toBe('UNKNOWN_TOOL');
    expect(result.toolTrace[0]?.attempts).toBe(1);
  });

  test('invalid arguments are not retried', async () => {
    const planner = new ScriptedPlanner([
      { type: 'tool_call', tool: 'lookup', arguments: { patientId: 'abc' } },
      { type: 'final_answer', answer: 'Bad id' }
    ]);
    const result = await createOrchestrator(planner).run({ message: 'Lookup', sessionId: 's1' });

    expect(result.toolTrace[0]?.error?.code).toBe('INVALID_ARGUMENTS');
    expect(result.toolTrace[0]?.attempts).toBe(1);
  });

  test('transient tool failures are retried and the attempts recorded', async () => {
    const planner = new ScriptedPlanner([
      { type: 'tool_call', tool: 'flaky', arguments: {} },
      { type: 'final_answer', answer: 'Recovered' }
    ]);
    const result = await createOrchestrator(planner, {
      registry: createRegistry({ flakyFailures: 1 })
    }).run({ message: 'Try', sessionId: 's1' });

    expect(result.toolTrace[0]).toMatchObject({ tool: 'flaky', ok: true, attempts: 2 });
  });

  test('emits call and outcome events', async () => {
    const events: AgentEvent[] = [];
    const planner = new ScriptedPlanner([lookupCall, { type: 'final_answer', answer: 'Done' }]);
    await createOrchestrator(planner, { events }).run({ message: 'Go', sessionId: 's1' });

    expect(events.map((event) => event.type)).toEqual(['tool_call', 'tool_outcome']);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Plan Repair
// ═══════════════════════════════════════════════════════════════════════════════

describe('Orchestrator plan repair', () => {
  test('feeds the validation issue back on the next request', async () => {
    const events: AgentEvent[] = [];
    const planner = new ScriptedPlanner([null, { type: 'final_answer', answer: 'Fixed' }]);
    const result = await createOrchestrator(planner, { events }).run({ message: 'Hi', sessionId: 's1' });

    expect(result.status).toBe('completed');
    expect(planner.requests[0]?.repairHint).toBeUndefined();
    expect(planner.requests[1]?.repairHint).toBe('response was not a JSON object');
    expect(events).toEqual([
      { type: 'plan_rejected', issue: 'response was not a JSON object', repairs: 1 }
    ]);
  });

  test('aborts with MALFORMED_PLAN once repairs run out', async () => {
    const planner = new ScriptedPlanner([null, null, { type: 'final_answer', answer: 'Too late' }]);
    const result = await createOrchestrator(planner).run({ message: 'Hi', sessionId: 's1' });

    expect(result.status).toBe('aborted');
    expect(planner.requests).toHaveLength(2);
    if (result.status === 'aborted') {
      expect(result.reason).toBe('MALFORMED_PLAN');
      expect(result.detail).toBe('The assistant could not produce a valid plan for this request.');
      expect(result.error.message).toBe(
        'Planner produced 2 malformed plans; last issue: response was not a JSON object'
      );
    }
  });

  test('repairs are counted across the whole run', async () => {
    const planner = new ScriptedPlanner([null, lookupCall, null]);
    const result = await createOrchestrator(planner, {
      limits: { maxIterations: 5 }
    }).run({ message: 'Hi', sessionId: 's1' });

    expect(result.status).toBe('aborted');
    if (result.status === 'aborted') {
      expect(result.reason).toBe('MALFORMED_PLAN');
      expect(result.toolTrace).toHaveLength(1);
    }
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Aborts
// ═══════════════════════════════════════════════════════════════════════════════

describe('Orchestrator aborts', () => {
  test('planner failure aborts with PLANNER_FAILED', async () => {
    const planner: Planner = {
      plan: async () => {
        throw new Error('model unavailable');
      },
      finalize: async () => 'unused'
    };
    const result = await createOrchestrator(planner).run({ message: 'Hi', sessionId: 's1' });

    expect(result.status).toBe('aborted');
    if (result.status === 'aborted') {
      expect(result.reason).toBe('PLANNER_FAILED');
      expect(result.detail).toBe('The reasoning service is unavailable. Please try again later.');
      expect(result.error.message).toBe('Planner failed: model unavailable');
    }
  });

  test('a busy reasoning service is retried under the planner policy', async () => {
    let calls = 0;
    const planner: Planner = {
      plan: async () => {
        calls++;
        if (calls === 1) {
          throw new APICallError({
            message: 'Service Unavailable',
            url: 'http://llm.test/v1/chat/completions',
            requestBodyValues: {},
            statusCode: 503
          });
        }
        return { type: 'final_answer', answer: 'Recovered' };
      },
      finalize: async () => 'unused'
    };
    const result = await createOrchestrator(planner).run({ message: 'Hi', sessionId: 's1' });

    expect(calls).toBe(2);
    expect(result.status).toBe('completed');
    if (result.status === 'completed') {
      expect(result.answer).toBe('Recovered');
    }
  });

  test('request deadline aborts with DEADLINE_EXCEEDED', async () => {
    const planner: Planner = {
      plan: (_request, signal) => untilAborted(signal),
      finalize: async () => 'unused'
    };
    const result = await createOrchestrator(planner, {
      limits: { requestTimeoutMs: 30 }
    }).run({ message: 'Hi', sessionId: 's1' });

    expect(result.status).toBe('aborted');
    if (result.status === 'aborted') {
      expect(result.reason).toBe('DEADLINE_EXCEEDED');
      expect(result.error.message).toBe('Request exceeded 30ms');
    }
  });

  test('caller cancellation before start aborts with CANCELLED', async () => {
    const controller = new AbortController();
    controller.abort('client disconnected');
    const planner = new ScriptedPlanner([{ type: 'final_answer', answer: 'never' }]);

    const result = await createOrchestrator(planner).run({
      message: 'Hi',
      sessionId: 's1',
      signal: controller.signal
    });

    expect(result.status).toBe('aborted');
    expect(planner.requests).toHaveLength(0);
    if (result.status === 'aborted') {
      expect(result.reason).toBe('CANCELLED');
    }
  });
});
