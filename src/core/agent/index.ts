export { LLMPlanner, type LLMPlannerOptions } from './planner';
export { Orchestrator, type OrchestratorDeps, type RunInput } from './orchestrator';
export { type PlanParseResult, parsePlan, planSchema } from './plan';
export { buildFinalizeMessages, buildPlanMessages, formatTools } from './prompts';
export { InMemorySessionStore, type SessionStore, trimTurns } from './session-store';
export type {
  AgentEvent,
  AgentLimits,
  ConversationState,
  HistoryEntry,
  MachineState,
  OrchestrationResult,
  Plan,
  Planner,
  PlanRequest,
  ToolCall,
  ToolOutcome,
  ToolTraceEntry
} from './types';
