/**
 * Logger
 *
 * Semantic logging for agent operations:
 * - CHAT: One /chat request and its outcome
 * - TOOL: Tool calls chosen by the planner and their results
 * - GRAPH: Patient subgraph rebuilds
 * - RETRY / DISCOVER / ERROR: Resilience and startup events
 *
 * Lines start with [HH:MM:SS]; continuation lines align under the tag.
 */

import type { AgentEvent, OrchestrationResult, ToolTraceEntry } from '@/core/agent';
import { describeError } from '@/core/errors';
import type { RetryEvent } from '@/core/resilience';
import type { ReplaceResult } from '@/providers/graph';
import type { DiscoveryReport } from '@/providers/mcp';
import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting Utilities
// ═══════════════════════════════════════════════════════════════════════════════

/** Format current time as [HH:MM:SS] */
export function formatTime(now: Date = new Date()): string {
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

/** Truncate text to max length with ellipsis */
export function truncate(text: string, maxLength: number): string {
  // Collapse newlines and runs of spaces
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, maxLength - 3)}...`;
}

/** Indent string for continuation lines (matches timestamp width) */
const INDENT = '           '; // 11 chars to align with [HH:MM:SS] + space

function stamp(): string {
  return c.dim(formatTime());
}

function formatArguments(args: Record<string, unknown>): string {
  return truncate(JSON.stringify(args), 70);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Chat Logging (CHAT)
// ═══════════════════════════════════════════════════════════════════════════════

export function logChatStart(sessionId: string, message: string): void {
  const preview = truncate(message, 60);
  console.log(`${stamp()} ${c.cyan('CHAT')} ${c.dim(`[${sessionId.slice(0, 8)}]`)} "${c.white(preview)}"`);
}

/**
 * Log how a request ended: answered, or aborted with its reason.
 */
export function logChatResult(result: OrchestrationResult, durationMs: number): void {
  const timing = c.dim(`(${result.iterations} tool call${result.iterations === 1 ? '' : 's'}, ${durationMs}ms)`);

  if (result.status === 'completed') {
    console.log(`${INDENT}${c.brightGreen('✓ Answered')}: "${c.white(truncate(result.answer, 55))}" ${timing}`);
    return;
  }

  console.log(`${INDENT}${c.brightRed(`✗ ${result.reason}`)} ${c.dim(truncate(result.error.message, 70))} ${timing}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Tool Logging (TOOL)
// ═══════════════════════════════════════════════════════════════════════════════

export function logToolCall(tool: string, args: Record<string, unknown>): void {
  console.log(`${INDENT}${c.magenta('→')} ${c.white(tool)} ${c.dim(formatArguments(args))}`);
}

export function logToolOutcome(entry: ToolTraceEntry): void {
  const attempts = entry.attempts > 1 ? `, ${entry.attempts} attempts` : '';
  const timing = c.dim(`(${entry.durationMs}ms${attempts})`);

  if (entry.ok) {
    console.log(`${INDENT}  ${c.green('ok')} ${timing}`);
    return;
  }

  const reason = entry.error ? `${entry.error.code}: ${truncate(entry.error.message, 60)}` : 'failed';
  console.log(`${INDENT}  ${c.yellow('failed')} ${c.dim(reason)} ${timing}`);
}

/**
 * Route orchestrator events to the matching log line.
 */
export function logAgentEvent(event: AgentEvent): void {
  switch (event.type) {
    case 'plan_rejected':
      console.log(
        `${INDENT}${c.yellow('⊘ Plan rejected')} ${c.dim(`(${truncate(event.issue, 60)}; repair ${event.repairs})`)}`
      );
      break;

    case 'tool_call':
      logToolCall(event.tool, event.arguments);
      break;

    case 'tool_outcome':
      logToolOutcome(event.entry);
      break;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Graph Logging (GRAPH)
// ═══════════════════════════════════════════════════════════════════════════════

export function logGraphRebuild(patientId: number, result: ReplaceResult): void {
  const replaced = result.nodesDeleted > 0 ? c.dim(` (replaced ${result.nodesDeleted} nodes)`) : '';
  console.log(
    `${stamp()} ${c.blue('GRAPH')} patient ${c.white(String(patientId))}: ` +
      `${c.brightGreen(`+${result.nodesWritten}`)} nodes, ${c.brightGreen(`+${result.edgesWritten}`)} edges${replaced}`
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// Resilience and Startup Logging
// ═══════════════════════════════════════════════════════════════════════════════

export function logRetry(event: RetryEvent): void {
  console.log(
    `${stamp()} ${c.yellow('RETRY')} ${event.operationName} ` +
      `${c.dim(`attempt ${event.attempt} failed, next in ${event.delayMs}ms: ${truncate(describeError(event.error), 60)}`)}`
  );
}

export function logDiscovery(report: DiscoveryReport): void {
  if (report.error !== undefined) {
    console.log(
      `${stamp()} ${c.yellow('DISCOVER')} ${report.server} ${c.dim(`unreachable, skipped: ${truncate(report.error, 60)}`)}`
    );
    return;
  }

  const tools = report.tools.length > 0 ? report.tools.join(', ') : '(no tools)';
  console.log(`${stamp()} ${c.cyan('DISCOVER')} ${report.server} ${c.dim('→')} ${tools}`);
  if (report.skipped.length > 0) {
    console.log(`${INDENT}${c.yellow('⊘ Skipped')} ${c.dim(report.skipped.join(', '))}`);
  }
}

export function logError(context: string, error: unknown): void {
  console.error(`${stamp()} ${c.brightRed('ERROR')} ${context}: ${describeError(error)}`);
}
