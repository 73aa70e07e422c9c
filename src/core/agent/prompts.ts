/**
 * Planner Prompts
 *
 * The planner answers with exactly one JSON action per turn: a tool call
 * or a final answer. Tool results are fed back as JSON.
 */

import type { Message } from '@/providers/llm/types';
import type { ArgumentField, ToolSpec } from '../tools';
import type { HistoryEntry, PlanRequest } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// System Prompt
// ═══════════════════════════════════════════════════════════════════════════════

const SYSTEM_PROMPT = `# IDENTITY and PURPOSE

You are a medical assistant agent. You answer questions from clinicians and patients by calling tools that read patient records, build and query a per-patient knowledge graph, and run diabetes and cardiovascular risk models.

Take a step back and think step-by-step about which single action moves the answer forward.

# RULES

- Call at most ONE tool per turn, then wait for its result
- Use only the tools listed below, with arguments that match their schema
- Build a patient's knowledge graph (build_patient_graph) before querying it
- Graph queries are read-only Cypher; always filter on patientId
- Never invent patient data. If a tool fails, explain what failed or try another approach
- Risk model outputs are estimates, not diagnoses. Say so when you report them

# OUTPUT FORMAT

Respond with ONE JSON object and nothing else.

To call a tool:
{"type": "tool_call", "tool": "<tool name>", "arguments": {<field>: <value>}}

To answer:
{"type": "final_answer", "answer": "<answer for the user>"}

# EXAMPLES

User: What conditions does patient 7 have?
{"type": "tool_call", "tool": "get_patient_record", "arguments": {"patientId": 7}}

User: Which of patient 3's symptoms may point to their conditions?
{"type": "tool_call", "tool": "build_patient_graph", "arguments": {"patientId": 3}}
(after the build succeeds)
{"type": "tool_call", "tool": "query_knowledge_graph", "arguments": {"query": "MATCH (s:Symptom {patientId: 3})-[:MAY_INDICATE]->(c:Condition) RETURN s.key AS symptom, c.key AS condition"}}

# TOOLS

`;

const FINALIZE_PROMPT = `# IDENTITY and PURPOSE

You are a medical assistant agent. The tool budget for this request is spent. Using only the conversation and the tool results above, write the best answer you can for the user in plain text.

- Do not call tools and do not answer in JSON
- If the results are incomplete, say what is known and what is missing
- Risk model outputs are estimates, not diagnoses
`;

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting
// ═══════════════════════════════════════════════════════════════════════════════

function formatField(name: string, field: ArgumentField): string {
  const parts = [`${field.type}`, field.required ? 'required' : 'optional'];
  const c = field.constraints;
  if (c?.min !== undefined) parts.push(`min ${c.min}`);
  if (c?.max !== undefined) parts.push(`max ${c.max}`);
  if (c?.minLength !== undefined) parts.push(`minLength ${c.minLength}`);
  if (c?.maxLength !== undefined) parts.push(`maxLength ${c.maxLength}`);
  if (c?.pattern !== undefined) parts.push(`pattern /${c.pattern}/`);
  if (c?.enum !== undefined) parts.push(`one of ${c.enum.map((v) => JSON.stringify(v)).join(', ')}`);

  const description = field.description ? ` - ${field.description}` : '';
  return `  - ${name} (${parts.join(', ')})${description}`;
}

export function formatTools(tools: readonly ToolSpec[]): string {
  return tools
    .map((tool) => {
      const fields = Object.entries(tool.argumentSchema).map(([name, field]) =>
        formatField(name, field)
      );
      return [`## ${tool.name}`, tool.description, 'Arguments:', ...fields].join('\n');
    })
    .join('\n\n');
}

function historyToMessages(history: readonly HistoryEntry[]): Message[] {
  const messages: Message[] = [];
  for (const entry of history) {
    switch (entry.kind) {
      case 'user':
        messages.push({ role: 'user', content: entry.content });
        break;
      case 'assistant':
        messages.push({ role: 'assistant', content: entry.content });
        break;
      case 'tool':
        messages.push({
          role: 'assistant',
          content: JSON.stringify({
            type: 'tool_call',
            tool: entry.call.toolName,
            arguments: entry.call.arguments
          })
        });
        messages.push({
          role: 'user',
          content: `Tool result for ${entry.call.toolName}:\n${JSON.stringify(entry.outcome)}`
        });
        break;
    }
  }
  return messages;
}

/**
 * Messages for the next plan. The current user message is the last
 * user-kind entry in history.
 */
export function buildPlanMessages(request: PlanRequest): Message[] {
  const messages: Message[] = [
    { role: 'system', content: SYSTEM_PROMPT + formatTools(request.tools) },
    ...historyToMessages(request.history)
  ];

  if (request.repairHint) {
    messages.push({
      role: 'user',
      content: `Your previous response was rejected (${request.repairHint}). Respond with ONE valid JSON object as described.`
    });
  }
  return messages;
}

export function buildFinalizeMessages(request: PlanRequest): Message[] {
  return [
    { role: 'system', content: FINALIZE_PROMPT },
    ...historyToMessages(request.history),
    { role: 'user', content: `Answer my question now: ${request.message}` }
  ];
}
