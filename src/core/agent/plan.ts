/**
 * Plan validation
 */

import { z } from 'zod';
import type { Plan } from './types';

export const planSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('final_answer'),
    answer: z.string().trim().min(1)
  }),
  z.object({
    type: z.literal('tool_call'),
    tool: z.string().trim().min(1),
    arguments: z.record(z.unknown()).default({})
  })
]);

export type PlanParseResult = { ok: true; plan: Plan } | { ok: false; issue: string };

/**
 * Validate a raw plan. The issue text is fed back to the planner on repair.
 */
export function parsePlan(raw: unknown): PlanParseResult {
  if (raw === undefined || raw === null) {
    return { ok: false, issue: 'response was not a JSON object' };
  }

  const parsed = planSchema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, plan: parsed.data };
  }

  const issue = parsed.error.issues[0];
  const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return { ok: false, issue: `${path}${issue?.message ?? 'invalid plan'}` };
}
