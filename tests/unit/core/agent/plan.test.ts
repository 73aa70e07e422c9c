/**
 * Plan Validation Tests
 */

import { describe, expect, test } from 'vitest';
import { parsePlan } from '@/core/agent';

describe('parsePlan', () => {
  test('accepts a final answer', () => {
    expect(parsePlan({ type: 'final_answer', answer: 'All clear' })).toEqual({
      ok: true,
      plan: { type: 'final_answer', answer: 'All clear' }
    });
  });

  test('defaults missing tool arguments to an empty object', () => {
    expect(parsePlan({ type: 'tool_call', tool: 'predict_diabetes_risk' })).toEqual({
      ok: true,
      plan: { type: 'tool_call', tool: 'predict_diabetes_risk', arguments: {} }
    });
  });

  test('rejects missing output', () => {
    expect(parsePlan(undefined)).toEqual({ ok: false, issue: 'response was not a JSON object' });
    expect(parsePlan(null)).toEqual({ ok: false, issue: 'response was not a JSON object' });
  });

  test('rejects a blank answer naming the field', () => {
    expect(parsePlan({ type: 'final_answer', answer: '   ' })).toEqual({
      ok: false,
      issue: 'answer: String must contain at least 1 character(s)'
    });
  });

  test('rejects unknown plan types', () => {
    const result = parsePlan({ type: 'think', thought: 'hmm' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issue.startsWith('type: Invalid discriminator value')).toBe(true);
    }
  });
});
