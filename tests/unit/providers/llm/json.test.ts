/**
 * Model JSON Extraction Tests
 */

import { describe, expect, test } from 'vitest';
import { extractJSON, parseModelJSON } from '@/providers/llm/json';

describe('extractJSON', () => {
  test('reads fenced blocks with or without a language tag', () => {
    expect(extractJSON('Here:\n```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    expect(extractJSON('```\n{"b": 2}\n```')).toBe('{"b": 2}');
  });

  test('takes the first balanced object from prose', () => {
    expect(extractJSON('Sure! {"type": "final_answer", "answer": "ok"} Anything else?')).toBe(
      '{"type": "final_answer", "answer": "ok"}'
    );
  });

  test('ignores braces inside strings', () => {
    expect(extractJSON('{"answer": "use } and { freely", "n": {"x": 1}} trailing')).toBe(
      '{"answer": "use } and { freely", "n": {"x": 1}}'
    );
  });

  test('handles escaped quotes', () => {
    expect(extractJSON('{"answer": "say \\"hi\\" }"}')).toBe('{"answer": "say \\"hi\\" }"}');
  });

  test('returns trimmed text when there is no object', () => {
    expect(extractJSON('  just words  ')).toBe('just words');
  });
});

describe('parseModelJSON', () => {
  test('parses embedded JSON', () => {
    expect(parseModelJSON('Plan: {"type": "tool_call", "tool": "x"}')).toEqual({
      type: 'tool_call',
      tool: 'x'
    });
  });

  test('returns undefined for unparseable text', () => {
    expect(parseModelJSON('I think the patient is fine.')).toBeUndefined();
    expect(parseModelJSON('{"unterminated": ')).toBeUndefined();
  });
});
