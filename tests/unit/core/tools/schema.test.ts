/**
 * Argument Schema Compilation Tests
 */

import { describe, expect, test } from 'vitest';
import { compileArgumentSchema, conformsTo } from '@/core/tools';

describe('compileArgumentSchema', () => {
  test('enforces enum constraints', () => {
    const schema = compileArgumentSchema({
      gender: { type: 'string', required: true, constraints: { enum: ['Female', 'Male', 'Other'] } }
    });

    expect(schema.safeParse({ gender: 'Female' }).success).toBe(true);
    expect(schema.safeParse({ gender: 'female' }).success).toBe(false);
  });

  test('enforces string patterns', () => {
    const schema = compileArgumentSchema({
      code: { type: 'string', required: true, constraints: { pattern: '^[A-Z]{3}$' } }
    });

    expect(schema.safeParse({ code: 'ABC' }).success).toBe(true);
    expect(schema.safeParse({ code: 'abc' }).success).toBe(false);
  });

  test('turns numbers into strings for string fields', () => {
    const schema = compileArgumentSchema({ label: { type: 'string', required: true } });
    const result = schema.safeParse({ label: 42 });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ label: '42' });
    }
  });

  test('leaves non-numeric strings for number fields to fail', () => {
    const schema = compileArgumentSchema({ bmi: { type: 'number', required: true } });
    expect(schema.safeParse({ bmi: 'heavy' }).success).toBe(false);
  });

  test('maps 1 and 0 to booleans', () => {
    const schema = compileArgumentSchema({ flag: { type: 'boolean', required: true } });
    const result = schema.safeParse({ flag: 0 });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ flag: false });
    }
  });
});

describe('conformsTo', () => {
  const schema = {
    patientId: { type: 'integer', required: true },
    note: { type: 'string', required: false }
  } as const;

  test('accepts matching values and absent optional fields', () => {
    expect(conformsTo(schema, { patientId: 4 })).toBe(true);
  });

  test('rejects wrong types and missing required fields', () => {
    expect(conformsTo(schema, { patientId: '4' })).toBe(false);
    expect(conformsTo(schema, { note: 'x' })).toBe(false);
  });
});
