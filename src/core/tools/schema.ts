/**
 * Argument Schema Compilation
 *
 * Turns a declared ArgumentSchema into a zod object once, at registration.
 * Values are coerced the way a language model tends to get them wrong:
 * numeric strings become numbers, "true"/"false" become booleans, and
 * null for an optional field means absent.
 */

import { z } from 'zod';
import type { ArgumentField, ArgumentSchema, InferArguments } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Coercion
// ═══════════════════════════════════════════════════════════════════════════════

function coerceNumber(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : value;
  }
  return value;
}

function coerceBoolean(value: unknown): unknown {
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (lowered === 'true') return true;
    if (lowered === 'false') return false;
  }
  if (value === 1) return true;
  if (value === 0) return false;
  return value;
}

function coerceString(value: unknown): unknown {
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return value;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Field Compilation
// ═══════════════════════════════════════════════════════════════════════════════

function withEnum<T extends z.ZodTypeAny>(schema: T, allowed?: readonly (string | number)[]) {
  if (!allowed || allowed.length === 0) return schema;
  return schema.refine((value: unknown) => allowed.some((option) => option === value), {
    message: `must be one of: ${allowed.join(', ')}`
  });
}

function compileField(field: ArgumentField): z.ZodTypeAny {
  const constraints = field.constraints ?? {};
  let inner: z.ZodTypeAny;

  switch (field.type) {
    case 'string': {
      let schema = z.string();
      if (constraints.minLength !== undefined) schema = schema.min(constraints.minLength);
      if (constraints.maxLength !== undefined) schema = schema.max(constraints.maxLength);
      if (constraints.pattern !== undefined) schema = schema.regex(new RegExp(constraints.pattern));
      inner = z.preprocess(coerceString, withEnum(schema, constraints.enum));
      break;
    }

    case 'integer':
    case 'number': {
      let schema = field.type === 'integer' ? z.number().int() : z.number();
      if (constraints.min !== undefined) schema = schema.min(constraints.min);
      if (constraints.max !== undefined) schema = schema.max(constraints.max);
      inner = z.preprocess(coerceNumber, withEnum(schema, constraints.enum));
      break;
    }

    case 'boolean':
      inner = z.preprocess(coerceBoolean, z.boolean());
      break;

    default: {
      const _exhaustive: never = field.type;
      throw new Error(`Unknown argument type: ${String(_exhaustive)}`);
    }
  }

  if (field.description) inner = inner.describe(field.description);
  if (field.required) return inner;

  return z.preprocess((value) => (value === null ? undefined : value), inner.optional());
}

/**
 * Compile each field into a zod schema, keyed by field name.
 * Also used as the MCP input shape.
 */
export function compileArgumentShape(schema: ArgumentSchema): Record<string, z.ZodTypeAny> {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, field] of Object.entries(schema)) {
    shape[name] = compileField(field);
  }
  return shape;
}

export function compileArgumentSchema(schema: ArgumentSchema) {
  return z.object(compileArgumentShape(schema));
}

// ═══════════════════════════════════════════════════════════════════════════════
// Type Guard
// ═══════════════════════════════════════════════════════════════════════════════

function matchesType(field: ArgumentField, value: unknown): boolean {
  switch (field.type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
  }
}

/**
 * Structural check that a parsed object fits the schema's argument type.
 */
export function conformsTo<S extends ArgumentSchema>(
  schema: S,
  value: Record<string, unknown>
): value is InferArguments<S> {
  for (const [name, field] of Object.entries(schema)) {
    const fieldValue = value[name];
    if (fieldValue === undefined) {
      if (field.required) return false;
      continue;
    }
    if (!matchesType(field, fieldValue)) return false;
  }
  return true;
}
