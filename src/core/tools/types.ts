/**
 * Tool Types
 *
 * A tool is a named capability with a declared argument schema and a
 * handler. Handlers share one contract: validated arguments in, a result
 * or a structured failure out.
 */

import type { ErrorDetail } from '../errors';

// ============================================================
// ARGUMENT SCHEMA
// ============================================================

export type ArgumentType = 'string' | 'integer' | 'number' | 'boolean';

export interface ArgumentConstraints {
  /** Inclusive numeric bounds */
  min?: number;
  max?: number;
  /** String length bounds */
  minLength?: number;
  maxLength?: number;
  /** Regular expression source the whole string must match */
  pattern?: string;
  /** Allowed values */
  enum?: readonly (string | number)[];
}

export interface ArgumentField {
  type: ArgumentType;
  required: boolean;
  description?: string;
  constraints?: ArgumentConstraints;
}

export type ArgumentSchema = Record<string, ArgumentField>;

type FieldValue<F extends ArgumentField> = F['type'] extends 'string'
  ? string
  : F['type'] extends 'boolean'
    ? boolean
    : number;

type RequiredKeys<S extends ArgumentSchema> = {
  [K in keyof S]: S[K]['required'] extends true ? K : never;
}[keyof S];

type OptionalKeys<S extends ArgumentSchema> = Exclude<keyof S, RequiredKeys<S>>;

/**
 * Validated argument object for a schema.
 */
export type InferArguments<S extends ArgumentSchema> = {
  [K in RequiredKeys<S>]: FieldValue<S[K]>;
} & {
  [K in OptionalKeys<S>]?: FieldValue<S[K]>;
};

// ============================================================
// EXECUTION
// ============================================================

export interface ToolContext {
  /** Fires on the attempt timeout or the request deadline */
  signal: AbortSignal;
  sessionId: string;
  /** 1-based attempt number from the Resilience Manager */
  attempt: number;
}

export type ToolFailure = ErrorDetail;

export type ToolResult<T = unknown> = { ok: true; data: T } | { ok: false; error: ToolFailure };

/**
 * Everything the orchestrator (and MCP clients) see of a tool.
 */
export interface ToolSpec {
  readonly name: string;
  readonly description: string;
  readonly argumentSchema: ArgumentSchema;
}

export interface ToolDescriptor<S extends ArgumentSchema = ArgumentSchema> extends ToolSpec {
  readonly argumentSchema: S;
  handler(args: InferArguments<S>, context: ToolContext): Promise<ToolResult>;
}

/**
 * Identity helper that keeps the literal schema type, so the handler's
 * `args` are typed from it.
 */
export function defineTool<const S extends ArgumentSchema>(
  descriptor: ToolDescriptor<S>
): ToolDescriptor<S> {
  return descriptor;
}

export function ok<T>(data: T): ToolResult<T> {
  return { ok: true, data };
}

export function fail(code: string, message: string, details?: Record<string, unknown>): ToolResult<never> {
  return details ? { ok: false, error: { code, message, details } } : { ok: false, error: { code, message } };
}
