/**
 * Tool Registry
 *
 * Name → descriptor map populated at startup and sealed before serving.
 * `invoke` validates the tool name and arguments before the handler runs;
 * adding a tool means registering a descriptor, never touching dispatch.
 */

import type { z } from 'zod';
import { ArgumentValidationError, ToolRegistrationError, UnknownToolError } from '../errors';
import { compileArgumentSchema, conformsTo } from './schema';
import type { ArgumentSchema, ToolContext, ToolDescriptor, ToolResult, ToolSpec } from './types';

const TOOL_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_-]{0,63}$/;

export function isValidToolName(name: string): boolean {
  return TOOL_NAME_PATTERN.test(name);
}

interface RegisteredTool {
  spec: ToolSpec;
  validator: z.ZodType<Record<string, unknown>>;
  run(args: Record<string, unknown>, context: ToolContext): Promise<ToolResult>;
}

function deepFreezeSchema(schema: ArgumentSchema): ArgumentSchema {
  for (const field of Object.values(schema)) {
    if (field.constraints) Object.freeze(field.constraints);
    Object.freeze(field);
  }
  return Object.freeze(schema);
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private sealed = false;

  /**
   * Register a tool. Names are unique; registration closes once sealed.
   *
   * @throws ToolRegistrationError
   */
  register<S extends ArgumentSchema>(descriptor: ToolDescriptor<S>): void {
    if (this.sealed) {
      throw new ToolRegistrationError(`Registry is sealed; cannot register '${descriptor.name}'`);
    }
    if (!isValidToolName(descriptor.name)) {
      throw new ToolRegistrationError(`Invalid tool name '${descriptor.name}'`);
    }
    if (this.tools.has(descriptor.name)) {
      throw new ToolRegistrationError(`Tool '${descriptor.name}' is already registered`);
    }

    const argumentSchema = descriptor.argumentSchema;
    const spec: ToolSpec = Object.freeze({
      name: descriptor.name,
      description: descriptor.description,
      argumentSchema: deepFreezeSchema(argumentSchema)
    });

    this.tools.set(descriptor.name, {
      spec,
      validator: compileArgumentSchema(argumentSchema),
      run: async (args, context) => {
        if (!conformsTo(argumentSchema, args)) {
          throw new ArgumentValidationError('(arguments)', 'does not match schema', descriptor.name);
        }
        return descriptor.handler(args, context);
      }
    });
  }

  /** Close the registry to further registration. */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolSpec | undefined {
    return this.tools.get(name)?.spec;
  }

  /** Registered tools in registration order. */
  list(): ToolSpec[] {
    return [...this.tools.values()].map((tool) => tool.spec);
  }

  /**
   * Validate and dispatch one tool call.
   *
   * @throws UnknownToolError when no tool has this name
   * @throws ArgumentValidationError naming the first offending field
   */
  async invoke(name: string, args: unknown, context: ToolContext): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name, [...this.tools.keys()]);
    }

    const parsed = tool.validator.safeParse(args ?? {});
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue && issue.path.length > 0 ? String(issue.path[0]) : '(arguments)';
      throw new ArgumentValidationError(field, issue?.message ?? 'invalid arguments', name);
    }

    return tool.run(parsed.data, context);
  }
}
