/**
 * Remote Tool Discovery
 *
 * At startup, lists the tools of each configured MCP server and turns them
 * into proxy descriptors for the Tool Registry. A server that cannot be
 * reached is skipped; the service starts with the tools it has.
 */

import { z } from 'zod';
import { describeError } from '@/core/errors';
import {
  type RandomSource,
  type RetryEvent,
  type RetryPolicy,
  withRetry
} from '@/core/resilience';
import {
  type ArgumentField,
  type ArgumentSchema,
  type ArgumentType,
  fail,
  isValidToolName,
  ok,
  type ToolDescriptor
} from '@/core/tools';
import {
  connectRemoteServer,
  type DiscoveryServer,
  type RemoteClientFactory,
  type RemoteToolClient,
  type RemoteToolInfo
} from './client';

// ═══════════════════════════════════════════════════════════════════════════════
// Schemas
// ═══════════════════════════════════════════════════════════════════════════════

const jsonSchemaPropertySchema = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
    enum: z.array(z.union([z.string(), z.number()])).optional(),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    minLength: z.number().int().optional(),
    maxLength: z.number().int().optional(),
    pattern: z.string().optional()
  })
  .passthrough();

const inputSchemaSchema = z
  .object({
    properties: z.record(jsonSchemaPropertySchema).default({}),
    required: z.array(z.string()).default([])
  })
  .passthrough();

const callResultSchema = z
  .object({
    content: z
      .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
      .default([]),
    isError: z.boolean().optional()
  })
  .passthrough();

const ARGUMENT_TYPES: ReadonlySet<string> = new Set<ArgumentType>([
  'string',
  'integer',
  'number',
  'boolean'
]);

function isArgumentType(value: string): value is ArgumentType {
  return ARGUMENT_TYPES.has(value);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Conversion
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Convert a JSON Schema object to an ArgumentSchema.
 * Returns null when a property has a type the registry cannot validate.
 */
export function toArgumentSchema(inputSchema: unknown): ArgumentSchema | null {
  const parsed = inputSchemaSchema.safeParse(inputSchema ?? {});
  if (!parsed.success) return null;

  const required = new Set(parsed.data.required);
  const schema: ArgumentSchema = {};

  for (const [name, property] of Object.entries(parsed.data.properties)) {
    const types = Array.isArray(property.type) ? property.type : [property.type ?? 'string'];
    const type = types.find((t) => t !== 'null');
    if (!type || !isArgumentType(type)) return null;

    const field: ArgumentField = { type, required: required.has(name) };
    if (property.description) field.description = property.description;

    const constraints = {
      min: property.minimum,
      max: property.maximum,
      minLength: property.minLength,
      maxLength: property.maxLength,
      pattern: property.pattern,
      enum: property.enum
    };
    if (Object.values(constraints).some((value) => value !== undefined)) {
      field.constraints = constraints;
    }
    schema[name] = field;
  }

  return schema;
}

function resultText(content: z.infer<typeof callResultSchema>['content']): string {
  return content
    .map((block) => (block.text !== undefined ? block.text : JSON.stringify(block)))
    .join('\n');
}

/**
 * Proxy descriptor named `<server>_<tool>` that forwards to the remote tool.
 */
export function createProxyDescriptor(
  server: DiscoveryServer,
  tool: RemoteToolInfo,
  argumentSchema: ArgumentSchema,
  client: RemoteToolClient
): ToolDescriptor<ArgumentSchema> {
  return {
    name: `${server.name}_${tool.name}`,
    description: tool.description ?? `Remote tool ${tool.name} on ${server.name}`,
    argumentSchema,
    async handler(args, { signal }) {
      const raw = await client.callTool(tool.name, args, signal);
      const parsed = callResultSchema.safeParse(raw);
      if (!parsed.success) {
        return fail('REMOTE_TOOL_ERROR', `${server.name}/${tool.name} returned an invalid result`);
      }

      const text = resultText(parsed.data.content);
      if (parsed.data.isError) {
        return fail('REMOTE_TOOL_ERROR', text || `${server.name}/${tool.name} failed`, {
          server: server.name,
          tool: tool.name
        });
      }
      return ok({ content: text });
    }
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Discovery
// ═══════════════════════════════════════════════════════════════════════════════

export interface DiscoveryOptions {
  policy: RetryPolicy;
  connect?: RemoteClientFactory;
  random?: RandomSource;
  onRetry?: (event: RetryEvent) => void;
  onServer?: (report: DiscoveryReport) => void;
}

export interface DiscoveryReport {
  server: string;
  tools: string[];
  skipped: string[];
  error?: string;
}

export interface DiscoveryResult {
  descriptors: ToolDescriptor<ArgumentSchema>[];
  clients: RemoteToolClient[];
  reports: DiscoveryReport[];
}

async function discoverServer(
  server: DiscoveryServer,
  options: DiscoveryOptions
): Promise<{ client: RemoteToolClient; tools: RemoteToolInfo[] }> {
  const connect = options.connect ?? connectRemoteServer;

  return withRetry(
    async ({ signal }) => {
      const client = await connect(server, signal);
      try {
        return { client, tools: await client.listTools(signal) };
      } catch (error) {
        await client.close();
        throw error;
      }
    },
    options.policy,
    {
      operationName: `discover(${server.name})`,
      random: options.random,
      onRetry: options.onRetry
    }
  );
}

export async function discoverRemoteTools(
  servers: readonly DiscoveryServer[],
  options: DiscoveryOptions
): Promise<DiscoveryResult> {
  const result: DiscoveryResult = { descriptors: [], clients: [], reports: [] };

  for (const server of servers) {
    let discovered: { client: RemoteToolClient; tools: RemoteToolInfo[] };
    try {
      discovered = await discoverServer(server, options);
    } catch (error) {
      const report: DiscoveryReport = {
        server: server.name,
        tools: [],
        skipped: [],
        error: describeError(error)
      };
      result.reports.push(report);
      options.onServer?.(report);
      continue;
    }

    const report: DiscoveryReport = { server: server.name, tools: [], skipped: [] };
    for (const tool of discovered.tools) {
      const argumentSchema = toArgumentSchema(tool.inputSchema);
      if (!argumentSchema || !isValidToolName(`${server.name}_${tool.name}`)) {
        report.skipped.push(tool.name);
        continue;
      }
      const descriptor = createProxyDescriptor(server, tool, argumentSchema, discovered.client);
      result.descriptors.push(descriptor);
      report.tools.push(descriptor.name);
    }

    result.clients.push(discovered.client);
    result.reports.push(report);
    options.onServer?.(report);
  }

  return result;
}
