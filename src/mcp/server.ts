/**
 * MCP Server
 *
 * Exposes every tool in the sealed registry over Model Context Protocol.
 * Uses stateless Streamable HTTP transport for simple request/response operations.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { WebStandardStreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/webStandardStreamableHttp.js';
import type { Context } from 'hono';
import { toErrorDetail } from '@/core/errors';
import { compileArgumentShape, type ToolRegistry, type ToolSpec } from '@/core/tools';
import { logToolCall, logToolOutcome } from '@/utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface McpServerDeps {
  registry: ToolRegistry;
}

/**
 * Handler function type returned by createMcpServer.
 */
export type McpHandler = (c: Context) => Promise<Response>;

/**
 * MCP tool result format.
 */
type McpToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

/** Session id passed to tools for calls arriving over MCP */
const MCP_SESSION_ID = 'mcp';

// ═══════════════════════════════════════════════════════════════════════════════
// Tool Handler
// ═══════════════════════════════════════════════════════════════════════════════

function textResult(value: unknown, isError = false): McpToolResult {
  const text = typeof value === 'string' ? value : JSON.stringify(value);
  return isError ? { content: [{ type: 'text', text }], isError } : { content: [{ type: 'text', text }] };
}

/**
 * Dispatch through the registry so MCP calls get the same validation as
 * agent calls. Failures become `isError` results, never protocol errors.
 */
export async function callRegistryTool(
  registry: ToolRegistry,
  name: string,
  args: Record<string, unknown>,
  signal: AbortSignal
): Promise<McpToolResult> {
  logToolCall(name, args);
  const started = Date.now();

  try {
    const result = await registry.invoke(name, args, {
      signal,
      sessionId: MCP_SESSION_ID,
      attempt: 1
    });
    const durationMs = Date.now() - started;

    if (result.ok) {
      logToolOutcome({ tool: name, arguments: args, ok: true, attempts: 1, durationMs });
      return textResult(result.data);
    }
    logToolOutcome({ tool: name, arguments: args, ok: false, attempts: 1, durationMs, error: result.error });
    return textResult(result.error, true);
  } catch (error) {
    const detail = toErrorDetail(error);
    logToolOutcome({
      tool: name,
      arguments: args,
      ok: false,
      attempts: 1,
      durationMs: Date.now() - started,
      error: detail
    });
    return textResult(detail, true);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Server Factory
// ═══════════════════════════════════════════════════════════════════════════════

function registerSpec(mcpServer: McpServer, registry: ToolRegistry, spec: ToolSpec): void {
  mcpServer.registerTool(
    spec.name,
    {
      description: spec.description,
      inputSchema: compileArgumentShape(spec.argumentSchema)
    },
    (args: Record<string, unknown>, extra) => callRegistryTool(registry, spec.name, args, extra.signal)
  );
}

/**
 * Creates the MCP server over the registry's tools.
 *
 * Stateless transport: each request is independent.
 */
export function createMcpServer(deps: McpServerDeps): McpHandler {
  const mcpServer = new McpServer({
    name: 'clinigraph',
    version: '0.1.0'
  });

  for (const spec of deps.registry.list()) {
    registerSpec(mcpServer, deps.registry, spec);
  }

  /**
   * Request handler for the /mcp endpoint.
   *
   * Supports:
   * - POST: Tool calls, initialization (Streamable HTTP)
   * - GET: Not supported in stateless mode (would be SSE for notifications)
   * - DELETE: Not supported in stateless mode (session termination)
   */
  return async function handleRequest(c: Context): Promise<Response> {
    const transport = new WebStandardStreamableHTTPServerTransport({
      sessionIdGenerator: undefined, // Stateless mode
      enableJsonResponse: true // JSON instead of SSE for simple requests
    });

    await mcpServer.connect(transport);

    try {
      return await transport.handleRequest(c.req.raw);
    } finally {
      await transport.close();
    }
  };
}
