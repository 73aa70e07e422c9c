/**
 * MCP Endpoint Handler
 *
 * Thin handler that mounts the MCP server onto the /mcp endpoint.
 * Delegates to @/mcp for server creation and tool dispatch.
 */

import type { Context } from 'hono';
import { createMcpServer, type McpHandler } from '@/mcp';
import type { ServerClients } from './clients';

/**
 * Build the /mcp handler. The MCP server is created on the first request,
 * once the registry is sealed, and reused afterwards.
 */
export function createMcpHandler(getClients: () => Promise<ServerClients>): McpHandler {
  let mcpHandler: McpHandler | null = null;

  return async (c: Context): Promise<Response> => {
    if (!mcpHandler) {
      const { registry } = await getClients();
      mcpHandler = createMcpServer({ registry });
    }
    return mcpHandler(c);
  };
}
