/**
 * Remote MCP Client
 *
 * Connects to a remote MCP server over Streamable HTTP and exposes the
 * two calls discovery needs.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';

export interface DiscoveryServer {
  name: string;
  url: string;
}

export interface RemoteToolInfo {
  name: string;
  description?: string;
  inputSchema: unknown;
}

export interface RemoteToolClient {
  listTools(signal?: AbortSignal): Promise<RemoteToolInfo[]>;
  /** Raw call result; validated by the caller */
  callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>;
  close(): Promise<void>;
}

export type RemoteClientFactory = (
  server: DiscoveryServer,
  signal?: AbortSignal
) => Promise<RemoteToolClient>;

/**
 * Default factory: one SDK client per server.
 */
export const connectRemoteServer: RemoteClientFactory = async (server, signal) => {
  const client = new Client({ name: `clinigraph-${server.name}`, version: '0.1.0' });
  const transport = new StreamableHTTPClientTransport(new URL(server.url));
  await client.connect(transport, { signal });

  return {
    async listTools(listSignal) {
      const response = await client.listTools(undefined, { signal: listSignal });
      return response.tools;
    },
    async callTool(name, args, callSignal) {
      return client.callTool({ name, arguments: args }, undefined, { signal: callSignal });
    },
    close: () => client.close()
  };
};
