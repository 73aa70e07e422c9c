export { callRegistryTool, createMcpServer, type McpHandler, type McpServerDeps } from './server';
