/**
 * Server Module
 *
 * Creates and configures the Hono application.
 * Composition root that wires together all endpoints.
 */

import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logError } from '@/utils/logger';
import { createChatHandler } from './chat';
import { getClients, type ServerClients } from './clients';
import { createHealthHandler } from './health';
import { createMcpHandler } from './mcp';

export interface AppOptions {
  /** Shared clients; defaults to the lazily initialized process clients */
  getClients?: () => Promise<ServerClients>;
}

export function createApp(options: AppOptions = {}): Hono {
  const resolveClients = options.getClients ?? getClients;
  const app = new Hono();

  // Medical agent conversation
  app.post('/chat', createChatHandler(resolveClients));

  // Dependency health (always 200)
  app.get('/health', createHealthHandler(resolveClients));

  // Registry tools via Model Context Protocol
  app.all('/mcp', createMcpHandler(resolveClients));

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return c.json({ detail: error.message }, error.status);
    }
    logError(`${c.req.method} ${c.req.path}`, error);
    return c.json({ detail: 'Internal server error' }, 500);
  });

  return app;
}

export const app = createApp();
