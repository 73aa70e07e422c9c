/**
 * Chat Endpoint
 *
 * POST /chat runs one orchestrator pass per request. The session's prior
 * turns are loaded before the run and the new ones saved after a
 * completed run; aborted runs leave the session untouched.
 */

import { randomUUID } from 'node:crypto';
import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import type { OrchestrationResult } from '@/core/agent';
import { logChatResult, logChatStart } from '@/utils/logger';
import type { ServerClients } from './clients';

// ═══════════════════════════════════════════════════════════════════════════════
// Request Schema
// ═══════════════════════════════════════════════════════════════════════════════

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1, 'message must not be empty'),
  sessionId: z.string().trim().min(1).max(128).optional()
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

async function readChatRequest(c: Context): Promise<ChatRequest> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (error) {
    throw new HTTPException(400, { message: 'Request body must be JSON', cause: error });
  }

  const parsed = chatRequestSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new HTTPException(400, { message: `${field}${issue?.message ?? 'invalid request'}` });
  }
  return parsed.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Handler
// ═══════════════════════════════════════════════════════════════════════════════

/** HTTP status for a run that ended without an answer. */
export function abortStatus(result: Extract<OrchestrationResult, { status: 'aborted' }>): 502 | 504 {
  return result.reason === 'DEADLINE_EXCEEDED' ? 504 : 502;
}

export function createChatHandler(getClients: () => Promise<ServerClients>) {
  return async (c: Context): Promise<Response> => {
    const request = await readChatRequest(c);
    const sessionId = request.sessionId ?? randomUUID();
    const { agent, sessions } = await getClients();

    logChatStart(sessionId, request.message);
    const started = Date.now();

    const result = await agent.run({
      message: request.message,
      sessionId,
      history: sessions.load(sessionId),
      signal: c.req.raw.signal
    });

    logChatResult(result, Date.now() - started);

    if (result.status === 'aborted') {
      return c.json({ detail: result.detail }, abortStatus(result));
    }

    sessions.save(sessionId, result.history);
    return c.json({ response: result.answer, sessionId, toolTrace: result.toolTrace }, 200);
  };
}
