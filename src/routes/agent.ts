import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { Agent } from '../agent.js';
import { AgentError, formatErrorResponse } from '../utils/errors.js';

export type AgentHandle = Pick<Agent, 'processQuery' | 'getAvailableTools' | 'getHistory' | 'clearHistory'>;

export interface AgentRoutesOptions {
  agent: AgentHandle;
}

const QuerySchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty').max(100_000),
});

function sendError(reply: FastifyReply, error: AgentError) {
  const body = formatErrorResponse(error, true);
  return reply.code(body.statusCode).send(body);
}

export const agentRoutes: FastifyPluginAsync<AgentRoutesOptions> = async (server, { agent }) => {
  // GET /v1/tools - Tools discovered on the running tool servers
  server.get('/tools', async (_request, reply) => {
    try {
      return { tools: agent.getAvailableTools() };
    } catch (error) {
      if (error instanceof AgentError) {
        return sendError(reply, error);
      }
      throw error;
    }
  });

  // POST /v1/query - Run one query through the agent loop
  server.post('/query', async (request, reply) => {
    const parsed = QuerySchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(reply, AgentError.badRequest('Invalid request body', parsed.error.flatten().fieldErrors));
    }

    const response = await agent.processQuery(parsed.data.query);
    return { response };
  });

  // GET /v1/history - Current transcript
  server.get('/history', async () => {
    return { messages: agent.getHistory() };
  });

  // DELETE /v1/history - Drop everything but the system prompt
  server.delete('/history', async () => {
    agent.clearHistory();
    return { cleared: true };
  });
};
