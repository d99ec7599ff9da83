import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import Fastify from 'fastify';
import { agentRoutes, type AgentHandle } from '../agent.js';
import { Agent } from '../../agent.js';
import { inMemoryConnector } from '../../test-utils/mcp.js';
import type { Provider, ProviderResponse } from '../../providers/types.js';
import { ConfigurationError } from '../../utils/errors.js';
import type { Message } from '../../services/history/types.js';
import type { FunctionTool } from '../../services/tools/types.js';

const echoTool: FunctionTool = {
  type: 'function',
  function: { name: 'echo', description: 'Echo text', parameters: { type: 'object', properties: {} } },
};

function createFakeAgent() {
  const history: Message[] = [{ role: 'system', content: 'sys' }];
  let started = false;
  return {
    start: () => {
      started = true;
    },
    getAvailableTools: vi.fn((): FunctionTool[] => {
      if (!started) throw new ConfigurationError('Orchestrator not started');
      return [echoTool];
    }),
    processQuery: vi.fn(async (query: string) => {
      history.push({ role: 'user', content: query }, { role: 'assistant', content: `echo: ${query}` });
      return `echo: ${query}`;
    }),
    getHistory: vi.fn(() => history.map(m => ({ ...m }))),
    clearHistory: vi.fn(() => {
      history.splice(1);
    }),
  } satisfies AgentHandle & { start: () => void };
}

describe.sequential('Agent Routes', () => {
  const app = Fastify();
  const agent = createFakeAgent();

  beforeAll(async () => {
    await app.register(agentRoutes, { prefix: '/v1', agent });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('answers 409 for tools before the agent has started', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/tools' });

    expect(response.statusCode).toBe(409);
    expect(JSON.parse(response.body)).toEqual({
      error: 'configuration_error',
      message: 'Orchestrator not started',
      statusCode: 409,
    });
  });

  it('lists tools once started', async () => {
    agent.start();
    const response = await app.inject({ method: 'GET', url: '/v1/tools' });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({ tools: [echoTool] });
  });

  it('runs a query', async () => {
    const response = await app.inject({ method: 'POST', url: '/v1/query', payload: { query: '  hello  ' } });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({ response: 'echo: hello' });
    expect(agent.processQuery).toHaveBeenCalledWith('hello');
  });

  it('rejects an empty query', async () => {
    const response = await app.inject({ method: 'POST', url: '/v1/query', payload: { query: '   ' } });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body)).toEqual({
      error: 'bad_request',
      message: 'Invalid request body',
      statusCode: 400,
      details: { query: ['query must not be empty'] },
    });
    expect(agent.processQuery).not.toHaveBeenCalled();
  });

  it('returns and clears the history', async () => {
    const before = await app.inject({ method: 'GET', url: '/v1/history' });
    expect(JSON.parse(before.body).messages).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'echo: hello' },
    ]);

    const cleared = await app.inject({ method: 'DELETE', url: '/v1/history' });
    expect(JSON.parse(cleared.body)).toEqual({ cleared: true });

    const after = await app.inject({ method: 'GET', url: '/v1/history' });
    expect(JSON.parse(after.body).messages).toEqual([{ role: 'system', content: 'sys' }]);
  });
});

describe('Agent Routes with a live agent', () => {
  let replies = 0;
  const provider: Provider = {
    name: 'slow',
    defaultModel: 'slow-model',
    sendChat: async (): Promise<ProviderResponse> => {
      replies++;
      const content = `answer ${replies}`;
      await new Promise(resolve => setTimeout(resolve, 20));
      return { content, usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 } };
    },
  };
  const agent = new Agent({}, { reasoningProvider: provider, toolCallingProvider: provider, connector: inMemoryConnector({}) });
  const app = Fastify();

  beforeAll(async () => {
    await app.register(agentRoutes, { prefix: '/v1', agent });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    await agent.shutdown();
  });

  it('keeps each query next to its answer when requests overlap', async () => {
    const responses = await Promise.all([
      app.inject({ method: 'POST', url: '/v1/query', payload: { query: 'A?' } }),
      app.inject({ method: 'POST', url: '/v1/query', payload: { query: 'B?' } }),
    ]);
    expect(responses.map(r => r.statusCode)).toEqual([200, 200]);

    const history = await app.inject({ method: 'GET', url: '/v1/history' });
    const messages: Array<{ role: string; content: string }> = JSON.parse(history.body).messages;
    const turns = messages.slice(1).map(m => `${m.role}:${m.content}`);

    expect(turns.filter(t => t.startsWith('assistant:'))).toEqual(['assistant:answer 1', 'assistant:answer 2']);
    expect([turns[0], turns[2]].sort()).toEqual(['user:A?', 'user:B?']);
    expect(turns[1]).toBe('assistant:answer 1');
    expect(turns[3]).toBe('assistant:answer 2');
    expect(responses.map(r => JSON.parse(r.body).response).sort()).toEqual(['answer 1', 'answer 2']);
  });
});
