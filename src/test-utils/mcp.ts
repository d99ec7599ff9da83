// In-process MCP tool servers for tests
// Linked in-memory transports stand in for spawned worker processes

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { ZodRawShape } from 'zod';
import { CLIENT_INFO, type SessionConnection, type SessionConnector } from '../services/tools/session.js';
import type { ToolServerSpec } from '../services/tools/types.js';

export interface FakeTool {
  name: string;
  description: string;
  inputSchema: ZodRawShape;
  handler: (args: Record<string, unknown>) => string | Promise<string>;
  /** Report the handler's text as a tool-level error. */
  isError?: boolean;
}

export async function connectInMemory(serverName: string, tools: FakeTool[]): Promise<SessionConnection> {
  const server = new McpServer({ name: serverName, version: '0.0.0-test' });

  for (const tool of tools) {
    server.registerTool(
      tool.name,
      { description: tool.description, inputSchema: tool.inputSchema },
      async args => ({
        content: [{ type: 'text', text: await tool.handler(args) }],
        isError: tool.isError ?? false,
      })
    );
  }

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  const client = new Client(CLIENT_INFO);
  await client.connect(clientTransport);

  return {
    client,
    pid: null,
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}

/** A connector serving each registered server name from the given fake tool sets. */
export function inMemoryConnector(servers: Record<string, FakeTool[]>): SessionConnector {
  return async (spec: ToolServerSpec) => {
    const tools = servers[spec.name];
    if (!tools) {
      throw new Error(`spawn ${spec.command} ENOENT`);
    }
    return connectInMemory(spec.name, tools);
  };
}
