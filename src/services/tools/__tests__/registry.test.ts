import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { SessionRegistry, toFunctionTool } from '../registry.js';
import { ToolSession } from '../session.js';
import { ConfigurationError, ToolExecutionError } from '../../../utils/errors.js';
import { connectInMemory, type FakeTool } from '../../../test-utils/mcp.js';

const weatherTools: FakeTool[] = [
  {
    name: 'get_forecast',
    description: 'Forecast for a city',
    inputSchema: { city: z.string() },
    handler: args => `Sunny in ${String(args.city)}`,
  },
  {
    name: 'get_alerts',
    description: 'Weather alerts for a state',
    inputSchema: { state: z.string() },
    handler: () => 'No active alerts',
  },
];

const fileTools: FakeTool[] = [
  {
    name: 'read_file',
    description: 'Read a file',
    inputSchema: { path: z.string() },
    handler: args => `contents of ${String(args.path)}`,
  },
  {
    name: 'get_forecast',
    description: 'A clashing forecast tool',
    inputSchema: {},
    handler: () => 'wrong session',
  },
  {
    name: 'fail_always',
    description: 'Reports an error',
    inputSchema: {},
    handler: () => 'disk on fire',
    isError: true,
  },
];

async function createSession(name: string, tools: FakeTool[]): Promise<ToolSession> {
  return new ToolSession(name, await connectInMemory(name, tools));
}

describe('Session Registry', () => {
  it('should discover tools on every session', async () => {
    const registry = new SessionRegistry({ callTimeoutMs: 5000 });
    registry.add(await createSession('weather', weatherTools));
    registry.add(await createSession('files', fileTools.slice(0, 1)));

    const discovered = await registry.discoverTools();

    expect(Array.from(discovered.keys())).toEqual(['weather', 'files']);
    expect(discovered.get('weather')?.map(t => t.name)).toEqual(['get_forecast', 'get_alerts']);
    expect(registry.getSchemas().map(t => t.name)).toEqual(['get_forecast', 'get_alerts', 'read_file']);

    await registry.closeAll(1000);
  });

  it('should expose schemas in the model-facing function format', async () => {
    const registry = new SessionRegistry({ callTimeoutMs: 5000 });
    registry.add(await createSession('weather', weatherTools.slice(0, 1)));
    await registry.discoverTools();

    const [tool] = registry.toFunctionTools();
    expect(tool.type).toBe('function');
    expect(tool.function.name).toBe('get_forecast');
    expect(tool.function.description).toBe('Forecast for a city');
    expect(tool.function.parameters).toMatchObject({
      type: 'object',
      properties: { city: { type: 'string' } },
      required: ['city'],
    });

    await registry.closeAll(1000);
  });

  it('should give a duplicated tool name to the first session that exposed it', async () => {
    const registry = new SessionRegistry({ callTimeoutMs: 5000 });
    registry.add(await createSession('weather', weatherTools));
    registry.add(await createSession('files', fileTools));
    await registry.discoverTools();

    expect(registry.resolve('get_forecast')?.name).toBe('weather');
    expect(registry.getSchemas().filter(t => t.name === 'get_forecast')).toHaveLength(1);
    await expect(registry.call('get_forecast', { city: 'Lisbon' })).resolves.toBe('Sunny in Lisbon');

    await registry.closeAll(1000);
  });

  it('should skip a session whose discovery fails', async () => {
    const registry = new SessionRegistry({ callTimeoutMs: 5000 });
    const broken = await connectInMemory('broken', weatherTools);
    await broken.close();

    registry.add(new ToolSession('broken', broken));
    registry.add(await createSession('files', fileTools.slice(0, 1)));

    const discovered = await registry.discoverTools();

    expect(discovered.has('broken')).toBe(false);
    expect(registry.getSchemas().map(t => t.name)).toEqual(['read_file']);

    await registry.closeAll(1000);
  });

  it('should reject a second session with the same name', async () => {
    const registry = new SessionRegistry({ callTimeoutMs: 5000 });
    registry.add(await createSession('weather', weatherTools));

    const duplicate = await createSession('weather', weatherTools);
    expect(() => registry.add(duplicate)).toThrow(ConfigurationError);

    await duplicate.close(1000);
    await registry.closeAll(1000);
  });

  it('should raise ToolExecutionError for unknown tools and error results', async () => {
    const registry = new SessionRegistry({ callTimeoutMs: 5000 });
    registry.add(await createSession('files', fileTools));
    await registry.discoverTools();

    await expect(registry.call('missing_tool', {})).rejects.toThrow('Unknown tool: missing_tool');
    await expect(registry.call('fail_always', {})).rejects.toBeInstanceOf(ToolExecutionError);
    await expect(registry.call('fail_always', {})).rejects.toThrow('disk on fire');

    await registry.closeAll(1000);
  });

  it('should be empty after closeAll', async () => {
    const registry = new SessionRegistry({ callTimeoutMs: 5000 });
    registry.add(await createSession('weather', weatherTools));
    await registry.discoverTools();

    const failures = await registry.closeAll(1000);

    expect(failures).toEqual([]);
    expect(registry.size).toBe(0);
    expect(registry.getSchemas()).toEqual([]);
    expect(registry.resolve('get_forecast')).toBeUndefined();
  });

  it('toFunctionTool wraps a schema', () => {
    const parameters = { type: 'object' as const, properties: {} };
    expect(toFunctionTool({ name: 'noop', description: 'Does nothing', parameters })).toEqual({
      type: 'function',
      function: { name: 'noop', description: 'Does nothing', parameters },
    });
  });
});
