import { describe, it, expect } from 'vitest';
import { MessageStore } from '../message-store.js';
import type { ToolCall } from '../types.js';

const weatherCall: ToolCall = {
  id: 'call_1234abcd',
  type: 'function',
  function: { name: 'get_forecast', arguments: '{"city":"Lisbon"}' },
};

describe('MessageStore', () => {
  it('starts with the system prompt when one is given', () => {
    const store = new MessageStore('You are helpful.');
    expect(store.snapshot()).toEqual([{ role: 'system', content: 'You are helpful.' }]);
    expect(store.size).toBe(1);
  });

  it('starts empty without a system prompt', () => {
    const store = new MessageStore();
    expect(store.snapshot()).toEqual([]);
    expect(store.last()).toBeUndefined();
  });

  it('preserves role, content and tool metadata on read-back', () => {
    const store = new MessageStore('sys');
    store.addUser('What is the weather in Lisbon?');
    store.addAssistant('Checking.', [weatherCall], ['look up the Lisbon forecast']);
    store.addToolResult('get_forecast', 'Sunny, 24C', 'call_1234abcd');

    expect(store.snapshot()).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'What is the weather in Lisbon?' },
      {
        role: 'assistant',
        content: 'Checking.',
        toolCalls: [weatherCall],
        toolRequests: ['look up the Lisbon forecast'],
      },
      { role: 'tool_result', content: 'Sunny, 24C', toolName: 'get_forecast', toolCallId: 'call_1234abcd' },
    ]);
  });

  it('omits empty tool metadata', () => {
    const store = new MessageStore();
    store.addAssistant('plain answer', [], []);
    store.addToolResult('echo', 'hi');

    expect(store.snapshot()).toEqual([
      { role: 'assistant', content: 'plain answer' },
      { role: 'tool_result', content: 'hi', toolName: 'echo' },
    ]);
  });

  it('never lets callers mutate stored messages', () => {
    const store = new MessageStore();
    const calls: ToolCall[] = [{ ...weatherCall, function: { ...weatherCall.function } }];
    store.addAssistant('Checking.', calls);

    calls[0].function.name = 'changed';
    const snapshot = store.snapshot();
    snapshot[0].content = 'edited';

    const again = store.snapshot();
    expect(again[0].content).toBe('Checking.');
    expect(again[0].toolCalls?.[0].function.name).toBe('get_forecast');
  });

  it('clear keeps the leading system messages only', () => {
    const store = new MessageStore('primary');
    store.addSystem('secondary');
    store.addUser('hi');
    store.addAssistant('hello');
    store.addSystem('late system note');

    store.clear();

    expect(store.snapshot()).toEqual([
      { role: 'system', content: 'primary' },
      { role: 'system', content: 'secondary' },
    ]);
  });

  it('clear empties a store without a system prompt', () => {
    const store = new MessageStore();
    store.addUser('hi');
    store.clear();
    expect(store.size).toBe(0);
  });

  it('annotates fallback messages', () => {
    const store = new MessageStore();
    store.addFallback('partial answer');
    expect(store.last()).toEqual({ role: 'assistant', content: 'partial answer', annotation: 'max_iterations' });
  });

  it('formats a debug dump with previews', () => {
    const store = new MessageStore('sys');
    store.addUser('x'.repeat(60));
    store.addAssistant('calling', [weatherCall], ['forecast please']);
    store.addToolResult('get_forecast', 'Sunny');

    expect(store.formatDebugOutput('DUMP').split('\n')).toEqual([
      '=== DUMP ===',
      '[0] SYSTEM: sys',
      `[1] USER: ${'x'.repeat(47)}...`,
      '[2] ASSISTANT [TOOLS: get_forecast] [REQUESTS: 1]: calling',
      '[3] TOOL [get_forecast]: Sunny',
      '='.repeat(40),
    ]);
  });
});
