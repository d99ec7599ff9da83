// Scripted chat providers for tests

import { vi } from 'vitest';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from '../providers/types.js';

export type ScriptedReply = string | Error;

const usage = { promptTokens: 1, completionTokens: 1, totalTokens: 2 };

/** Replies are served in order; the last one repeats once the script runs out. */
export function createScriptedProvider(replies: ScriptedReply[], name: string = 'scripted') {
  const queue = [...replies];
  const sendChat = vi.fn(async (_messages: ProviderMessage[], _options: ProviderOptions): Promise<ProviderResponse> => {
    const reply = (queue.length > 1 ? queue.shift() : queue[0]) ?? '';
    if (reply instanceof Error) throw reply;
    return { content: reply, finishReason: 'stop', usage };
  });
  const provider: Provider = { name, defaultModel: `${name}-model`, sendChat };
  return { provider, sendChat };
}

export function toolRequest(...instructions: string[]): string {
  return instructions.map(text => `TOOL_INSTRUCTION\n${text}\nEND_INSTRUCTION`).join('\n');
}

export function toolCallsJson(...calls: Array<{ name: string; args: Record<string, unknown> }>): string {
  return JSON.stringify({
    tool_calls: calls.map(call => ({ function: { name: call.name, arguments: JSON.stringify(call.args) } })),
  });
}
