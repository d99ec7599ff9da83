// Message Store
// Append-only transcript; one writer (the query loop) at a time

import type { Message, ToolCall } from './types.js';

const PREVIEW_LENGTH = 50;

function cloneMessage(message: Message): Message {
  const copy: Message = { ...message };
  if (message.toolCalls) {
    copy.toolCalls = message.toolCalls.map(tc => ({ ...tc, function: { ...tc.function } }));
  }
  if (message.toolRequests) {
    copy.toolRequests = [...message.toolRequests];
  }
  return copy;
}

function freezeMessage(message: Message): Readonly<Message> {
  if (message.toolCalls) {
    for (const call of message.toolCalls) {
      Object.freeze(call.function);
      Object.freeze(call);
    }
    Object.freeze(message.toolCalls);
  }
  if (message.toolRequests) {
    Object.freeze(message.toolRequests);
  }
  return Object.freeze(message);
}

function previewContent(content: string): string {
  return content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH - 3)}...` : content;
}

export class MessageStore {
  private messages: Readonly<Message>[] = [];

  constructor(systemPrompt: string = '') {
    if (systemPrompt) {
      this.addSystem(systemPrompt);
    }
  }

  private append(message: Message): void {
    this.messages.push(freezeMessage(cloneMessage(message)));
  }

  addSystem(content: string): void {
    this.append({ role: 'system', content });
  }

  addUser(content: string): void {
    this.append({ role: 'user', content });
  }

  addAssistant(content: string, toolCalls?: ToolCall[], toolRequests?: string[]): void {
    const message: Message = { role: 'assistant', content };
    if (toolCalls && toolCalls.length > 0) {
      message.toolCalls = toolCalls;
    }
    if (toolRequests && toolRequests.length > 0) {
      message.toolRequests = toolRequests;
    }
    this.append(message);
  }

  addToolResult(toolName: string, result: string, toolCallId?: string): void {
    const message: Message = { role: 'tool_result', content: result, toolName };
    if (toolCallId) {
      message.toolCallId = toolCallId;
    }
    this.append(message);
  }

  /** Closing assistant message of a loop that ran out of iterations. */
  addFallback(content: string): void {
    this.append({ role: 'assistant', content, annotation: 'max_iterations' });
  }

  snapshot(): Message[] {
    return this.messages.map(cloneMessage);
  }

  last(): Message | undefined {
    const message = this.messages[this.messages.length - 1];
    return message ? cloneMessage(message) : undefined;
  }

  get size(): number {
    return this.messages.length;
  }

  /** Drops everything but the leading system message(s). */
  clear(): void {
    let keep = 0;
    while (keep < this.messages.length && this.messages[keep].role === 'system') {
      keep++;
    }
    this.messages = this.messages.slice(0, keep);
  }

  formatDebugOutput(label: string = 'CONVERSATION HISTORY'): string {
    const lines = [`=== ${label} ===`];

    this.messages.forEach((message, i) => {
      const content = previewContent(message.content);
      switch (message.role) {
        case 'system':
          lines.push(`[${i}] SYSTEM: ${content}`);
          break;
        case 'user':
          lines.push(`[${i}] USER: ${content}`);
          break;
        case 'assistant': {
          const requests = message.toolRequests ? ` [REQUESTS: ${message.toolRequests.length}]` : '';
          const tools = message.toolCalls ? ` [TOOLS: ${message.toolCalls.map(tc => tc.function.name).join(', ')}]` : '';
          const note = message.annotation ? ` (${message.annotation})` : '';
          lines.push(`[${i}] ASSISTANT${tools}${requests}${note}: ${content}`);
          break;
        }
        case 'tool_result':
          lines.push(`[${i}] TOOL [${message.toolName ?? 'unknown'}]: ${content}`);
          break;
      }
    });

    lines.push('='.repeat(40));
    return lines.join('\n');
  }
}
