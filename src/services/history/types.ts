// Conversation transcript types

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool_result';

export interface ToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string; // serialized JSON object
  };
}

export type MessageAnnotation = 'max_iterations';

export interface Message {
  role: MessageRole;
  content: string;
  toolCalls?: ToolCall[];
  toolRequests?: string[]; // raw, pre-synthesis requests carried by an assistant turn
  toolCallId?: string;
  toolName?: string;
  annotation?: MessageAnnotation;
}
