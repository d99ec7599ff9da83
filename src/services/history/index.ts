// History Module - Main exports

export { MessageStore } from './message-store.js';
export type { Message, MessageRole, MessageAnnotation, ToolCall } from './types.js';
