// Provider Interface
// Common interface that all chat-completion providers implement

export interface ProviderMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export type ResponseFormat = 'text' | 'json_object';

export interface ProviderOptions {
  model: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  responseFormat?: ResponseFormat; // json_object for structured tool-call synthesis
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ProviderResponse {
  content: string;
  reasoning?: string; // reasoning/thinking content (DeepSeek R1, QwQ, OpenRouter reasoning models)
  finishReason?: string;
  usage: ProviderUsage;
}

export interface Provider {
  name: string;
  defaultModel: string;
  sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse>;
}
