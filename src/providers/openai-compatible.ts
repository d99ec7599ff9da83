// OpenAI-compatible Provider
// DeepSeek, Qwen (DashScope compatible mode), OpenAI and OpenRouter all speak this API

import OpenAI from 'openai';
import { ConfigurationError, ModelError } from '../utils/errors.js';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';

/** The slice of the OpenAI client this provider uses; tests hand in a fake. */
export interface ChatCompletionsClient {
  create(
    body: OpenAI.ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal; timeout?: number }
  ): Promise<OpenAI.ChatCompletion>;
}

export interface OpenAICompatibleSettings {
  apiKey: string;
  baseUrl: string;
  defaultModel: string;
  timeoutMs?: number;
  maxRetries?: number;
  defaultHeaders?: Record<string, string>;
  client?: ChatCompletionsClient;
}

function toMessageParam(message: ProviderMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

// Reasoning models put their chain of thought in a non-standard field
function readReasoning(message: OpenAI.ChatCompletionMessage): string | undefined {
  if ('reasoning_content' in message && typeof message.reasoning_content === 'string') {
    return message.reasoning_content;
  }
  if ('reasoning' in message && typeof message.reasoning === 'string') {
    return message.reasoning;
  }
  return undefined;
}

export class OpenAICompatibleProvider implements Provider {
  name: string;
  defaultModel: string;
  protected completions: ChatCompletionsClient;

  constructor(name: string, settings: OpenAICompatibleSettings) {
    this.name = name;
    this.defaultModel = settings.defaultModel;

    if (settings.client) {
      this.completions = settings.client;
      return;
    }

    if (!settings.apiKey) {
      throw new ConfigurationError(`API key for provider "${name}" is not configured`);
    }

    const client = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseUrl,
      timeout: settings.timeoutMs,
      maxRetries: settings.maxRetries,
      defaultHeaders: settings.defaultHeaders,
    });
    this.completions = client.chat.completions;
  }

  protected buildRequest(
    messages: ProviderMessage[],
    options: ProviderOptions
  ): OpenAI.ChatCompletionCreateParamsNonStreaming {
    const body: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: options.model || this.defaultModel,
      messages: messages.map(toMessageParam),
      stream: false,
    };

    if (options.maxTokens !== undefined) {
      body.max_tokens = options.maxTokens;
    }
    if (options.temperature !== undefined) {
      body.temperature = options.temperature;
    }
    if (options.responseFormat === 'json_object') {
      body.response_format = { type: 'json_object' };
    }

    return body;
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const body = this.buildRequest(messages, options);
    const completion = await this.completions.create(body, { signal: options.signal });

    const choice = completion.choices[0];
    if (!choice) {
      throw new ModelError(`${this.name} returned no choices`, { model: body.model });
    }

    const response: ProviderResponse = {
      content: choice.message.content ?? '',
      finishReason: choice.finish_reason,
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      },
    };

    const reasoning = readReasoning(choice.message);
    if (reasoning) {
      response.reasoning = reasoning;
    }

    return response;
  }
}
