// Provider Registry
// Builds providers from resolved configuration; one instance per agent, no module state

import type { AgentConfig, ProviderName } from '../config.js';
import { ConfigurationError } from '../utils/errors.js';
import { DeepSeekProvider, DEEPSEEK_BASE_URL } from './deepseek.js';
import { OpenRouterProvider, OPENROUTER_BASE_URL } from './openrouter.js';
import { OpenAICompatibleProvider, type ChatCompletionsClient } from './openai-compatible.js';
import type { Provider } from './types.js';

export interface ProviderPreset {
  baseUrl: string;
  model: string;
  toolCallingModel: string;
}

export const PROVIDER_PRESETS: Record<ProviderName, ProviderPreset> = {
  deepseek: { baseUrl: DEEPSEEK_BASE_URL, model: 'deepseek-chat', toolCallingModel: 'deepseek-chat' },
  qwen: {
    baseUrl: 'https://dashscope-intl.aliyuncs.com/compatible-mode/v1',
    model: 'qwen-plus',
    toolCallingModel: 'qwen-plus',
  },
  openai: { baseUrl: 'https://api.openai.com/v1', model: 'gpt-4o', toolCallingModel: 'gpt-4o-mini' },
  openrouter: { baseUrl: OPENROUTER_BASE_URL, model: 'deepseek/deepseek-r1', toolCallingModel: 'deepseek/deepseek-chat' },
};

export interface ProviderConnection {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  maxRetries?: number;
  client?: ChatCompletionsClient;
}

export function createProvider(name: ProviderName, connection: ProviderConnection): Provider {
  const preset = PROVIDER_PRESETS[name];
  const settings = {
    apiKey: connection.apiKey,
    baseUrl: connection.baseUrl || preset.baseUrl,
    defaultModel: connection.model || preset.model,
    timeoutMs: connection.timeoutMs,
    maxRetries: connection.maxRetries,
    client: connection.client,
  };

  switch (name) {
    case 'deepseek':
      return new DeepSeekProvider(settings);
    case 'openrouter':
      return new OpenRouterProvider(settings);
    case 'qwen':
    case 'openai':
      return new OpenAICompatibleProvider(name, settings);
  }
}

/** The provider and model that drive the reasoning loop. */
export function createReasoningProvider(config: AgentConfig): Provider {
  const settings = config.providers[config.provider];
  if (!settings.apiKey) {
    throw new ConfigurationError(`Provider "${config.provider}" is not configured (missing API key)`);
  }
  return createProvider(config.provider, {
    apiKey: settings.apiKey,
    baseUrl: settings.baseUrl,
    model: settings.model,
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.providerMaxRetries,
  });
}

/**
 * The provider used for tool-call synthesis. Falls back to the reasoning
 * provider's credentials when no dedicated ones are set.
 */
export function createToolCallingProvider(config: AgentConfig): Provider {
  const name = config.toolCalling.provider ?? config.provider;
  const settings = config.providers[name];
  const apiKey = config.toolCalling.apiKey || settings.apiKey;
  if (!apiKey) {
    throw new ConfigurationError(`Tool-calling provider "${name}" is not configured (missing API key)`);
  }
  return createProvider(name, {
    apiKey,
    baseUrl: config.toolCalling.baseUrl || settings.baseUrl,
    model: config.toolCalling.model || PROVIDER_PRESETS[name].toolCallingModel,
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.providerMaxRetries,
  });
}

export { OpenAICompatibleProvider, DeepSeekProvider, OpenRouterProvider };
export type { ChatCompletionsClient };
export type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';
