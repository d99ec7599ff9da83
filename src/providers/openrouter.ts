// OpenRouter Provider
// Routes to many upstream models; reasoning models report their thinking in `reasoning`

import { OpenAICompatibleProvider, type OpenAICompatibleSettings } from './openai-compatible.js';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export class OpenRouterProvider extends OpenAICompatibleProvider {
  constructor(settings: Partial<OpenAICompatibleSettings> & { apiKey: string; appTitle?: string }) {
    const { appTitle, ...rest } = settings;
    super('openrouter', {
      baseUrl: OPENROUTER_BASE_URL,
      defaultModel: 'deepseek/deepseek-r1',
      defaultHeaders: { 'X-Title': appTitle ?? 'relay-agent' },
      ...rest,
    });
  }
}
