// DeepSeek Provider
// Official DeepSeek API; deepseek-reasoner returns its chain of thought in reasoning_content

import type OpenAI from 'openai';
import { OpenAICompatibleProvider, type OpenAICompatibleSettings } from './openai-compatible.js';
import type { ProviderMessage, ProviderOptions } from './types.js';

export const DEEPSEEK_BASE_URL = 'https://api.deepseek.com';

export class DeepSeekProvider extends OpenAICompatibleProvider {
  constructor(settings: Partial<OpenAICompatibleSettings> & { apiKey: string }) {
    super('deepseek', {
      baseUrl: DEEPSEEK_BASE_URL,
      defaultModel: 'deepseek-chat',
      ...settings,
    });
  }

  protected override buildRequest(
    messages: ProviderMessage[],
    options: ProviderOptions
  ): OpenAI.ChatCompletionCreateParamsNonStreaming {
    const body = super.buildRequest(messages, options);

    // The reasoner ignores sampling parameters and rejects JSON mode
    if (body.model.includes('reasoner')) {
      delete body.temperature;
      delete body.response_format;
    }

    return body;
  }
}
