// Agent configuration
// Resolved once by the caller and threaded through constructors; nothing reads it globally

import { z } from 'zod';
import { ConfigurationError } from './utils/errors.js';

export const PROVIDER_NAMES = ['deepseek', 'qwen', 'openai', 'openrouter'] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

const ProviderSettingsSchema = z.object({
  apiKey: z.string().default(''),
  baseUrl: z.string().optional(),
  model: z.string().optional(),
});

export const AgentConfigSchema = z.object({
  provider: z.enum(PROVIDER_NAMES).default('deepseek'),
  providers: z
    .object({
      deepseek: ProviderSettingsSchema.default({}),
      qwen: ProviderSettingsSchema.default({}),
      openai: ProviderSettingsSchema.default({}),
      openrouter: ProviderSettingsSchema.default({}),
    })
    .default({}),
  agent: z
    .object({
      maxIterations: z.number().int().positive().default(10),
      customSystemPrompt: z.string().default(''),
      temperature: z.number().min(0).max(2).optional(),
      maxTokens: z.number().int().positive().optional(),
    })
    .default({}),
  toolCalling: z
    .object({
      provider: z.enum(PROVIDER_NAMES).optional(),
      apiKey: z.string().optional(),
      baseUrl: z.string().optional(),
      model: z.string().optional(),
      maxRetries: z.number().int().positive().default(5),
    })
    .default({}),
  requestTimeoutMs: z.number().int().positive().default(60000),
  providerMaxRetries: z.number().int().min(0).default(2),
  toolCallTimeoutMs: z.number().int().positive().default(60000),
  shutdownTimeoutMs: z.number().int().positive().default(5000),
  pythonBin: z.string().default('python3'),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export function resolveConfig(input: AgentConfigInput = {}): AgentConfig {
  const parsed = AgentConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid agent configuration', parsed.error.flatten());
  }
  return deepFreeze(parsed.data);
}
