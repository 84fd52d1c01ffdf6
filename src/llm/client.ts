import { z } from 'zod';

import type { RetryPolicy } from './retry.js';

// ── LLMClient interface ──────────────────────────────────────

export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  maxTokens: z.number().int().positive().optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

/** What a remote provider factory needs; unset fields take `PLANNER` defaults. */
export interface ProviderOptions {
  apiKey: string;
  model?: string | undefined;
  maxTokens?: number | undefined;
  retry?: RetryPolicy | undefined;
}

// ── Env loader ───────────────────────────────────────────────

/**
 * Resolve the planner's provider settings. Values from the config file
 * win over the environment; the API key always comes from the environment
 * variable of the resolved provider.
 */
export function loadLLMConfig(
  env: NodeJS.ProcessEnv = process.env,
  fromFile: {
    provider?: LLMProvider | undefined;
    model?: string | undefined;
    maxTokens?: number | undefined;
  } = {},
): LLMConfig {
  const provider = fromFile.provider ?? env['LLM_PROVIDER'] ?? 'anthropic';

  const apiKey = provider === 'openai'
    ? env['OPENAI_API_KEY']
    : env['ANTHROPIC_API_KEY'];

  const model = fromFile.model ?? (provider === 'openai'
    ? env['LLM_MODEL']
    : env['STEPRELAY_MODEL']);

  return llmConfigSchema.parse({
    provider,
    apiKey: apiKey || undefined,
    model: model || undefined,
    maxTokens: fromFile.maxTokens,
  });
}
