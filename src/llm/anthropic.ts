import Anthropic from '@anthropic-ai/sdk';

import type { LLMClient, ProviderOptions } from './client.js';
import { RateLimitedError, retryAfterMs, withRateLimitRetry } from './retry.js';
import { PLANNER } from '../config/defaults.js';

/** Map the SDK's 429 onto the shared retry signal; anything else passes through. */
export function toRateLimited(err: unknown): unknown {
  if (err instanceof Anthropic.RateLimitError) {
    return new RateLimitedError(err.message, retryAfterMs(err.headers?.['retry-after']));
  }
  return err;
}

export function createAnthropicClient(options: ProviderOptions): LLMClient {
  const model = options.model ?? PLANNER.ANTHROPIC_MODEL;
  const maxTokens = options.maxTokens ?? PLANNER.MAX_TOKENS;
  // Retries are ours, so the SDK's own backoff stays off.
  const client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });

  return {
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const response = await withRateLimitRetry(
        'Anthropic',
        async () => {
          try {
            return await client.messages.create({
              model,
              max_tokens: maxTokens,
              system: systemPrompt,
              messages: [{ role: 'user', content: userPrompt }],
              temperature: 0,
            });
          } catch (err) {
            throw toRateLimited(err);
          }
        },
        options.retry,
      );

      const text = response.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('');
      if (text.length === 0) {
        throw new Error(`Anthropic API returned no plan text (stop reason: ${String(response.stop_reason)})`);
      }
      return text;
    },
  };
}
