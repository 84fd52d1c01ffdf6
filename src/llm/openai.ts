import { z } from 'zod';

import type { LLMClient, ProviderOptions } from './client.js';
import { RateLimitedError, retryAfterMs, withRateLimitRetry } from './retry.js';
import { PLANNER } from '../config/defaults.js';

const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .nonempty(),
});

// ── Provider factory ─────────────────────────────────────────

export function createOpenAIClient(options: ProviderOptions): LLMClient {
  const model = options.model ?? PLANNER.OPENAI_MODEL;
  const maxTokens = options.maxTokens ?? PLANNER.MAX_TOKENS;

  const complete = async (body: string): Promise<unknown> => {
    const response = await fetch(COMPLETIONS_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
      body,
    });

    if (response.status === 429) {
      throw new RateLimitedError(
        'OpenAI API rate limited',
        retryAfterMs(response.headers.get('retry-after')),
      );
    }
    if (!response.ok) {
      throw new Error(`OpenAI API error (${String(response.status)}): ${await response.text()}`);
    }
    return response.json();
  };

  return {
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const body = JSON.stringify({
        model,
        max_tokens: maxTokens,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: 0,
      });

      const raw = await withRateLimitRetry('OpenAI', () => complete(body), options.retry);
      const [choice] = chatResponseSchema.parse(raw).choices;
      if (choice.message.content === null || choice.message.content.length === 0) {
        throw new Error(
          `OpenAI API returned no plan text (finish reason: ${String(choice.finish_reason)})`,
        );
      }
      return choice.message.content;
    },
  };
}
