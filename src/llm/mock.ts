import type { LLMClient } from './client.js';

const DEFAULT_RESPONSE = JSON.stringify([
  { description: 'Mock step', instruction: 'echo mock', critical: true },
]);

export interface MockLLMClient extends LLMClient {
  /** Every prompt pair received, in call order. */
  readonly calls: ReadonlyArray<{ systemPrompt: string; userPrompt: string }>;
}

/**
 * Offline provider for `LLM_PROVIDER=mock` and tests.
 * Answers with the canned responses in order, then a one-step plan.
 */
export function createMockClient(
  responses: readonly string[] = [],
): MockLLMClient {
  const calls: Array<{ systemPrompt: string; userPrompt: string }> = [];

  return {
    calls,
    generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const response = responses[calls.length] ?? DEFAULT_RESPONSE;
      calls.push({ systemPrompt, userPrompt });
      return Promise.resolve(response);
    },
  };
}
