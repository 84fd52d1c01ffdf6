/**
 * LLM abstraction module.
 * Provider-agnostic client used by the step planner.
 * Only module allowed to make LLM API calls.
 */

import type { LLMClient, LLMConfig } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';
import { ConfigError } from '../core/errors.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createMockClient } from './mock.js';
export { RateLimitedError, withRateLimitRetry } from './retry.js';
export type { RetryPolicy } from './retry.js';
export type { MockLLMClient } from './mock.js';

// ── Provider factory ─────────────────────────────────────────

export function createLLMClient(config: LLMConfig): LLMClient {
  switch (config.provider) {
    case 'anthropic':
      if (config.apiKey === undefined) {
        throw new ConfigError('ANTHROPIC_API_KEY is required for the anthropic planner');
      }
      return createAnthropicClient({ ...config, apiKey: config.apiKey });
    case 'openai':
      if (config.apiKey === undefined) {
        throw new ConfigError('OPENAI_API_KEY is required for the openai planner');
      }
      return createOpenAIClient({ ...config, apiKey: config.apiKey });
    case 'mock':
      return createMockClient();
  }
}
