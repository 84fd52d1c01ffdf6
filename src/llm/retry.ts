import { PLANNER } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Rate-limit signal ────────────────────────────────────────

/** A provider refused the request for rate; the caller may try again. */
export class RateLimitedError extends Error {
  readonly retryAfterMs: number | undefined;

  constructor(message: string, retryAfterMs?: number) {
    super(message);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

/** Parse a `retry-after` header given in seconds. */
export function retryAfterMs(header: string | null | undefined): number | undefined {
  if (header === null || header === undefined) return undefined;
  const seconds = Number.parseFloat(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

// ── Retry loop ───────────────────────────────────────────────

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: PLANNER.RATE_LIMIT_ATTEMPTS,
  baseDelayMs: PLANNER.RATE_LIMIT_BASE_DELAY,
};

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `request`, retrying only on `RateLimitedError`. The wait honours the
 * provider's retry-after and otherwise grows linearly with the attempt.
 */
export async function withRateLimitRetry<T>(
  provider: string,
  request: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<T> {
  const sleep = policy.sleep ?? wait;
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await request();
    } catch (err) {
      if (!(err instanceof RateLimitedError)) throw err;
      if (attempt >= attempts) {
        throw new RateLimitedError(
          `${provider} API: still rate limited after ${String(attempts)} attempts`,
          err.retryAfterMs,
        );
      }

      const waitMs = err.retryAfterMs ?? attempt * policy.baseDelayMs;
      log.llm(`${provider} rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await sleep(waitMs);
    }
  }
}
