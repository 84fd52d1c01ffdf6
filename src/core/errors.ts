import type { RunReport } from '../schema/index.js';

// ── Exit codes ───────────────────────────────────────────────

export const EXIT_CODES = {
  OK: 0,
  STEP_FAILED: 1,
  PLANNER: 3,
  CONFIG: 4,
  RESOURCE: 5,
} as const;

// ── Errors ───────────────────────────────────────────────────

/** The host could not create another process (fd table full, no memory). */
export class ResourceExhaustionError extends Error {
  readonly exitCode = EXIT_CODES.RESOURCE;
  readonly code: string;
  /** Filled in by the executor: what the run produced before it failed. */
  report: RunReport | undefined;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'ResourceExhaustionError';
    this.code = code;
  }
}

/** The executor was driven out of order (run without a plan, run twice). */
export class PlanStateError extends Error {
  readonly exitCode = EXIT_CODES.CONFIG;

  constructor(message: string) {
    super(message);
    this.name = 'PlanStateError';
  }
}

/** Bad configuration or CLI usage: missing API key, malformed pid. */
export class ConfigError extends Error {
  readonly exitCode = EXIT_CODES.CONFIG;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
