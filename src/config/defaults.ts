/**
 * Default configuration values.
 * All values are overridable via config file.
 */

export const TIMEOUTS = {
  STEP_TIMEOUT: 300_000,
  KILL_GRACE: 5_000,
  STEP_PAUSE: 2_000,
  VERIFY_TIMEOUT: 5_000,
  TERMINATE_GRACE: 2_000,
  // How long to wait for buffered output after the agent exits.
  OUTPUT_DRAIN: 200,
} as const;

export const LIMITS = {
  LOG_HISTORY: 100,
  SUBSCRIBER_QUEUE: 256,
  MAX_PLANNED_STEPS: 12,
  PREVIEW_CHARS: 100,
} as const;

export const PLANNER = {
  ANTHROPIC_MODEL: 'claude-sonnet-4-5-20250929',
  OPENAI_MODEL: 'gpt-4o-mini',
  // A plan is a short JSON array; this leaves room for the repair round.
  MAX_TOKENS: 2_048,
  RATE_LIMIT_ATTEMPTS: 3,
  RATE_LIMIT_BASE_DELAY: 5_000,
} as const;

export const EXECUTOR = {
  COMMAND: 'codex',
  ARGS: [
    'exec',
    '--dangerously-bypass-approvals-and-sandbox',
    '--skip-git-repo-check',
    '--json',
  ],
  // Forced over the host environment so the agent CLI never draws a TUI.
  ENV: {
    NO_COLOR: '1',
    FORCE_COLOR: '0',
    TERM: 'dumb',
  },
} as const;

export const MONITOR = {
  HOST: '127.0.0.1',
  PORT: 5555,
} as const;

export const CONFIG_FILE = '.steprelay.yaml';
export const REPORT_DIR = '.artifacts';
