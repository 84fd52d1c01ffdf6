import { z } from 'zod';

// ── StepOutcome ───────────────────────────────────────────────

export const stepOutcomeSchema = z.enum([
  'success',
  'failure',
  'timeout',
  'spawn_error',
  'cancelled',
]);

export type StepOutcome = z.infer<typeof stepOutcomeSchema>;

export function isSuccess(outcome: StepOutcome): boolean {
  return outcome === 'success';
}

// ── ExecutionResult ───────────────────────────────────────────

export const executionResultSchema = z.object({
  stepIndex: z.number().int().nonnegative(),
  instruction: z.string(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  stdout: z.string().nullable(),
  stderr: z.string().nullable(),
  exitCode: z.number().int().nullable(),
  signal: z.string().nullable(),
  outcome: stepOutcomeSchema,
  error: z.string().optional(),
});

export type ExecutionResult = Readonly<z.infer<typeof executionResultSchema>>;

// ── SkippedStep ───────────────────────────────────────────────

export const skippedStepSchema = z.object({
  stepIndex: z.number().int().nonnegative(),
  description: z.string(),
  reason: z.string().min(1),
});

export type SkippedStep = Readonly<z.infer<typeof skippedStepSchema>>;

// ── Run state ─────────────────────────────────────────────────
// idle → planning → running → completed | stopped | cancelled | failed

export const runStateSchema = z.enum([
  'idle',
  'planning',
  'running',
  'completed',
  'stopped',
  'cancelled',
  'failed',
]);

export type RunState = z.infer<typeof runStateSchema>;

export const terminalRunStateSchema = runStateSchema.extract([
  'completed',
  'stopped',
  'cancelled',
  'failed',
]);

export type TerminalRunState = z.infer<typeof terminalRunStateSchema>;

export function isTerminalState(state: RunState): state is TerminalRunState {
  return terminalRunStateSchema.safeParse(state).success;
}

// ── RunReport ─────────────────────────────────────────────────

export const runReportSchema = z.object({
  runId: z.string().min(1),
  state: terminalRunStateSchema,
  totalSteps: z.number().int().nonnegative(),
  completedSteps: z.number().int().nonnegative(),
  successRate: z.number().min(0).max(1),
  successRateText: z.string().regex(/^\d+\.\d%$/),
  results: z.array(executionResultSchema),
  skipped: z.array(skippedStepSchema),
  generatedAt: z.string().datetime(),
});

export type RunReport = Readonly<z.infer<typeof runReportSchema>>;

export function parseRunReport(data: unknown): RunReport {
  return runReportSchema.parse(data);
}
