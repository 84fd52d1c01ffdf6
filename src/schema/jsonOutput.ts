import { z } from 'zod';

import { stepOutcomeSchema, terminalRunStateSchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Step output ─────────────────────────────────────────────

export const jsonOutputResultSchema = z.object({
  outcome: stepOutcomeSchema,
  success: z.boolean(),
  exit_code: z.number().int().nullable(),
  signal: z.string().nullable(),
  stdout: z.string().nullable(),
  stderr: z.string().nullable(),
  started_at: z.string(),
  finished_at: z.string(),
  duration_ms: z.number().int().nonnegative(),
  error: z.string().nullable(),
});

export type JsonOutputResult = z.infer<typeof jsonOutputResultSchema>;

export const jsonOutputStepSchema = z.object({
  step: z.number().int().positive(),
  description: z.string(),
  instruction: z.string(),
  result: jsonOutputResultSchema,
});

export type JsonOutputStep = z.infer<typeof jsonOutputStepSchema>;

// ── Skipped output ──────────────────────────────────────────

export const jsonOutputSkippedSchema = z.object({
  step: z.number().int().positive(),
  description: z.string(),
  reason: z.string(),
});

export type JsonOutputSkipped = z.infer<typeof jsonOutputSkippedSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  summary: z.object({
    run_id: z.string().min(1),
    state: terminalRunStateSchema,
    total_steps: z.number().int().nonnegative(),
    completed_steps: z.number().int().nonnegative(),
    success_rate: z.string(),
    generated_at: z.string(),
  }),
  steps: z.array(jsonOutputStepSchema),
  skipped: z.array(jsonOutputSkippedSchema),
  exitCode: z.number().int().nonnegative(),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
