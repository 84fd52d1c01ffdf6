import { z } from 'zod';

// ── Executor block ──────────────────────────────────────────

export const executorConfigSchema = z.object({
  command: z.string().min(1).optional(),
  args: z.array(z.string()).optional(),
  workingDir: z.string().min(1).optional(),
  timeout: z.number().positive().optional(),
  killGrace: z.number().nonnegative().optional(),
  env: z.record(z.string(), z.string()).optional(),
});

export type ExecutorConfig = z.infer<typeof executorConfigSchema>;

// ── Monitor block ───────────────────────────────────────────

export const monitorConfigSchema = z.object({
  host: z.string().min(1).optional(),
  port: z.number().int().min(0).max(65_535).optional(),
  historySize: z.number().int().positive().optional(),
  queueSize: z.number().int().positive().optional(),
});

export type MonitorConfig = z.infer<typeof monitorConfigSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  executor: executorConfigSchema.optional().default({}),
  monitor: monitorConfigSchema.optional().default({}),
  stepPause: z.number().nonnegative().optional(),
  reportPath: z.string().min(1).optional(),
  provider: z.enum(['anthropic', 'openai', 'mock']).optional(),
  model: z.string().min(1).optional(),
  maxTokens: z.number().int().positive().optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
