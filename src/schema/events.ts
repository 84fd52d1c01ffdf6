import { z } from 'zod';

import { runStateSchema, stepOutcomeSchema, terminalRunStateSchema } from './results.js';

// ── Shared envelope ───────────────────────────────────────────
// Every event names its run so one bus can carry interleaved runs.

const envelope = {
  runId: z.string().min(1),
  timestamp: z.string().datetime(),
};

// ── Event variants ────────────────────────────────────────────

export const planSetEventSchema = z.object({
  ...envelope,
  type: z.literal('plan_set'),
  data: z.object({
    task: z.string().optional(),
    totalSteps: z.number().int().nonnegative(),
    steps: z.array(
      z.object({
        index: z.number().int().nonnegative(),
        description: z.string(),
        critical: z.boolean(),
      }),
    ),
  }),
});

export const stepStartedEventSchema = z.object({
  ...envelope,
  type: z.literal('step_started'),
  data: z.object({
    index: z.number().int().nonnegative(),
    total: z.number().int().nonnegative(),
    description: z.string(),
  }),
});

export const stepCompletedEventSchema = z.object({
  ...envelope,
  type: z.literal('step_completed'),
  data: z.object({
    index: z.number().int().nonnegative(),
    outcome: stepOutcomeSchema,
    exitCode: z.number().int().nullable(),
    durationMs: z.number().int().nonnegative(),
  }),
});

export const runCompletedEventSchema = z.object({
  ...envelope,
  type: z.literal('run_completed'),
  data: z.object({
    state: terminalRunStateSchema,
    totalSteps: z.number().int().nonnegative(),
    completedSteps: z.number().int().nonnegative(),
    successRate: z.string(),
  }),
});

export const logLevelSchema = z.enum(['info', 'success', 'warning', 'error']);

export type LogLevel = z.infer<typeof logLevelSchema>;

export const logEventSchema = z.object({
  ...envelope,
  type: z.literal('log'),
  data: z.object({
    level: logLevelSchema,
    message: z.string(),
    details: z.record(z.string(), z.unknown()).optional(),
  }),
});

// ── Union ─────────────────────────────────────────────────────

export const monitorEventSchema = z.discriminatedUnion('type', [
  planSetEventSchema,
  stepStartedEventSchema,
  stepCompletedEventSchema,
  runCompletedEventSchema,
  logEventSchema,
]);

export type MonitorEvent = z.infer<typeof monitorEventSchema>;
export type MonitorEventType = MonitorEvent['type'];

export type PlanSetEvent = z.infer<typeof planSetEventSchema>;
export type StepStartedEvent = z.infer<typeof stepStartedEventSchema>;
export type StepCompletedEvent = z.infer<typeof stepCompletedEventSchema>;
export type RunCompletedEvent = z.infer<typeof runCompletedEventSchema>;
export type LogEvent = z.infer<typeof logEventSchema>;

// ── Aggregate monitor state ───────────────────────────────────

export const monitorStateSchema = z.object({
  runId: z.string().nullable(),
  task: z.string().nullable(),
  status: runStateSchema,
  plan: z.array(z.object({ description: z.string(), critical: z.boolean() })),
  currentStep: z.number().int().nonnegative(),
  totalSteps: z.number().int().nonnegative(),
  completedSteps: z.number().int().nonnegative(),
  outcomes: z.array(stepOutcomeSchema.nullable()),
  successRate: z.string().nullable(),
  startTime: z.string().nullable(),
  endTime: z.string().nullable(),
});

export type MonitorState = z.infer<typeof monitorStateSchema>;

// ── Validators ────────────────────────────────────────────────

export function parseMonitorEvent(data: unknown): MonitorEvent {
  return monitorEventSchema.parse(data);
}

export function isLogEvent(event: MonitorEvent): event is LogEvent {
  return event.type === 'log';
}
