import { z } from 'zod';

// ── Step ──────────────────────────────────────────────────────

export const planStepSchema = z.object({
  description: z.string().default(''),
  instruction: z.string(),
  context: z.string().optional(),
  critical: z.boolean().default(true),
});

export type PlanStep = Readonly<z.infer<typeof planStepSchema>>;

/** Input shape before defaults are applied (what plan files contain). */
export type PlanStepInput = z.input<typeof planStepSchema>;

// ── Plan ──────────────────────────────────────────────────────

export type Plan = readonly PlanStep[];

export const planListSchema = z.array(planStepSchema);

// A plan file is either a bare list of steps or a document with a task name.
export const planFileSchema = z.union([
  planListSchema.transform((steps) => ({ task: undefined, steps })),
  z.object({
    task: z.string().min(1).optional(),
    steps: planListSchema,
  }),
]);

export type PlanFile = z.infer<typeof planFileSchema>;

// ── Parsers ───────────────────────────────────────────────────

export function parsePlan(data: unknown): Plan {
  return freezePlan(planListSchema.parse(data));
}

export function parsePlanFile(data: unknown): { task: string | undefined; steps: Plan } {
  const parsed = planFileSchema.parse(data);
  return { task: parsed.task, steps: freezePlan(parsed.steps) };
}

export function freezePlan(steps: readonly PlanStep[]): Plan {
  return Object.freeze(steps.map((s) => Object.freeze({ ...s })));
}

// ── Helpers ───────────────────────────────────────────────────

export function hasInstruction(step: PlanStep): boolean {
  return step.instruction.trim().length > 0;
}
