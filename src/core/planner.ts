import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import type { LLMClient } from '../llm/index.js';
import type { Plan } from '../schema/index.js';
import { freezePlan, planStepSchema } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import { EXIT_CODES } from './errors.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface PlannerInput {
  task: string;
  workingDir: string;
  maxSteps?: number | undefined;
}

// ── Error ────────────────────────────────────────────────────

export class PlannerError extends Error {
  readonly exitCode = EXIT_CODES.PLANNER;

  constructor(message: string) {
    super(message);
    this.name = 'PlannerError';
  }
}

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

// Planned steps must carry an instruction; hand-written plans may not.
const plannedStepListSchema = z
  .array(planStepSchema.extend({ instruction: z.string().trim().min(1) }))
  .min(1);

// ── Pre-validation fixups ────────────────────────────────────
// Models sometimes answer with `{ "steps": [...] }` or string booleans.

function fixupRawSteps(parsed: unknown): unknown {
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    const steps: unknown = Reflect.get(parsed, 'steps');
    if (Array.isArray(steps)) parsed = steps;
  }
  if (!Array.isArray(parsed)) return parsed;

  return parsed.map((step: unknown) => {
    if (typeof step !== 'object' || step === null) return step;
    const s: Record<string, unknown> = { ...step };

    const critical = s['critical'];
    if (typeof critical === 'string') {
      s['critical'] = critical.toLowerCase() !== 'false';
    }
    const instruction = s['instruction'];
    if (!s['description'] && typeof instruction === 'string') {
      s['description'] = instruction.slice(0, 60);
    }
    if (s['context'] === null) delete s['context'];

    return s;
  });
}

// ── Main entry ───────────────────────────────────────────────

export async function planSteps(
  client: LLMClient,
  input: PlannerInput,
): Promise<Plan> {
  log.llm('Planner generating steps...');
  const maxSteps = input.maxSteps ?? LIMITS.MAX_PLANNED_STEPS;
  const systemPrompt = await buildSystemPrompt(input, maxSteps);

  const raw = await client.generate(systemPrompt, input.task);

  const firstAttempt = tryParse(raw, maxSteps);
  if (firstAttempt.ok) {
    logPlannedSteps(firstAttempt.steps);
    return firstAttempt.steps;
  }

  // Repair: one retry with the repair prompt
  log.warn(`Planner parse failed, attempting repair: ${firstAttempt.error}`);
  const repairPrompt = await buildRepairPrompt(raw, firstAttempt.error);
  const repaired = await client.generate(systemPrompt, repairPrompt);

  const secondAttempt = tryParse(repaired, maxSteps);
  if (secondAttempt.ok) {
    logPlannedSteps(secondAttempt.steps);
    return secondAttempt.steps;
  }

  throw new PlannerError(
    `Planner failed after repair attempt: ${secondAttempt.error}`,
  );
}

function logPlannedSteps(steps: Plan): void {
  log.llm(`Planner: generated ${String(steps.length)} steps`);
  steps.forEach((s, i) => {
    log.detail(`${String(i + 1)}. ${s.description}`);
  });
}

// ── Template rendering ───────────────────────────────────────

async function buildSystemPrompt(input: PlannerInput, maxSteps: number): Promise<string> {
  const template = await readFile(
    path.join(PROMPTS_DIR, 'planner.txt'),
    'utf-8',
  );

  return template
    .replace('{{workingDir}}', input.workingDir)
    .replace('{{task}}', input.task)
    .replace('{{maxSteps}}', String(maxSteps));
}

async function buildRepairPrompt(
  previousOutput: string,
  error: string,
): Promise<string> {
  const template = await readFile(
    path.join(PROMPTS_DIR, 'planner_repair.txt'),
    'utf-8',
  );

  return template
    .replace('{{error}}', error)
    .replace('{{previousOutput}}', previousOutput);
}

// ── JSON extraction + validation ─────────────────────────────

type ParseResult =
  | { ok: true; steps: Plan }
  | { ok: false; error: string };

function tryParse(raw: string, maxSteps: number): ParseResult {
  const json = extractJSON(raw);

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: `Invalid JSON: ${message}` };
  }

  const result = plannedStepListSchema.safeParse(fixupRawSteps(parsed));
  if (!result.success) {
    return { ok: false, error: result.error.message };
  }

  if (result.data.length > maxSteps) {
    return {
      ok: false,
      error: `Too many steps: ${String(result.data.length)} (max ${String(maxSteps)})`,
    };
  }

  return { ok: true, steps: freezePlan(result.data) };
}

export function extractJSON(raw: string): string {
  // Strip markdown fences if present
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  // Find outermost array brackets
  const start = raw.indexOf('[');
  const end = raw.lastIndexOf(']');
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}
