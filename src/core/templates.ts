import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { freezePlan, planListSchema } from '../schema/index.js';
import type { Plan } from '../schema/index.js';
import { EXIT_CODES } from './errors.js';

// ── Template file ────────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const TEMPLATES_FILE = path.join(THIS_DIR, '..', '..', 'templates', 'tasks.json');

const templateSchema = z.object({
  summary: z.string().min(1),
  steps: planListSchema.min(1),
});

const templateFileSchema = z.record(z.string().min(1), templateSchema);

export type TaskTemplate = z.infer<typeof templateSchema>;

export class UnknownTemplateError extends Error {
  readonly exitCode = EXIT_CODES.CONFIG;

  constructor(name: string, known: readonly string[]) {
    super(`Unknown task template "${name}" (available: ${known.join(', ')})`);
    this.name = 'UnknownTemplateError';
  }
}

// ── Public API ───────────────────────────────────────────────

export async function loadTemplates(
  filePath: string = TEMPLATES_FILE,
): Promise<Record<string, TaskTemplate>> {
  const raw = await readFile(filePath, 'utf-8');
  return templateFileSchema.parse(JSON.parse(raw));
}

/**
 * Instantiate a template for a concrete task. The task description is
 * carried to every step as context so the agent knows what it is building.
 */
export function planFromTemplate(template: TaskTemplate, task: string): Plan {
  const taskContext = `Task: ${task}`;
  return freezePlan(
    template.steps.map((s) => ({
      ...s,
      context: s.context !== undefined ? `${taskContext}\n${s.context}` : taskContext,
    })),
  );
}

export async function resolveTemplate(
  name: string,
  task: string,
  filePath?: string,
): Promise<Plan> {
  const templates = await loadTemplates(filePath);
  const template = templates[name];
  if (template === undefined) {
    throw new UnknownTemplateError(name, Object.keys(templates));
  }
  return planFromTemplate(template, task);
}
