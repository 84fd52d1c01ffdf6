import type { Command } from 'commander';

import { loadPlanFile } from '../config/index.js';
import { resolveTemplate } from '../core/templates.js';
import { planSteps } from '../core/planner.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { Plan } from '../schema/index.js';
import { serializePlan } from './format.js';
import {
  FLAG_SCHEMAS,
  confirm,
  executeSession,
  failWith,
  loadSessionConfig,
  parseFlag,
  withSessionOptions,
} from './session.js';
import type { SessionOptions } from './session.js';

// ── Confirmation gate ────────────────────────────────────────

async function approve(plan: Plan, opts: SessionOptions): Promise<boolean> {
  if (opts.yes) return true;
  if (!process.stdin.isTTY) {
    process.stderr.write('Refusing to run without confirmation; pass --yes\n');
    return false;
  }
  return confirm(`Run this ${String(plan.length)}-step plan? (y/n): `);
}

// ── run: plan file ───────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  withSessionOptions(
    program
      .command('run')
      .description('Execute a plan file (YAML or JSON) step by step')
      .argument('<plan>', 'Path to plan file'),
  ).action(async (planPath: string, opts: SessionOptions) => {
    try {
      const fileConfig = await loadSessionConfig(opts);
      const { task, steps } = await loadPlanFile(planPath);
      await executeSession(steps, task, opts, fileConfig);
    } catch (err) {
      failWith('Error', err);
    }
  });
}

// ── template: built-in plans ─────────────────────────────────

export function registerTemplateCommand(program: Command): void {
  withSessionOptions(
    program
      .command('template')
      .description('Run a built-in plan (project, feature, debug, refactor) for a task')
      .argument('<name>', 'Template name')
      .argument('<task...>', 'Task description')
      .option('-y, --yes', 'Skip the confirmation prompt'),
  ).action(async (name: string, taskWords: string[], opts: SessionOptions) => {
    try {
      const task = taskWords.join(' ');
      const fileConfig = await loadSessionConfig(opts);
      const plan = await resolveTemplate(name, task);
      process.stderr.write(serializePlan(plan, task) + '\n');
      if (!(await approve(plan, opts))) {
        process.stderr.write('Cancelled\n');
        return;
      }
      await executeSession(plan, task, opts, fileConfig);
    } catch (err) {
      failWith('Error', err);
    }
  });
}

// ── plan: LLM-generated plan ─────────────────────────────────

export function registerPlanCommand(program: Command): void {
  withSessionOptions(
    program
      .command('plan')
      .description('Generate a plan for a task with an LLM, then execute it')
      .argument('<task...>', 'Task description')
      .option('-y, --yes', 'Skip the confirmation prompt')
      .option('--dry-run', 'Print the generated plan and exit')
      .option('--max-steps <n>', 'Upper bound on generated steps'),
  ).action(
    async (
      taskWords: string[],
      opts: SessionOptions & { dryRun?: true; maxSteps?: string },
    ) => {
      try {
        const task = taskWords.join(' ');
        const fileConfig = await loadSessionConfig(opts);

        const llmConfig = loadLLMConfig(process.env, {
          provider: fileConfig.provider,
          model: fileConfig.model,
          maxTokens: fileConfig.maxTokens,
        });
        const client = createLLMClient(llmConfig);

        const plan = await planSteps(client, {
          task,
          workingDir: opts.cwd ?? fileConfig.executor.workingDir ?? process.cwd(),
          maxSteps: parseFlag('--max-steps', opts.maxSteps, FLAG_SCHEMAS.count),
        });

        if (opts.dryRun) {
          process.stdout.write(JSON.stringify({ task, steps: plan }, null, 2) + '\n');
          return;
        }

        process.stderr.write(serializePlan(plan, task) + '\n');
        if (!(await approve(plan, opts))) {
          process.stderr.write('Cancelled\n');
          return;
        }
        await executeSession(plan, task, opts, fileConfig);
      } catch (err) {
        failWith('Error', err);
      }
    },
  );
}
