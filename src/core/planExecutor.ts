import { randomUUID } from 'node:crypto';

import type {
  ExecutionResult,
  Plan,
  PlanStep,
  RunReport,
  RunState,
  SkippedStep,
  TerminalRunState,
} from '../schema/index.js';
import { freezePlan, hasInstruction, isSuccess } from '../schema/index.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import type { InstructionRunner } from '../runner/processRunner.js';
import { buildReport } from '../report/reportBuilder.js';
import { PlanStateError, ResourceExhaustionError, errorMessage } from './errors.js';
import * as log from '../utils/logger.js';

// ── Hooks ────────────────────────────────────────────────────

export interface PlanSetInfo {
  runId: string;
  task: string | undefined;
  plan: Plan;
}

export interface StepInfo {
  runId: string;
  index: number;
  total: number;
  step: PlanStep;
}

/**
 * Lifecycle callbacks. Called synchronously at each transition; a hook that
 * throws is logged and never alters the run.
 */
export interface ExecutionHooks {
  onPlanSet?(info: PlanSetInfo): void;
  onStepStarted?(info: StepInfo): void;
  onStepCompleted?(info: StepInfo & { result: ExecutionResult }): void;
  onStepSkipped?(info: StepInfo & { reason: string }): void;
  onRunCompleted?(info: { runId: string; report: RunReport }): void;
}

export interface PlanExecutorOptions {
  /** Pause between attempted steps so observers can catch up. 0 disables it. */
  stepPauseMs?: number | undefined;
  hooks?: ExecutionHooks | undefined;
  clock?: (() => Date) | undefined;
  createRunId?: (() => string) | undefined;
}

const EMPTY_INSTRUCTION = 'Instruction is empty';

// ── Executor ─────────────────────────────────────────────────

export class PlanExecutor {
  private readonly runner: InstructionRunner;
  private readonly stepPauseMs: number;
  private readonly hooks: ExecutionHooks;
  private readonly clock: () => Date;
  private readonly createRunId: () => string;

  private currentState: RunState = 'idle';
  private plan: Plan | null = null;
  private task: string | undefined;
  private currentRunId: string | null = null;
  private controller: AbortController | null = null;

  constructor(runner: InstructionRunner, options: PlanExecutorOptions = {}) {
    this.runner = runner;
    this.stepPauseMs = options.stepPauseMs ?? TIMEOUTS.STEP_PAUSE;
    this.hooks = options.hooks ?? {};
    this.clock = options.clock ?? (() => new Date());
    this.createRunId = options.createRunId ?? randomUUID;
  }

  get state(): RunState {
    return this.currentState;
  }

  get runId(): string | null {
    return this.currentRunId;
  }

  get currentPlan(): Plan | null {
    return this.plan;
  }

  /** Accept a plan and move to `planning`. Returns the new run id. */
  setPlan(plan: Plan, task?: string): string {
    if (this.currentState === 'running') {
      throw new PlanStateError('Cannot set a plan while a run is in progress');
    }

    const frozen = freezePlan(plan);
    const runId = this.createRunId();
    this.plan = frozen;
    this.task = task;
    this.currentRunId = runId;
    this.currentState = 'planning';

    log.planned(frozen.length);
    frozen.forEach((s, i) => {
      log.detail(`${String(i + 1)}. ${s.description || '(no description)'}${s.critical ? '' : ' [non-critical]'}`);
    });

    this.notify('onPlanSet', () => this.hooks.onPlanSet?.({ runId, task, plan: frozen }));
    return runId;
  }

  /**
   * Execute the plan step by step. Passing a plan is shorthand for
   * `setPlan(plan)` followed by `run()`.
   */
  async run(plan?: Plan, task?: string): Promise<RunReport> {
    if (plan !== undefined) this.setPlan(plan, task);

    if (this.currentState === 'running') {
      throw new PlanStateError('A run is already in progress');
    }
    if (this.currentState !== 'planning' || this.plan === null || this.currentRunId === null) {
      throw new PlanStateError('No plan has been set');
    }

    const steps = this.plan;
    const runId = this.currentRunId;
    const total = steps.length;
    const controller = new AbortController();

    this.currentState = 'running';
    this.controller = controller;

    const results: ExecutionResult[] = [];
    const skipped: SkippedStep[] = [];
    let terminal: TerminalRunState = 'completed';

    try {
      for (let i = 0; i < total; i++) {
        const step = steps[i];
        if (step === undefined) break;
        const info: StepInfo = { runId, index: i, total, step };

        if (!hasInstruction(step)) {
          log.warn(`Step ${String(i + 1)} has no instruction, skipping`);
          skipped.push({ stepIndex: i, description: step.description, reason: EMPTY_INSTRUCTION });
          this.notify('onStepSkipped', () =>
            this.hooks.onStepSkipped?.({ ...info, reason: EMPTY_INSTRUCTION }),
          );
          continue;
        }

        if (results.length > 0) await delay(this.stepPauseMs, controller.signal);
        if (controller.signal.aborted) {
          terminal = 'cancelled';
          break;
        }

        log.step(i, total, step.description);
        log.dispatch(step.instruction.slice(0, LIMITS.PREVIEW_CHARS));
        this.notify('onStepStarted', () => this.hooks.onStepStarted?.(info));

        const result = await this.runner.execute(step.instruction, step.context ?? '', {
          stepIndex: i,
          signal: controller.signal,
        });
        results.push(result);

        log.stepResult(i, total, result.outcome, step.description);
        this.notify('onStepCompleted', () => this.hooks.onStepCompleted?.({ ...info, result }));

        if (result.outcome === 'cancelled') {
          terminal = 'cancelled';
          break;
        }
        if (!isSuccess(result.outcome) && step.critical) {
          log.error(`Critical step ${String(i + 1)} failed (${result.outcome}), stopping plan`);
          terminal = 'stopped';
          break;
        }
      }
    } catch (err) {
      const report = this.finish(runId, total, results, skipped, 'failed');
      if (err instanceof ResourceExhaustionError) err.report = report;
      throw err;
    }

    return this.finish(runId, total, results, skipped, terminal);
  }

  /** Abort the in-flight step (if any) and stop the run. */
  cancel(): boolean {
    if (this.controller === null || this.controller.signal.aborted) return false;
    log.warn('Cancellation requested');
    this.controller.abort();
    return true;
  }

  private finish(
    runId: string,
    total: number,
    results: readonly ExecutionResult[],
    skipped: readonly SkippedStep[],
    state: TerminalRunState,
  ): RunReport {
    const report = buildReport(total, results, {
      runId,
      state,
      skipped,
      generatedAt: this.clock().toISOString(),
    });

    this.currentState = state;
    this.controller = null;
    this.notify('onRunCompleted', () => this.hooks.onRunCompleted?.({ runId, report }));
    return report;
  }

  private notify(name: keyof ExecutionHooks, call: () => void): void {
    try {
      call();
    } catch (err) {
      log.warn(`Hook ${name} threw: ${errorMessage(err)}`);
    }
  }
}

// ── Helpers ──────────────────────────────────────────────────

function delay(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0 || signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
